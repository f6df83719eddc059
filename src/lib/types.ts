/**
 * Shared types between the output streamer and the command executor
 */

/**
 * One-way channel for the text lines an operation produces.
 *
 * Empty lines are ignored by every consumer.
 */
export type LineSink = (line: string) => void;

/**
 * A titled unit of work rendered by the output streamer.
 *
 * Resolving means success; rejecting means failure, and the rejection's
 * message is shown below the failed status line.
 */
export type Operation = (sink: LineSink) => Promise<void>;

/**
 * Outcome of a streamed operation
 */
export type OperationResult =
  | { success: true }
  | { success: false; error: Error };
