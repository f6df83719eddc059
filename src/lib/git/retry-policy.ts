/**
 * Retry policy for transient git failures
 *
 * Git reports ref-locking races and flaky network transfers only through
 * the text of its error messages, so a failure is classified by matching
 * that text against a list of known signatures. The list lives here as
 * data, validated by a zod schema, so it can be extended without touching
 * the retry loop.
 *
 * @example
 * ```typescript
 * import { DEFAULT_RETRY_POLICY, isTransientError } from './retry-policy';
 *
 * if (isTransientError(error, DEFAULT_RETRY_POLICY)) {
 *   // try again after DEFAULT_RETRY_POLICY.delayMs
 * }
 * ```
 */

import { z } from "zod";

/**
 * A failure signature: a literal substring, or a regular expression
 */
export const SignatureSchema = z.union([
  z.string().min(1),
  z.object({
    /** Regular expression source, matched without flags */
    pattern: z.string().min(1),
  }),
]);

export type Signature = z.infer<typeof SignatureSchema>;

/**
 * Known transient git failures: ref-lock contention with a concurrent git
 * process, and network transfers that dropped mid-way.
 */
export const TRANSIENT_GIT_ERRORS: Signature[] = [
  "cannot lock ref",
  "unable to update local ref",
  "fatal: unable to access",
  "fatal: the remote end hung up unexpectedly",
  "fatal: early EOF",
  "fatal: index-pack failed",
  "fatal: pack-objects failed",
  // e.g. "ref refs/remotes/origin/main is at 1a2b3c but expected 4d5e6f"
  { pattern: "is at [0-9a-f]+ but expected [0-9a-f]+" },
];

export const RetryPolicySchema = z.object({
  /** Total attempts, including the first */
  maxAttempts: z.number().int().positive().default(3),
  /** Pause between attempts in milliseconds (not after the last) */
  delayMs: z.number().int().nonnegative().default(2000),
  /** Signatures that mark a failure as transient */
  transientErrors: z.array(SignatureSchema).default(TRANSIENT_GIT_ERRORS),
});

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = RetryPolicySchema.parse({});

function matchesSignature(message: string, signature: Signature): boolean {
  if (typeof signature === "string") {
    return message.includes(signature);
  }
  return new RegExp(signature.pattern).test(message);
}

/**
 * Whether an error is a known transient failure worth retrying.
 *
 * A null error never is.
 */
export function isTransientError(
  error: Error | null,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): boolean {
  if (error === null) {
    return false;
  }

  return policy.transientErrors.some((signature) =>
    matchesSignature(error.message, signature),
  );
}
