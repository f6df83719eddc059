import { describe, it, expect } from "vitest";
import { LineChannel } from "./line-channel.js";

async function collect(channel: LineChannel): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of channel) {
    lines.push(line);
  }
  return lines;
}

describe("LineChannel", () => {
  it("should yield buffered lines then end once closed", async () => {
    const channel = new LineChannel();
    channel.push("one");
    channel.push("two");
    channel.close();

    expect(await collect(channel)).toEqual(["one", "two"]);
  });

  it("should wait for lines pushed later", async () => {
    const channel = new LineChannel();
    const pending = collect(channel);

    await Promise.resolve();
    channel.push("late");
    setTimeout(() => {
      channel.push("later");
      channel.close();
    }, 5);

    expect(await pending).toEqual(["late", "later"]);
  });

  it("should ignore pushes after close", async () => {
    const channel = new LineChannel();
    channel.push("kept");
    channel.close();
    channel.push("dropped");

    expect(channel.isClosed).toBe(true);
    expect(await collect(channel)).toEqual(["kept"]);
  });

  it("should end immediately when closed empty", async () => {
    const channel = new LineChannel();
    channel.close();
    expect(await collect(channel)).toEqual([]);
  });
});
