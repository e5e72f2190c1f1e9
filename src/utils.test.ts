import { describe, expect, it } from "vitest";
import { formatDuration, humanFileSize } from "./utils.ts";

describe("humanFileSize", () => {
  it("formats bytes with a binary unit", () => {
    expect(humanFileSize(0)).toBe("0B");
    expect(humanFileSize(1536)).toBe("1.5kB");
    expect(humanFileSize(3 * 1024 * 1024)).toBe("3MB");
  });
});

describe("formatDuration", () => {
  it("keeps the two largest units", () => {
    expect(formatDuration(75_000)).toBe("1 minute, 15 seconds");
    expect(formatDuration(250)).toBe("250 milliseconds");
  });
});
