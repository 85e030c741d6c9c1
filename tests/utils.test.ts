import { describe, it, expect } from "vitest";
import {
  formatBytes,
  formatDuration,
  secondsSince,
  toJsonText,
  toNumberOrNull,
  withTimeout,
} from "../src/utils.js";

describe("withTimeout", () => {
  it("resolves with the promise value when it settles in time", async () => {
    await expect(withTimeout(Promise.resolve("done"), 50)).resolves.toBe("done");
  });

  it("rejects with the given message when time runs out", async () => {
    const never = new Promise<string>(() => {});
    await expect(withTimeout(never, 10, "too slow")).rejects.toThrow("too slow");
  });

  it("passes the original rejection through", async () => {
    await expect(withTimeout(Promise.reject(new Error("refused")), 50)).rejects.toThrow("refused");
  });
});

describe("formatBytes", () => {
  const cases: Array<[number | string | null | undefined, string]> = [
    [null, "N/A"],
    [undefined, "N/A"],
    [-1, "N/A"],
    ["abc", "N/A"],
    [0, "0 B"],
    [512, "512.0 B"],
    [1536, "1.5 KB"],
    ["1048576", "1.0 MB"],
  ];

  it.each(cases)("formats %j as %s", (input, expected) => {
    expect(formatBytes(input)).toBe(expected);
  });
});

describe("formatDuration", () => {
  const cases: Array<[number, string]> = [
    [0.4, "<1ms"],
    [250, "250ms"],
    [1500, "1.50s"],
    [90000, "1.5m"],
  ];

  it.each(cases)("formats %d ms as %s", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe("toNumberOrNull", () => {
  it("converts driver strings and keeps null", () => {
    expect(toNumberOrNull("42")).toBe(42);
    expect(toNumberOrNull(7)).toBe(7);
    expect(toNumberOrNull(null)).toBeNull();
    expect(toNumberOrNull(undefined)).toBeNull();
    expect(toNumberOrNull("n/a")).toBeNull();
  });
});

describe("secondsSince", () => {
  it("is never negative for a past start", () => {
    expect(secondsSince(Date.now() - 1500)).toBeGreaterThanOrEqual(1.5);
  });
});

describe("toJsonText", () => {
  it("indents by two spaces and renders bigint as a string", () => {
    expect(toJsonText({ id: 10n, name: "a" })).toBe('{\n  "id": "10",\n  "name": "a"\n}');
  });
});
