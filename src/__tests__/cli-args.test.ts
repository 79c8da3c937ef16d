import { describe, it, expect } from "vitest";
import path from "node:path";
import { parseArgs } from "../cli-args.js";

describe("parseArgs", () => {
  it("uses the defaults with no arguments", () => {
    expect(parseArgs([], "Collection_1")).toEqual({
      collectionDir: path.resolve("Collection_1"),
      topK: 5,
      help: false,
    });
  });

  it("reads the collection dir, top-k and output", () => {
    expect(parseArgs(["docs", "-k", "3", "--output", "out.json"], "Collection_1")).toEqual({
      collectionDir: path.resolve("docs"),
      topK: 3,
      outputPath: path.resolve("out.json"),
      help: false,
    });
  });

  it("rejects a top-k with trailing characters", () => {
    expect(() => parseArgs(["--top-k", "5abc"], "c")).toThrow(
      '--top-k expects a non-negative integer, got "5abc"',
    );
  });

  it("rejects negative and fractional top-k values", () => {
    expect(() => parseArgs(["-k", "2.5"], "c")).toThrow('-k expects a non-negative integer, got "2.5"');
    expect(() => parseArgs(["-k", "-1"], "c")).toThrow("-k expects a value");
  });

  it("rejects a flag with its value missing", () => {
    expect(() => parseArgs(["--top-k"], "c")).toThrow("--top-k expects a value");
    expect(() => parseArgs(["--output"], "c")).toThrow("--output expects a value");
    expect(() => parseArgs(["-o", "--help"], "c")).toThrow("-o expects a value");
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--verbose"], "c")).toThrow("Unknown option: --verbose");
  });
});
