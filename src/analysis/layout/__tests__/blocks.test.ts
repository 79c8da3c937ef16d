import { describe, it, expect } from "vitest";
import { groupRunsIntoBlocks, groupRunsIntoLines, type TextRun } from "../blocks.js";
import { BOLD, REGULAR } from "../../__tests__/fixtures.js";

function run(text: string, x: number, y: number, overrides: Partial<TextRun> = {}): TextRun {
  return { text, x, y, width: text.length * 5, fontSize: 10, font: REGULAR, ...overrides };
}

const page = { pageNumber: 3, documentId: "doc.pdf" };

describe("groupRunsIntoLines", () => {
  it("inserts a space across a visible gap", () => {
    const lines = groupRunsIntoLines([run("Hello", 0, 700), run("world", 28, 700)]);
    expect(lines.map((l) => l.text)).toEqual(["Hello world"]);
  });

  it("glues runs that touch", () => {
    const lines = groupRunsIntoLines([run("Hel", 0, 700), run("lo", 15, 700)]);
    expect(lines.map((l) => l.text)).toEqual(["Hello"]);
  });

  it("does not double spaces the run already has", () => {
    const lines = groupRunsIntoLines([run("Hello ", 0, 700), run("world", 40, 700)]);
    expect(lines.map((l) => l.text)).toEqual(["Hello world"]);
  });

  it("starts a new line when the baseline moves", () => {
    const lines = groupRunsIntoLines([run("first", 0, 700), run("second", 0, 688)]);
    expect(lines.map((l) => l.text)).toEqual(["first", "second"]);
  });

  it("tolerates small baseline jitter", () => {
    const lines = groupRunsIntoLines([run("x", 0, 700), run("2", 6, 703)]);
    expect(lines).toHaveLength(1);
  });

  it("drops whitespace-only runs", () => {
    expect(groupRunsIntoLines([run("  ", 0, 700), run("", 0, 680)])).toEqual([]);
  });
});

describe("groupRunsIntoBlocks", () => {
  it("returns no blocks for no runs", () => {
    expect(groupRunsIntoBlocks([], page)).toEqual([]);
  });

  it("keeps tightly spaced lines in one block", () => {
    const blocks = groupRunsIntoBlocks([run("line one", 0, 700), run("line two", 0, 688)], page);
    expect(blocks).toEqual([
      {
        text: "line one\nline two",
        fontSize: 10,
        font: REGULAR,
        lineCount: 2,
        pageNumber: 3,
        documentId: "doc.pdf",
      },
    ]);
  });

  it("splits on a wide vertical gap", () => {
    const blocks = groupRunsIntoBlocks([run("para one", 0, 700), run("para two", 0, 670)], page);
    expect(blocks.map((b) => b.text)).toEqual(["para one", "para two"]);
  });

  it("splits a heading from the body by size", () => {
    const blocks = groupRunsIntoBlocks(
      [run("Introduction", 0, 720, { fontSize: 16, font: BOLD }), run("Body text", 0, 700)],
      page,
    );
    expect(blocks.map((b) => [b.text, b.fontSize, b.font.bold, b.lineCount])).toEqual([
      ["Introduction", 16, true, 1],
      ["Body text", 10, false, 1],
    ]);
  });

  it("splits on a change of weight at the same size", () => {
    const blocks = groupRunsIntoBlocks(
      [run("Bold label", 0, 700, { font: BOLD }), run("regular text", 0, 688)],
      page,
    );
    expect(blocks).toHaveLength(2);
  });

  it("splits when the text jumps back up the page", () => {
    const blocks = groupRunsIntoBlocks([run("left column", 0, 100), run("right column", 300, 700)], page);
    expect(blocks.map((b) => b.text)).toEqual(["left column", "right column"]);
  });

  it("styles a block by its most common run style", () => {
    const blocks = groupRunsIntoBlocks(
      [run("Note:", 0, 700, { font: BOLD }), run("this is regular", 30, 700)],
      page,
    );
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.font).toEqual(REGULAR);
    expect(blocks[0]?.text).toBe("Note: this is regular");
  });
});
