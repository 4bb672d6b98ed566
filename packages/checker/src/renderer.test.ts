import { describe, it, expect } from "vitest";
import { renderTable } from "./renderer.js";
import type { TableSource } from "./types.js";

const strayFiles: TableSource = {
  title: "Stray files",
  description:
    "Some files are present in the repository, but not mentioned anywhere.",
  headers: ["Filename", "Path"],
  rows: [
    ["old.py", "/repo/freecad/C1"],
    ["stray.txt", "/repo/drawings/C1"],
  ],
};

describe("renderTable", () => {
  it("should render nothing for a check without rows", () => {
    expect(renderTable({ ...strayFiles, rows: [] })).toBe("");
  });

  it("should render an aligned table with a trailing blank line", () => {
    expect(renderTable(strayFiles)).toBe(
      [
        "Stray files",
        "-----------",
        "",
        "Some files are present in the repository, but not mentioned anywhere.",
        "",
        "Filename   Path               ",
        "------------------------------",
        "old.py     /repo/freecad/C1   ",
        "stray.txt  /repo/drawings/C1  ",
        "",
        "",
      ].join("\n"),
    );
  });

  it("should print booleans and widen columns to the header", () => {
    const output = renderTable({
      title: "Missing base geometries",
      description: "d",
      headers: ["Class id", "Collection", "Standards", "freecad", "openscad"],
      rows: [["B", "C1", "ISO 4032", false, false]],
    });

    const lines = output.split("\n");
    expect(lines[5]).toBe("Class id  Collection  Standards  freecad  openscad  ");
    expect(lines[7]).toBe("B         C1          ISO 4032   false    false     ");
  });

  it("should pad every row to the header's column boundaries", () => {
    const lines = renderTable(strayFiles).split("\n");
    const header = lines[5];
    const widths = ["stray.txt".length, "/repo/drawings/C1".length].map(
      (w) => w + 2,
    );

    expect(header.length).toBe(widths[0] + widths[1]);
    expect(lines[6]).toBe("-".repeat(header.length));
    for (const row of lines.slice(7, 9)) {
      expect(row.length).toBe(header.length);
      expect(row[widths[0] - 1]).toBe(" ");
    }
  });
});
