// Checker - plain-text table rendering

import type { CheckEngine } from "./engine.js";
import type { Cell, TableSource } from "./types.js";

const COLUMN_PADDING = 2;

function formatCell(cell: Cell): string {
  return String(cell);
}

/**
 * Render one check as an aligned text table.
 * Checks without rows render as the empty string.
 */
export function renderTable(source: TableSource): string {
  if (source.rows.length === 0) return "";

  const widths = source.headers.map((header) => header.length);
  for (const row of source.rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, formatCell(cell).length);
    });
  }
  const padded = widths.map((w) => w + COLUMN_PADDING);

  const line = (cells: readonly Cell[]): string =>
    padded.map((w, i) => formatCell(cells[i] ?? "").padEnd(w)).join("");

  const lines: string[] = [
    source.title,
    "-".repeat(source.title.length) + "\n",
    source.description + "\n",
    line(source.headers),
    padded.map((w) => "-".repeat(w)).join(""),
    ...source.rows.map(line),
    "\n",
  ];
  return lines.join("\n");
}

/**
 * Concatenate the tables of every check that found something.
 * Checks that failed under isolation are listed in a trailing table.
 */
export function renderReport(engine: CheckEngine): string {
  const tables = engine.results().map(renderTable);

  const failures = engine.failures();
  tables.push(
    renderTable({
      title: "Failed checks",
      description: "Some checks could not complete.",
      headers: ["Check", "Error"],
      rows: failures.map((f) => [f.name, f.error.message]),
    }),
  );

  return tables.join("");
}
