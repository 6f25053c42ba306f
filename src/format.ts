import type { QueryResult, SqlValue } from "./drivers/base.js";

const MAX_CELL_WIDTH = 200;

export type OutputFormat = "table" | "json" | "csv";

interface Column {
  name: string;
  width: number;
}

function sanitizeCell(value: SqlValue): string {
  if (value === null) return "NULL";
  const str = String(value);
  if (str.length > MAX_CELL_WIDTH) return str.slice(0, MAX_CELL_WIDTH - 3) + "...";
  return str;
}

/**
 * Render up to `limit` rows. `result.rowCount` is the full count, so a
 * truncated render says how many rows were left out.
 */
export function formatResults(result: QueryResult, format: OutputFormat, limit?: number): string {
  if (result.rows.length === 0) return "No results.";
  const rows = limit === undefined ? result.rows : result.rows.slice(0, limit);

  switch (format) {
    case "json":
      return JSON.stringify(rows.map((row) => toRecord(result.columns, row)), null, 2);
    case "csv":
      return formatCsv(result.columns, rows);
    case "table":
    default:
      return formatTable(result.columns, rows, result.rowCount);
  }
}

export function toRecord(columns: string[], row: SqlValue[]): Record<string, SqlValue> {
  const record: Record<string, SqlValue> = {};
  columns.forEach((name, i) => {
    record[name] = row[i] ?? null;
  });
  return record;
}

function formatCsv(columns: string[], rows: SqlValue[][]): string {
  const lines: string[] = [columns.map(csvEscape).join(",")];
  for (const row of rows) {
    lines.push(columns.map((_, i) => csvEscape(row[i] === null ? "" : String(row[i] ?? ""))).join(","));
  }
  return lines.join("\n");
}

function csvEscape(val: string): string {
  if (val.includes(",") || val.includes('"') || val.includes("\n")) {
    return `"${val.replace(/"/g, '""')}"`;
  }
  return val;
}

function formatTable(names: string[], rows: SqlValue[][], totalAvailable: number): string {
  const columns: Column[] = names.map((name) => ({
    name,
    width: name.length,
  }));

  const cellGrid: string[][] = [];
  for (const row of rows) {
    const cells: string[] = [];
    for (let i = 0; i < columns.length; i++) {
      const cell = sanitizeCell(row[i] ?? null);
      columns[i].width = Math.min(Math.max(columns[i].width, cell.length), MAX_CELL_WIDTH);
      cells.push(cell);
    }
    cellGrid.push(cells);
  }

  const header = columns.map((c) => c.name.padEnd(c.width)).join(" | ");
  const sep = columns.map((c) => "─".repeat(c.width)).join("─┼─");
  const body = cellGrid.map((cells) => cells.map((cell, i) => cell.padEnd(columns[i].width)).join(" | "));

  const lines = [header, sep, ...body];

  if (totalAvailable > rows.length) {
    lines.push(`\n(showing ${rows.length} of ${totalAvailable} rows)`);
  } else {
    lines.push(`\n(${rows.length} row${rows.length === 1 ? "" : "s"})`);
  }

  return lines.join("\n");
}
