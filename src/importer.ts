import { existsSync } from "node:fs";
import { NotFoundError, UnsupportedFormatError } from "./errors.js";
import type { BoundedExecutor } from "./executor.js";
import { quoteIdentifier, quoteLiteral } from "./sql.js";

export type ImportFormat = "csv" | "json";

const READERS: Record<ImportFormat, string> = {
  csv: "read_csv",
  json: "read_json",
};

export function parseImportFormat(format: string): ImportFormat {
  const normalized = format.trim().toLowerCase();
  if (normalized === "csv" || normalized === "json") return normalized;
  throw new UnsupportedFormatError(format);
}

/**
 * Build the CREATE TABLE … AS SELECT statement that lets the engine's reader
 * infer the schema from the file.
 */
export function buildImportSql(format: ImportFormat, tableName: string, filePath: string): string {
  return `CREATE TABLE ${quoteIdentifier(tableName)} AS SELECT * FROM ${READERS[format]}(${quoteLiteral(filePath)})`;
}

/**
 * Load a CSV or JSON file into a new table. Runs under the executor's timeout
 * but not through the statement gate: CREATE is not a denied keyword, and a
 * file path containing "update" must not block the import.
 */
export async function importData(
  executor: BoundedExecutor,
  format: string,
  tableName: string,
  filePath: string,
): Promise<true> {
  if (!existsSync(filePath)) throw new NotFoundError("File", filePath);
  const sql = buildImportSql(parseImportFormat(format), tableName, filePath);
  await executor.execute(sql, { gate: false });
  return true;
}
