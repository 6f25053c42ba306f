import {
  DuckDBConnection,
  DuckDBDecimalValue,
  DuckDBInstance,
  type DuckDBMaterializedResult,
  type DuckDBValue,
} from "@duckdb/node-api";
import type { Connection, QueryResult, SqlValue, StatementCursor } from "./base.js";
import { ConnectionClosedError } from "../errors.js";

export class DuckDbDriver implements Connection {
  readonly driverName = "duckdb";
  readonly path: string;
  private instance: DuckDBInstance | null;
  private connection: DuckDBConnection | null;

  private constructor(path: string, instance: DuckDBInstance, connection: DuckDBConnection) {
    this.path = path;
    this.instance = instance;
    this.connection = connection;
  }

  /** Opens the file (creating it when absent). Engine errors propagate as-is. */
  static async open(path: string): Promise<DuckDbDriver> {
    const instance = await DuckDBInstance.create(path);
    const connection = await instance.connect();
    return new DuckDbDriver(path, instance, connection);
  }

  get closed(): boolean {
    return this.connection === null;
  }

  async run(sql: string): Promise<StatementCursor> {
    const result = await this.ensureConnected().run(sql);
    return new DuckDbCursor(result);
  }

  async prepare(sql: string): Promise<void> {
    await this.ensureConnected().prepare(sql);
  }

  interrupt(): void {
    this.connection?.interrupt();
  }

  async ping(): Promise<boolean> {
    try {
      await this.ensureConnected().run("SELECT 1");
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.connection) {
      this.connection.closeSync();
      this.connection = null;
    }
    if (this.instance) {
      this.instance.closeSync();
      this.instance = null;
    }
  }

  private ensureConnected(): DuckDBConnection {
    if (!this.connection) throw new ConnectionClosedError(this.path);
    return this.connection;
  }
}

class DuckDbCursor implements StatementCursor {
  readonly columns: string[];
  readonly rowsChanged: number;

  constructor(private readonly result: DuckDBMaterializedResult) {
    this.columns = result.columnNames();
    this.rowsChanged = result.rowsChanged;
  }

  async fetchAll(): Promise<QueryResult> {
    const raw = await this.result.getRows();
    const rows = raw.map((row) => row.map(toSqlValue));
    return { columns: this.columns, rows, rowCount: rows.length };
  }
}

/**
 * BIGINT/HUGEINT arrive as bigint and DECIMAL as a value object; both become
 * numbers when that is lossless. Dates, timestamps, intervals, lists and the
 * rest keep DuckDB's own text rendering.
 */
export function toSqlValue(value: DuckDBValue): SqlValue {
  if (value === null) return null;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return value;
    case "bigint":
      return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value)
        : value.toString();
  }
  if (value instanceof DuckDBDecimalValue) {
    const text = value.toString();
    const num = Number(text);
    return Number.isFinite(num) && String(num) === stripTrailingZeros(text) ? num : text;
  }
  return String(value);
}

function stripTrailingZeros(text: string): string {
  if (!text.includes(".")) return text;
  return text.replace(/\.?0+$/, "");
}
