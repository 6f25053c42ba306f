import type { QueryResult, Row, SqlValue } from "./drivers/base.js";
import { EngineFailureError, UnknownTableError, isCatalogError } from "./errors.js";
import type { BoundedExecutor } from "./executor.js";
import { escapeIdentifier, quoteIdentifier, quoteLiteral } from "./sql.js";

export interface ColumnDescriptor {
  name: string;
  type: string;
  notNull: boolean;
  primaryKey: boolean;
}

export interface ColumnStatistics {
  column: string;
  count: SqlValue;
  distinctCount: SqlValue;
  nullCount: SqlValue;
  min: SqlValue;
  max: SqlValue;
  mean: SqlValue;
  std: SqlValue;
  q25: SqlValue;
  /** median */
  q50: SqlValue;
  q75: SqlValue;
  mode: SqlValue;
}

export interface TableSchema {
  tableName: string;
  columns: ColumnDescriptor[];
  rowCount: number;
  statistics: ColumnStatistics[];
}

export const DEFAULT_SAMPLE_ROWS = 10;

// PRAGMA table_info: cid, name, type, notnull, dflt_value, pk
const TABLE_INFO = { name: 1, type: 2, notNull: 3, primaryKey: 5 } as const;

// Output shape of buildStatisticsSql, in order. `mode` is the optional trailing column.
export const STATS_POSITIONS = {
  column: 0,
  count: 1,
  distinctCount: 2,
  nullCount: 3,
  min: 4,
  max: 5,
  mean: 6,
  std: 7,
  q25: 8,
  q50: 9,
  q75: 10,
  mode: 11,
} as const;

export const MIN_STATS_COLUMNS = STATS_POSITIONS.q75 + 1;

// Scalar numeric types only: `INTEGER[]`, `DOUBLE[3]` and other nested types do not match.
const NUMERIC_TYPE_RE =
  /^(TINYINT|SMALLINT|INTEGER|INT|BIGINT|HUGEINT|UTINYINT|USMALLINT|UINTEGER|UBIGINT|UHUGEINT|FLOAT|REAL|DOUBLE|DECIMAL|NUMERIC)(\(\s*\d+\s*(,\s*\d+\s*)?\))?$/i;

export function isNumericType(type: string): boolean {
  return NUMERIC_TYPE_RE.test(type.trim());
}

/**
 * Turns raw engine output into the table list, sample rows and schema+statistics
 * shapes handed to callers. Every statement here is composed by the gateway
 * over a validated table name, so it runs with the gate off.
 */
export class Projector {
  constructor(private readonly executor: BoundedExecutor) {}

  async listTables(): Promise<string[]> {
    const result = await this.executor.query(
      "SELECT table_name FROM information_schema.tables WHERE table_schema = 'main'",
      { gate: false },
    );
    return result.rows.map((row) => String(row[0]));
  }

  async sample(table: string, numRows: number = DEFAULT_SAMPLE_ROWS): Promise<QueryResult> {
    if (!Number.isInteger(numRows) || numRows < 0) {
      throw new RangeError(`Row count must be a non-negative integer, got ${numRows}`);
    }
    const quoted = quoteIdentifier(table);
    return this.forTable(table, () =>
      this.executor.query(`SELECT * FROM ${quoted} LIMIT ${numRows}`, { gate: false }),
    );
  }

  async schemaAndStats(table: string): Promise<TableSchema> {
    const quoted = quoteIdentifier(table);

    return this.forTable(table, async () => {
      const info = await this.executor.query(`PRAGMA table_info(${quoteLiteral(table)})`, { gate: false });
      const columns = info.rows.map(toColumnDescriptor);

      const count = await this.executor.query(`SELECT COUNT(*) FROM ${quoted}`, { gate: false });
      const rowCount = Number(count.rows[0]?.[0] ?? 0);

      const stats = await this.executor.query(buildStatisticsSql(quoted, columns), { gate: false });
      const statistics = stats.rows.map(toColumnStatistics);

      return { tableName: table, columns, rowCount, statistics };
    });
  }

  private async forTable<T>(table: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (isCatalogError(err)) throw new UnknownTableError(table, err);
      throw err;
    }
  }
}

function toColumnDescriptor(row: Row): ColumnDescriptor {
  return {
    name: String(row[TABLE_INFO.name]),
    type: String(row[TABLE_INFO.type]),
    notNull: Boolean(row[TABLE_INFO.notNull]),
    primaryKey: Boolean(row[TABLE_INFO.primaryKey]),
  };
}

/**
 * Map one statistics row by named position. Fewer than the minimum columns
 * means the query shape changed, which must not be silently misassigned.
 */
export function toColumnStatistics(row: Row): ColumnStatistics {
  if (row.length < MIN_STATS_COLUMNS) {
    throw new EngineFailureError(
      `Summary shape changed: expected at least ${MIN_STATS_COLUMNS} columns, got ${row.length}`,
    );
  }
  const at = (position: number): SqlValue => row[position] ?? null;
  return {
    column: String(row[STATS_POSITIONS.column]),
    count: at(STATS_POSITIONS.count),
    distinctCount: at(STATS_POSITIONS.distinctCount),
    nullCount: at(STATS_POSITIONS.nullCount),
    min: at(STATS_POSITIONS.min),
    max: at(STATS_POSITIONS.max),
    mean: at(STATS_POSITIONS.mean),
    std: at(STATS_POSITIONS.std),
    q25: at(STATS_POSITIONS.q25),
    q50: at(STATS_POSITIONS.q50),
    q75: at(STATS_POSITIONS.q75),
    mode: row.length > STATS_POSITIONS.mode ? at(STATS_POSITIONS.mode) : null,
  };
}

/**
 * One UNION ALL branch per column, re-ordered by column position since UNION
 * ALL promises no order. Mean, standard deviation and quartiles only make
 * sense for numeric columns; other types get typed NULLs so every branch has
 * the same shape.
 */
export function buildStatisticsSql(quotedTable: string, columns: ColumnDescriptor[]): string {
  if (columns.length === 0) {
    throw new EngineFailureError(`Table ${quotedTable} has no columns to summarize`);
  }

  const branches = columns.map((col, ordinal) => {
    const c = escapeIdentifier(col.name);
    const numeric = isNumericType(col.type);
    const num = (expr: string) => (numeric ? `CAST(${expr} AS DOUBLE)` : "CAST(NULL AS DOUBLE)");
    return [
      `SELECT ${quoteLiteral(col.name)} AS column_name`,
      `COUNT(${c}) AS count`,
      `COUNT(DISTINCT ${c}) AS distinct_count`,
      `COUNT(*) - COUNT(${c}) AS null_count`,
      `CAST(MIN(${c}) AS VARCHAR) AS min`,
      `CAST(MAX(${c}) AS VARCHAR) AS max`,
      `${num(`AVG(${c})`)} AS mean`,
      `${num(`STDDEV_SAMP(${c})`)} AS std`,
      `${num(`QUANTILE_CONT(${c}, 0.25)`)} AS q25`,
      `${num(`QUANTILE_CONT(${c}, 0.5)`)} AS q50`,
      `${num(`QUANTILE_CONT(${c}, 0.75)`)} AS q75`,
      `MODE(CAST(${c} AS VARCHAR)) AS mode`,
      `${ordinal} AS ordinal`,
    ].join(", ") + ` FROM ${quotedTable}`;
  });

  return `SELECT * EXCLUDE (ordinal) FROM (\n${branches.join("\nUNION ALL\n")}\n) ORDER BY ordinal`;
}
