/** Scalar cell value after normalisation of engine-specific types. */
export type SqlValue = string | number | boolean | null;

export type Row = SqlValue[];

export interface QueryResult {
  columns: string[];
  rows: Row[];
  rowCount: number;
}

/**
 * Live handle on an executed statement whose rows have not been fetched.
 * Returned for INSERTs, which may not produce a meaningful row set.
 */
export interface StatementCursor {
  readonly columns: string[];
  /** Rows inserted, updated or deleted by the statement. */
  readonly rowsChanged: number;
  fetchAll(): Promise<QueryResult>;
}

/**
 * The capability set the gateway needs from an embedded engine.
 * Implementations own exactly one native connection.
 */
export interface Connection {
  /** Human-readable driver name */
  readonly driverName: string;

  readonly path: string;

  readonly closed: boolean;

  /** Execute one statement and hand back its cursor. */
  run(sql: string): Promise<StatementCursor>;

  /**
   * Parse, bind and plan exactly one statement without executing it.
   * Rejects on syntax or catalog errors and on text holding several statements.
   */
  prepare(sql: string): Promise<void>;

  /** Ask the in-flight statement to stop. Does not close the connection. */
  interrupt(): void;

  /** Test if the connection is alive. */
  ping(): Promise<boolean>;

  /** Close the connection. Idempotent. */
  close(): Promise<void>;
}
