import type { GatewayConfig } from "./config.js";
import { openDatabase } from "./connection.js";
import type { Connection, QueryResult } from "./drivers/base.js";
import { BoundedExecutor, type ExecutionResult } from "./executor.js";
import { importData } from "./importer.js";
import type { Logger } from "./logger.js";
import { DEFAULT_SAMPLE_ROWS, Projector, type TableSchema } from "./projector.js";
import { isValidSql } from "./validator.js";

/**
 * One gateway, one connection. Every operation routes through the same
 * BoundedExecutor, so statements never overlap on the connection.
 */
export class QueryGateway {
  private readonly executor: BoundedExecutor;
  private readonly projector: Projector;
  private readonly logger: Logger;

  constructor(
    private readonly connection: Connection,
    timeoutMs: number,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "gateway" });
    this.executor = new BoundedExecutor(connection, timeoutMs, logger.child({ component: "executor" }));
    this.projector = new Projector(this.executor);
  }

  static async open(config: GatewayConfig, logger: Logger): Promise<QueryGateway> {
    const connection = await openDatabase(config.databasePath, {
      bootstrapPath: config.bootstrapPath,
      logger: logger.child({ component: "connection" }),
    });
    logger.info("gateway ready", { path: config.databasePath, timeoutMs: config.queryTimeout });
    return new QueryGateway(connection, config.queryTimeout, logger);
  }

  get path(): string {
    return this.connection.path;
  }

  get timeoutMs(): number {
    return this.executor.timeoutMs;
  }

  /** Gated, bounded execution of caller-supplied SQL. */
  executeQuery(sql: string): Promise<ExecutionResult> {
    this.logger.debug("execute", { sql });
    return this.executor.execute(sql);
  }

  listTables(): Promise<string[]> {
    return this.projector.listTables();
  }

  getSampleData(table: string, numRows: number = DEFAULT_SAMPLE_ROWS): Promise<QueryResult> {
    return this.projector.sample(table, numRows);
  }

  getTableSchemaAndStats(table: string): Promise<TableSchema> {
    return this.projector.schemaAndStats(table);
  }

  /** Schema and statistics for every table, keyed by name in catalog order. */
  async getDatabaseSummary(): Promise<Record<string, TableSchema>> {
    const summary: Record<string, TableSchema> = {};
    for (const table of await this.listTables()) {
      summary[table] = await this.getTableSchemaAndStats(table);
    }
    return summary;
  }

  async importData(format: string, tableName: string, filePath: string): Promise<true> {
    const result = await importData(this.executor, format, tableName, filePath);
    this.logger.info("imported file", { format, tableName, filePath });
    return result;
  }

  isValidSql(sql: string): Promise<boolean> {
    return isValidSql(this.executor, sql, this.logger);
  }

  ping(): Promise<boolean> {
    return this.connection.ping();
  }

  async close(): Promise<void> {
    await this.connection.close();
    this.logger.info("gateway closed", { path: this.connection.path });
  }
}
