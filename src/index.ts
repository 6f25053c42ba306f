export { BOOTSTRAP_DATABASE, expandEnv, resolveConfig, resolvePath, type GatewayConfig, type LogLevel } from "./config.js";
export { openDatabase, type OpenOptions } from "./connection.js";
export type { Connection, QueryResult, Row, SqlValue, StatementCursor } from "./drivers/base.js";
export { DuckDbDriver } from "./drivers/duckdb.js";
export * from "./errors.js";
export { BoundedExecutor, type ExecuteOptions, type ExecutionResult } from "./executor.js";
export { formatResults, type OutputFormat } from "./format.js";
export { QueryGateway } from "./gateway.js";
export { importData, parseImportFormat, type ImportFormat } from "./importer.js";
export { createLogger, createSilentLogger, type Logger } from "./logger.js";
export {
  Projector,
  type ColumnDescriptor,
  type ColumnStatistics,
  type TableSchema,
} from "./projector.js";
export { DENIED_KEYWORDS, validateQuery, type SafetyResult } from "./safety.js";
export { createSampleDatabase } from "./sample-data.js";
export { createMcpServer, serveStdio } from "./server.js";
export { createTools, type RegisteredTool, type ToolRegistry, type ToolResult } from "./tools.js";
export { isValidSql } from "./validator.js";
