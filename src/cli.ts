import { Command, InvalidArgumentError } from "commander";
import { parseLogLevel, resolveConfig, type GatewayConfig } from "./config.js";
import { GatewayError, errorMessage } from "./errors.js";
import { formatResults, type OutputFormat } from "./format.js";
import { QueryGateway } from "./gateway.js";
import { createLogger, type Logger } from "./logger.js";
import { SERVER_INFO, serveStdio } from "./server.js";
import { createTools } from "./tools.js";

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  exit(code: number): void;
}

interface GlobalOptions {
  db?: string;
  timeout?: number;
  logLevel?: string;
}

const processIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  exit: (code) => {
    process.exitCode = code;
  },
};

function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number of milliseconds.");
  }
  return parsed;
}

function parseFormat(value: string): OutputFormat {
  if (value === "table" || value === "json" || value === "csv") return value;
  throw new InvalidArgumentError("Must be one of: table, json, csv.");
}

export function buildProgram(
  io: CliIO = processIO,
  makeLogger: (cfg: GatewayConfig) => Logger = (cfg) => createLogger(cfg.logLevel),
): Command {
  const program = new Command();

  program
    .name("duckdb-gateway")
    .description("Guarded SQL execution over a DuckDB database, for agents and humans.")
    .version(SERVER_INFO.version)
    .option("--db <path>", "Path to the DuckDB database (default: the sample database)")
    .option("-t, --timeout <ms>", "Query timeout in milliseconds", parseMilliseconds)
    .option("--log-level <level>", "error, warn, info or debug");

  const configFromOptions = (): GatewayConfig => {
    const opts = program.opts<GlobalOptions>();
    return resolveConfig({
      databasePath: opts.db,
      queryTimeout: opts.timeout,
      logLevel: parseLogLevel(opts.logLevel),
    });
  };

  /** Open the gateway, run one command against it, always close it. */
  const withGateway = async (fn: (gateway: QueryGateway, cfg: GatewayConfig) => Promise<void>) => {
    let gateway: QueryGateway | undefined;
    try {
      const cfg = configFromOptions();
      gateway = await QueryGateway.open(cfg, makeLogger(cfg));
      await fn(gateway, cfg);
    } catch (e) {
      io.err(e instanceof GatewayError ? `Error [${e.code}]: ${e.message}` : `Error: ${errorMessage(e)}`);
      io.exit(1);
    } finally {
      await gateway?.close();
    }
  };

  program
    .command("serve", { isDefault: true })
    .description("Serve the gateway's tools over MCP on stdio")
    .action(async () => {
      try {
        const cfg = configFromOptions();
        const logger = makeLogger(cfg);
        const gateway = await QueryGateway.open(cfg, logger);
        const server = await serveStdio(createTools(gateway, cfg, logger), logger);

        server.onclose = () => {
          gateway.close().catch((e: unknown) => logger.error("close failed", { error: errorMessage(e) }));
        };
        for (const signal of ["SIGINT", "SIGTERM"] as const) {
          process.once(signal, () => {
            server.close().catch((e: unknown) => logger.error("shutdown failed", { error: errorMessage(e) }));
          });
        }
      } catch (e) {
        io.err(`Error: ${errorMessage(e)}`);
        io.exit(1);
      }
    });

  program
    .command("query")
    .description("Execute a SQL query")
    .argument("<sql>", "SQL query to execute")
    .option("-f, --format <fmt>", "Output format: table, json, csv", parseFormat, "table")
    .option("-l, --limit <n>", "Max rows", "100")
    .action(async (sql: string, opts: { format: OutputFormat; limit: string }) => {
      await withGateway(async (gateway, cfg) => {
        const outcome = await gateway.executeQuery(sql);
        if (outcome.kind === "cursor") {
          io.out(`${outcome.cursor.rowsChanged} row(s) affected.`);
          return;
        }
        const limit = Math.min(parseInt(opts.limit, 10) || 100, cfg.maxRows);
        io.out(formatResults(outcome.result, opts.format, limit));
      });
    });

  program
    .command("tables")
    .description("List the tables in the database")
    .action(async () => {
      await withGateway(async (gateway) => {
        const tables = await gateway.listTables();
        io.out(tables.length === 0 ? "No tables found." : tables.join("\n"));
      });
    });

  program
    .command("schema")
    .description("Show a table's columns, row count and statistics")
    .argument("<table>", "Table to describe")
    .action(async (table: string) => {
      await withGateway(async (gateway) => {
        const schema = await gateway.getTableSchemaAndStats(table);
        io.out(`Table: ${schema.tableName} (${schema.rowCount} rows)\n`);
        for (const col of schema.columns) {
          const pk = col.primaryKey ? " [PK]" : "";
          const nullable = col.notNull ? " NOT NULL" : " nullable";
          io.out(`  ${col.name}: ${col.type}${nullable}${pk}`);
        }
      });
    });

  program
    .command("validate")
    .description("Check whether a statement would plan without errors (never executes it)")
    .argument("<sql>", "SQL to validate")
    .action(async (sql: string) => {
      await withGateway(async (gateway) => {
        const valid = await gateway.isValidSql(sql);
        io.out(valid ? "valid" : "invalid");
        if (!valid) io.exit(1);
      });
    });

  program
    .command("import")
    .description("Create a table from a CSV or JSON file")
    .argument("<format>", "csv or json")
    .argument("<table>", "Name of the table to create")
    .argument("<file>", "File to import")
    .action(async (format: string, table: string, file: string) => {
      await withGateway(async (gateway) => {
        await gateway.importData(format, table, file);
        io.out(`Imported ${file} into table ${table}.`);
      });
    });

  return program;
}
