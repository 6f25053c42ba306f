import { Type, type Static, type TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { GatewayConfig } from "./config.js";
import { GatewayError, errorMessage } from "./errors.js";
import { formatResults, type OutputFormat } from "./format.js";
import type { QueryGateway } from "./gateway.js";
import type { Logger } from "./logger.js";
import { DEFAULT_SAMPLE_ROWS } from "./projector.js";

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export interface ToolAnnotations {
  title: string;
  readOnlyHint: boolean;
  idempotentHint: boolean;
}

interface ToolDefinition<P extends TObject> {
  name: string;
  label: string;
  description: string;
  parameters: P;
  annotations: ToolAnnotations;
  execute(params: Static<P>): Promise<string>;
}

export interface RegisteredTool {
  name: string;
  label: string;
  description: string;
  parameters: TObject;
  annotations: ToolAnnotations;
  /** Shape-check `params` against the tool's schema, then run it. Never rejects. */
  call(params: unknown): Promise<ToolResult>;
}

export type ToolRegistry = Map<string, RegisteredTool>;

const DEFAULT_QUERY_LIMIT = 100;

function text(value: string, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: "text", text: value }] };
  if (isError) result.isError = true;
  return result;
}

function describeError(e: unknown): string {
  return e instanceof GatewayError ? `Error [${e.code}]: ${e.message}` : `Error: ${errorMessage(e)}`;
}

function defineTool<P extends TObject>(def: ToolDefinition<P>, logger: Logger): RegisteredTool {
  return {
    name: def.name,
    label: def.label,
    description: def.description,
    parameters: def.parameters,
    annotations: def.annotations,
    async call(params: unknown) {
      const input = params ?? {};
      if (!Value.Check(def.parameters, input)) {
        const problems = [...Value.Errors(def.parameters, input)].map((e) => `${e.path || "/"}: ${e.message}`);
        return text(`Error [INVALID_PARAMS]: ${problems.join("; ")}`, true);
      }
      try {
        return text(await def.execute(input));
      } catch (e) {
        logger.warn("tool failed", { tool: def.name, error: errorMessage(e) });
        return text(describeError(e), true);
      }
    },
  };
}

/**
 * Build the name→tool table for a gateway. Registration is explicit: each
 * tool is listed here and nothing is discovered by scanning.
 */
export function createTools(gateway: QueryGateway, cfg: GatewayConfig, logger: Logger): ToolRegistry {
  const tools: RegisteredTool[] = [
    defineTool(
      {
        name: "execute_query",
        label: "Execute SQL query",
        description:
          "Execute the given SQL query and return the result. DELETE, DROP and UPDATE are blocked, " +
          `and queries running longer than ${cfg.queryTimeout} ms are interrupted.`,
        parameters: Type.Object({
          query: Type.String({ description: "The SQL query to be executed." }),
          format: Type.Optional(
            Type.Union([Type.Literal("table"), Type.Literal("json"), Type.Literal("csv")], {
              description: "Output format (default: table)",
            }),
          ),
          limit: Type.Optional(
            Type.Integer({ minimum: 1, description: "Max rows to return (default: 100, hard cap from config)" }),
          ),
        }),
        annotations: { title: "Execute SQL query", readOnlyHint: true, idempotentHint: true },
        async execute(params) {
          const outcome = await gateway.executeQuery(params.query);
          if (outcome.kind === "cursor") {
            const n = outcome.cursor.rowsChanged;
            return `${n} row${n === 1 ? "" : "s"} affected.`;
          }
          const format: OutputFormat = params.format ?? "table";
          const limit = Math.min(params.limit ?? DEFAULT_QUERY_LIMIT, cfg.maxRows);
          return formatResults(outcome.result, format, limit);
        },
      },
      logger,
    ),

    defineTool(
      {
        name: "get_tables",
        label: "Get all the Tables",
        description: "Get a list of all the user defined tables in the database.",
        parameters: Type.Object({}),
        annotations: { title: "Get all the Tables", readOnlyHint: true, idempotentHint: true },
        async execute() {
          return JSON.stringify(await gateway.listTables());
        },
      },
      logger,
    ),

    defineTool(
      {
        name: "get_sample_data",
        label: "Get sample rows",
        description: "Get the first rows of a table.",
        parameters: Type.Object({
          table: Type.String({ description: "Name of the table." }),
          rows: Type.Optional(
            Type.Integer({ minimum: 0, description: `Number of rows to return (default: ${DEFAULT_SAMPLE_ROWS})` }),
          ),
        }),
        annotations: { title: "Get sample rows", readOnlyHint: true, idempotentHint: true },
        async execute(params) {
          const result = await gateway.getSampleData(params.table, params.rows ?? DEFAULT_SAMPLE_ROWS);
          return formatResults(result, "table");
        },
      },
      logger,
    ),

    defineTool(
      {
        name: "get_table_schema",
        label: "Describe table",
        description: "Get the columns of a table with their types and constraints, its row count and per-column statistics.",
        parameters: Type.Object({
          table: Type.String({ description: "Name of the table." }),
        }),
        annotations: { title: "Describe table", readOnlyHint: true, idempotentHint: true },
        async execute(params) {
          return JSON.stringify(await gateway.getTableSchemaAndStats(params.table), null, 2);
        },
      },
      logger,
    ),

    defineTool(
      {
        name: "generate_db_summary",
        label: "Generate DB Summary",
        description:
          "Get all the tables with their schema and some statistical information about the data in them.",
        parameters: Type.Object({}),
        annotations: { title: "Generate DB Summary", readOnlyHint: true, idempotentHint: true },
        async execute() {
          return JSON.stringify(await gateway.getDatabaseSummary(), null, 2);
        },
      },
      logger,
    ),

    defineTool(
      {
        name: "validate_query",
        label: "Validate SQL Query",
        description:
          "Validate if an SQL query is error-free and will run without errors. " +
          "A valid query may still be refused by execute_query.",
        parameters: Type.Object({
          query: Type.String({ description: "The SQL query for which validity check has to be performed." }),
        }),
        annotations: { title: "Validate SQL Query", readOnlyHint: true, idempotentHint: true },
        async execute(params) {
          return String(await gateway.isValidSql(params.query));
        },
      },
      logger,
    ),

    defineTool(
      {
        name: "import_data",
        label: "Import Data from Filesystem",
        description: "Import data from a CSV or JSON file in the filesystem into a new table.",
        parameters: Type.Object({
          file_type: Type.Union([Type.Literal("csv"), Type.Literal("json")], {
            description: "The file type to be imported. Only CSV and JSON is supported.",
          }),
          table_name: Type.String({ description: "The name of the table that will be created." }),
          file_path: Type.String({ description: "The file path that will have the data." }),
        }),
        annotations: { title: "Import Data from Filesystem", readOnlyHint: false, idempotentHint: false },
        async execute(params) {
          await gateway.importData(params.file_type, params.table_name, params.file_path);
          return `Imported ${params.file_path} into table ${params.table_name}.`;
        },
      },
      logger,
    ),
  ];

  return new Map(tools.map((tool) => [tool.name, tool]));
}
