import { describe, it, expect } from "vitest";
import { resolveConfig } from "./config.js";
import { QueryGateway } from "./gateway.js";
import { createSilentLogger } from "./logger.js";
import { callTool, describeTool } from "./server.js";
import { FakeConnection, result, type Responder } from "./testing/fake-connection.js";
import { createTools, type ToolResult } from "./tools.js";

const logger = createSilentLogger();

function setup(respond?: Responder) {
  const conn = new FakeConnection(respond);
  const cfg = resolveConfig({ maxRows: 2 }, {});
  const tools = createTools(new QueryGateway(conn, 1000, logger), cfg, logger);
  return { conn, tools };
}

function textOf(res: ToolResult): string {
  return res.content.map((c) => c.text).join("");
}

describe("createTools", () => {
  it("registers every tool by name", () => {
    const { tools } = setup();
    expect([...tools.keys()]).toEqual([
      "execute_query",
      "get_tables",
      "get_sample_data",
      "get_table_schema",
      "generate_db_summary",
      "validate_query",
      "import_data",
    ]);
  });

  it("lists tables as a JSON array", async () => {
    const { tools } = setup(async () => result(["table_name"], [["authors"], ["books"]]));
    const res = await callTool(tools, "get_tables", {});
    expect(res.isError).toBeUndefined();
    expect(textOf(res)).toBe('["authors","books"]');
  });

  it("rejects arguments that do not match the schema", async () => {
    const { conn, tools } = setup();
    const res = await callTool(tools, "execute_query", { query: 42 });
    expect(res.isError).toBe(true);
    expect(textOf(res).startsWith("Error [INVALID_PARAMS]: /query: ")).toBe(true);
    expect(conn.statements).toEqual([]);
  });

  it("reports blocked statements with their code", async () => {
    const { conn, tools } = setup();
    const res = await callTool(tools, "execute_query", { query: "DROP TABLE books" });
    expect(res).toEqual({
      content: [
        { type: "text", text: "Error [FORBIDDEN]: DROP blocked — DELETE, DROP and UPDATE operations are not allowed." },
      ],
      isError: true,
    });
    expect(conn.statements).toEqual([]);
  });

  it("formats rows and caps them at maxRows", async () => {
    const { tools } = setup(async () => result(["id"], [[1], [2], [3]]));
    const res = await callTool(tools, "execute_query", { query: "SELECT id FROM t", format: "json", limit: 50 });
    expect(JSON.parse(textOf(res))).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it("reports affected rows for INSERT", async () => {
    const { conn, tools } = setup(async () => result(["Count"], [[1]]));
    const res = await callTool(tools, "execute_query", { query: "INSERT INTO t VALUES (1)" });
    expect(textOf(res)).toBe("1 row affected.");
    expect(conn.fetchCount).toBe(0);
  });

  it("answers validate_query with true or false", async () => {
    const { tools } = setup(async (sql) => {
      if (sql === "not sql") throw new Error('Parser Error: syntax error at or near "not"');
      return result([], []);
    });
    expect(textOf(await callTool(tools, "validate_query", { query: "SELECT 1" }))).toBe("true");
    expect(textOf(await callTool(tools, "validate_query", { query: "not sql" }))).toBe("false");
  });

  it("refuses imports of unknown formats and missing files", async () => {
    const { conn, tools } = setup();
    const badFormat = await callTool(tools, "import_data", { file_type: "xml", table_name: "t", file_path: "/tmp/x.xml" });
    expect(badFormat.isError).toBe(true);
    expect(textOf(badFormat).startsWith("Error [INVALID_PARAMS]:")).toBe(true);

    const missing = await callTool(tools, "import_data", {
      file_type: "csv",
      table_name: "t",
      file_path: "/nonexistent/data.csv",
    });
    expect(textOf(missing)).toBe("Error [NOT_FOUND]: File not found: /nonexistent/data.csv");
    expect(conn.statements).toEqual([]);
  });

  it("maps catalog errors from the sample tool", async () => {
    const { tools } = setup(async () => {
      throw new Error("Catalog Error: Table with name nope does not exist!");
    });
    const res = await callTool(tools, "get_sample_data", { table: "nope" });
    expect(textOf(res)).toBe(
      'Error [UNKNOWN_TABLE]: Table "nope" not found: Catalog Error: Table with name nope does not exist!',
    );
  });
});

describe("server helpers", () => {
  it("answers unknown tools with the available names", async () => {
    const { tools } = setup();
    const res = await callTool(tools, "drop_everything", {});
    expect(res.isError).toBe(true);
    expect(textOf(res)).toBe(
      'Error: unknown tool "drop_everything". Available: execute_query, get_tables, get_sample_data, ' +
        "get_table_schema, generate_db_summary, validate_query, import_data",
    );
  });

  it("publishes each tool's JSON schema", () => {
    const { tools } = setup();
    const importTool = tools.get("import_data");
    expect(importTool).toBeDefined();
    if (!importTool) return;

    const described = describeTool(importTool);
    expect(described.inputSchema.type).toBe("object");
    expect(described.inputSchema.required).toEqual(["file_type", "table_name", "file_path"]);
    expect(Object.keys(described.inputSchema.properties)).toEqual(["file_type", "table_name", "file_path"]);
    expect(described.annotations.readOnlyHint).toBe(false);
  });
});
