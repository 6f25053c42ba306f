import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "./logger.js";
import type { RegisteredTool, ToolRegistry, ToolResult } from "./tools.js";

export const SERVER_INFO = { name: "duckdb-query-gateway", version: "0.1.0" } as const;

export function describeTool(tool: RegisteredTool) {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: {
      type: "object" as const,
      properties: { ...tool.parameters.properties },
      required: tool.parameters.required ?? [],
    },
    annotations: tool.annotations,
  };
}

export async function callTool(registry: ToolRegistry, name: string, args: unknown): Promise<ToolResult> {
  const tool = registry.get(name);
  if (!tool) {
    return {
      content: [{ type: "text", text: `Error: unknown tool "${name}". Available: ${[...registry.keys()].join(", ")}` }],
      isError: true,
    };
  }
  return tool.call(args);
}

/** MCP server exposing every tool in the registry. */
export function createMcpServer(registry: ToolRegistry, logger: Logger): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [...registry.values()].map(describeTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    logger.debug("tool call", { tool: request.params.name });
    return callTool(registry, request.params.name, request.params.arguments ?? {});
  });

  return server;
}

/** Serve over stdio until the client disconnects. */
export async function serveStdio(registry: ToolRegistry, logger: Logger): Promise<Server> {
  const server = createMcpServer(registry, logger);
  await server.connect(new StdioServerTransport());
  logger.info("MCP server listening on stdio", { tools: [...registry.keys()] });
  return server;
}
