import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { createLogger, type Logger } from "@ocpp-lite/protocol";
import type { DeviceAdmin } from "./admin.js";

export interface McpServerInfo {
  name: string;
  version: string;
}

export const SERVER_INFO: McpServerInfo = { name: "ocpp-lite-central", version: "0.1.0" };

export interface CentralMcpOptions {
  admin: DeviceAdmin;
  info?: McpServerInfo;
  logger?: Logger;
}

export function createCentralMcpServer(options: CentralMcpOptions): McpServer {
  const server = new McpServer(options.info ?? SERVER_INFO);
  registerTools(server, options.admin, options.logger ?? createLogger("mcp"));
  return server;
}

function registerTools(server: McpServer, admin: DeviceAdmin, log: Logger): void {
  const run = async (tool: string, action: () => Promise<unknown>): Promise<CallToolResult> => {
    try {
      const result = await action();
      return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
    } catch (error) {
      log.warn(`Tool ${tool} failed`, error);
      const message = error instanceof Error ? error.message : String(error);
      return { isError: true, content: [{ type: "text", text: message }] };
    }
  };

  server.registerTool(
    "list_devices",
    { description: "List the charge points currently connected to the central system." },
    async () => run("list_devices", () => admin.listDevices()),
  );

  server.registerTool(
    "get_configuration",
    {
      description: "Read configuration keys from a connected charge point.",
      inputSchema: {
        device: z.string().min(1).describe("Identity (serial number) of the charge point"),
        keys: z
          .array(z.string())
          .optional()
          .describe("Keys to read; every key when omitted"),
      },
    },
    async ({ device, keys }) => run("get_configuration", () => admin.getConfiguration(device, keys)),
  );

  server.registerTool(
    "change_configuration",
    {
      description: "Change one configuration key on a connected charge point.",
      inputSchema: {
        device: z.string().min(1).describe("Identity (serial number) of the charge point"),
        key: z.string().min(1),
        value: z.union([z.string(), z.number().int()]),
      },
    },
    async ({ device, key, value }) =>
      run("change_configuration", () => admin.changeConfiguration(device, key, value)),
  );
}

/** Serves the tools over stdio; stdout belongs to the transport from here on. */
export async function startMcpStdio(options: CentralMcpOptions): Promise<McpServer> {
  const log = options.logger ?? createLogger("mcp");
  const server = createCentralMcpServer({ ...options, logger: log });
  await server.connect(new StdioServerTransport());
  log.info("MCP server ready on stdio");
  return server;
}
