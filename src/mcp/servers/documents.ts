import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "../../config.js";
import { registerAllTools } from "../tools/registerAll.js";

const config = loadConfig();

const server = new McpServer({ name: "documents", version: "0.1.0" });
registerAllTools(server, { config });

const transport = new StdioServerTransport();
await server.connect(transport);
