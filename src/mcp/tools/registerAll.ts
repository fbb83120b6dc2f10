import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppConfig } from "../../config.js";
import { registerDocumentStatusTool } from "./document_status.js";
import { registerReminderPreviewTool } from "./reminder_preview.js";
import { registerReportSummaryTool } from "./report_summary.js";

export function registerAllTools(server: McpServer, deps: { config: AppConfig; now?: () => Date }): void {
  const toolDeps = { config: deps.config, now: deps.now ?? (() => new Date()) };
  registerDocumentStatusTool(server, toolDeps);
  registerReminderPreviewTool(server, toolDeps);
  registerReportSummaryTool(server, toolDeps);
}
