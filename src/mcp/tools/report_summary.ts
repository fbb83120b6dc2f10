import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppConfig } from "../../config.js";
import { statusCounts } from "../../report/statusReport.js";
import { formatReportSummary } from "./format.js";
import { errorResult, readSnapshot, referenceDateOf, textResult } from "./helpers.js";

export function registerReportSummaryTool(server: McpServer, deps: { config: AppConfig; now: () => Date }): void {
  server.registerTool(
    "report_summary",
    {
      title: "Report Summary",
      description: "统计各状态证件数量，并列出被跳过的数据行",
      inputSchema: {}
    },
    async () => {
      try {
        const { loaded } = readSnapshot(deps.config, referenceDateOf(undefined, deps.now()));
        return textResult(formatReportSummary(statusCounts(loaded.records), loaded.skipped));
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
