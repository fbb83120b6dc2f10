import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppConfig } from "../../config.js";
import { selectReminderBatch } from "../../core/reminderRules.js";
import { formatReminderPreview } from "./format.js";
import { errorResult, readSnapshot, referenceDateOf, textResult } from "./helpers.js";

export function registerReminderPreviewTool(server: McpServer, deps: { config: AppConfig; now: () => Date }): void {
  server.registerTool(
    "reminder_preview",
    {
      title: "Reminder Preview",
      description: "预览某天（默认今天，格式 YYYY-MM-DD）提醒邮件会包含的证件，不发送邮件",
      inputSchema: { date: z.string().optional() }
    },
    async ({ date }: { date?: string }) => {
      try {
        const { ctx, loaded } = readSnapshot(deps.config, referenceDateOf(date, deps.now()));
        const batch = selectReminderBatch(loaded.records);
        return textResult(formatReminderPreview(batch, ctx.referenceDate, deps.config.report.dateFormat));
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
