import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppConfig } from "../../config.js";
import type { DocumentStatus } from "../../types.js";
import { formatDocumentStatus } from "./format.js";
import { errorResult, readSnapshot, referenceDateOf, textResult } from "./helpers.js";

export function registerDocumentStatusTool(server: McpServer, deps: { config: AppConfig; now: () => Date }): void {
  server.registerTool(
    "document_status",
    {
      title: "Document Status",
      description: "查询证件有效期状态，可按姓名和状态（expired/expiring_soon/valid）筛选",
      inputSchema: {
        person: z.string().optional(),
        status: z.enum(["expired", "expiring_soon", "valid"]).optional(),
        limit: z.coerce.number().int().min(1).max(100).optional().default(20)
      }
    },
    async ({ person, status, limit }: { person?: string; status?: DocumentStatus; limit: number }) => {
      try {
        const { loaded } = readSnapshot(deps.config, referenceDateOf(undefined, deps.now()));
        return textResult(
          formatDocumentStatus(loaded.records, { person, status }, { limit, dateDisplayFormat: deps.config.report.dateFormat })
        );
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
