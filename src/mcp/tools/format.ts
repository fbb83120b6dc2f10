import { daysLeftLabel } from "../../core/reminderRules.js";
import { formatDate, isoDate } from "../../documents/dateFormat.js";
import { STATUSES, STATUS_LABELS } from "../../report/statusReport.js";
import type { CalendarDate, DocumentRecord, DocumentStatus, ReminderBatch, SkippedRow } from "../../types.js";

export type StatusFilter = { person?: string; status?: DocumentStatus };

export function formatRecordLine(r: DocumentRecord, dateDisplayFormat = "YYYY-MM-DD"): string {
  const remarks = r.remarks ? ` 备注：${r.remarks}` : "";
  return `${r.personName} ${r.documentType} 到期 ${formatDate(r.expiryDate, dateDisplayFormat)}（${daysLeftLabel(r.daysLeft)}，${STATUS_LABELS[r.status]}）${remarks}`;
}

export function filterRecords(records: readonly DocumentRecord[], filter: StatusFilter): DocumentRecord[] {
  const person = (filter.person ?? "").trim();
  return records.filter((r) => (!person || r.personName === person) && (!filter.status || r.status === filter.status));
}

export function formatDocumentStatus(
  records: readonly DocumentRecord[],
  filter: StatusFilter,
  opts: { limit?: number; dateDisplayFormat?: string } = {}
): string {
  const hits = filterRecords(records, filter).sort((a, b) => a.daysLeft - b.daysLeft);
  if (!hits.length) return "未找到符合条件的证件";
  const limit = opts.limit ?? 20;
  const lines = hits.slice(0, limit).map((r, i) => `${i + 1}. ${formatRecordLine(r, opts.dateDisplayFormat)}`);
  const more = hits.length > limit ? `\n…另有 ${hits.length - limit} 条未显示` : "";
  return `共 ${hits.length} 条：\n${lines.join("\n")}${more}`;
}

export function formatReminderPreview(batch: ReminderBatch, today: CalendarDate, dateDisplayFormat = "YYYY-MM-DD"): string {
  if (!batch.length) return `${isoDate(today)} 无需提醒的证件`;
  const lines = batch.map((r, i) => `${i + 1}. ${formatRecordLine(r, dateDisplayFormat)}`);
  return `${isoDate(today)} 需提醒 ${batch.length} 个证件：\n${lines.join("\n")}`;
}

export function formatReportSummary(counts: Record<DocumentStatus, number>, skipped: readonly SkippedRow[]): string {
  const total = STATUSES.reduce((n, s) => n + counts[s], 0);
  const parts = STATUSES.map((s) => `${STATUS_LABELS[s]} ${counts[s]}`).join("，");
  const head = `证件总数 ${total}：${parts}`;
  if (!skipped.length) return head;
  const lines = skipped.map((s) => `  第 ${s.row} 行：${s.reason}`);
  return `${head}\n跳过 ${skipped.length} 行：\n${lines.join("\n")}`;
}
