import path from "node:path";
import { formatDate } from "../documents/dateFormat.js";
import type { CalendarDate, DocumentRecord, DocumentStatus } from "../types.js";
import { renderCsv } from "../utils/csv.js";
import { atomicWriteText } from "../utils/fs.js";

export const STATUS_LABELS: Record<DocumentStatus, string> = {
  expired: "已过期",
  expiring_soon: "即将过期",
  valid: "有效"
};

export const STATUSES: readonly DocumentStatus[] = ["expired", "expiring_soon", "valid"];

const STATUS_ORDER: Record<DocumentStatus, number> = { expired: 0, expiring_soon: 1, valid: 2 };

export const REPORT_COLUMNS = [
  "person_name",
  "document_type",
  "start_date",
  "expiry_date",
  "days_left",
  "status",
  "remarks"
] as const;

export type ReportRow = {
  personName: string;
  documentType: string;
  startDate: string;
  expiryDate: string;
  daysLeft: number;
  status: DocumentStatus;
  statusLabel: string;
  remarks: string;
};

export function projectReport(records: readonly DocumentRecord[], dateDisplayFormat = "YYYY-MM-DD"): ReportRow[] {
  return records
    .map((r, i) => ({ r, i }))
    .sort(
      (a, b) => STATUS_ORDER[a.r.status] - STATUS_ORDER[b.r.status] || a.r.daysLeft - b.r.daysLeft || a.i - b.i
    )
    .map(({ r }) => ({
      personName: r.personName,
      documentType: r.documentType,
      startDate: r.startDate ? formatDate(r.startDate, dateDisplayFormat) : "",
      expiryDate: formatDate(r.expiryDate, dateDisplayFormat),
      daysLeft: r.daysLeft,
      status: r.status,
      statusLabel: STATUS_LABELS[r.status],
      remarks: r.remarks
    }));
}

export function statusCounts(records: readonly { status: DocumentStatus }[]): Record<DocumentStatus, number> {
  const counts: Record<DocumentStatus, number> = { expired: 0, expiring_soon: 0, valid: 0 };
  for (const r of records) counts[r.status] += 1;
  return counts;
}

export function reportFileName(template: string, date: CalendarDate): string {
  return template.replace(/\{date\}/g, formatDate(date, "YYYYMMDD"));
}

export function resolveReportPath(outputDir: string, template: string, date: CalendarDate): string {
  return path.join(outputDir, reportFileName(template, date));
}

export function renderReportCsv(rows: readonly ReportRow[]): string {
  return renderCsv(
    REPORT_COLUMNS,
    rows.map((r) => [r.personName, r.documentType, r.startDate, r.expiryDate, r.daysLeft, r.statusLabel, r.remarks])
  );
}

export function writeReport(filePath: string, rows: readonly ReportRow[]): void {
  atomicWriteText(filePath, renderReportCsv(rows));
}
