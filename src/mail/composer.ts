import { daysLeftLabel, urgencyColor } from "../core/reminderRules.js";
import { calendarDateOf, formatDate, isoDate } from "../documents/dateFormat.js";
import { STATUS_LABELS } from "../report/statusReport.js";
import type { CalendarDate, DocumentRecord, MailMessage, ReminderBatch } from "../types.js";
import { escapeHtml, renderTemplate, type TemplateVars } from "../utils/template.js";
import { TEST_MAIL_HTML, TEST_MAIL_SUBJECT, type MailTemplates } from "./templates.js";

export type ComposedMail = { kind: "empty" } | ({ kind: "message"; count: number } & MailMessage);

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDateTime(at: Date): string {
  return `${isoDate(calendarDateOf(at))} ${pad2(at.getHours())}:${pad2(at.getMinutes())}:${pad2(at.getSeconds())}`;
}

export function rowVariables(record: DocumentRecord, dateDisplayFormat = "YYYY-MM-DD"): TemplateVars {
  return {
    person_name: escapeHtml(record.personName),
    document_type: escapeHtml(record.documentType),
    start_date: record.startDate ? formatDate(record.startDate, dateDisplayFormat) : "",
    expiry_date: formatDate(record.expiryDate, dateDisplayFormat),
    days_left: daysLeftLabel(record.daysLeft),
    days: record.daysLeft,
    status: STATUS_LABELS[record.status],
    remarks: escapeHtml(record.remarks),
    color: urgencyColor(record.daysLeft)
  };
}

export function composeReminderMail(
  batch: ReminderBatch,
  templates: MailTemplates,
  today: CalendarDate,
  dateDisplayFormat = "YYYY-MM-DD"
): ComposedMail {
  if (!batch.length) return { kind: "empty" };

  const common: TemplateVars = { count: batch.length, today_date: isoDate(today) };
  const tableRows = batch.map((r) => renderTemplate(templates.tableRowHtml, rowVariables(r, dateDisplayFormat))).join("\n");

  return {
    kind: "message",
    count: batch.length,
    subject: renderTemplate(templates.subject, common),
    html: renderTemplate(templates.bodyHtml, { ...common, table_rows: tableRows })
  };
}

export function composeTestMail(now: Date): MailMessage {
  const vars = { send_time: formatDateTime(now) };
  return { subject: renderTemplate(TEST_MAIL_SUBJECT, vars), html: renderTemplate(TEST_MAIL_HTML, vars) };
}
