import test from "node:test";
import assert from "node:assert/strict";
import { selectReminderBatch } from "../core/reminderRules.js";
import { buildDocumentRecord } from "../documents/documentRecord.js";
import type { DocumentRecord, EvaluationContext } from "../types.js";
import { composeReminderMail, composeTestMail, formatDateTime } from "./composer.js";
import { DEFAULT_TEMPLATES } from "./templates.js";

const today = { year: 2025, month: 6, day: 1 };
const ctx: EvaluationContext = { referenceDate: today, threshold: 30, offsets: [30, 1], dateFormat: "YYYY-MM-DD" };

function record(personName: string, expiryDate: string, remarks = ""): DocumentRecord {
  const out = buildDocumentRecord({ row: 2, personName, documentType: "护照", startDate: "", expiryDate, remarks }, ctx);
  if (out.kind !== "record") throw new Error(out.skip.reason);
  return out.record;
}

const templates = {
  subject: "{count} due {today_date}",
  bodyHtml: "<table>{table_rows}</table>{count}",
  tableRowHtml: "<tr>{person_name}|{document_type}|{expiry_date}|{days_left}|{days}|{status}|{color}|{remarks}</tr>"
};

test("empty batch composes nothing", () => {
  assert.deepEqual(composeReminderMail([], templates, today), { kind: "empty" });
});

test("rows render in batch order with escaped values", () => {
  const batch = selectReminderBatch([record("李四", "2025-07-01", "办理中"), record("<b>张三</b>", "2025-06-02", "A&B")]);
  const mail = composeReminderMail(batch, templates, today);
  assert.deepEqual(mail, {
    kind: "message",
    count: 2,
    subject: "2 due 2025-06-01",
    html:
      "<table><tr>&lt;b&gt;张三&lt;/b&gt;|护照|2025-06-02|明天到期|1|即将过期|#dc3545|A&amp;B</tr>\n" +
      "<tr>李四|护照|2025-07-01|30 天后到期|30|即将过期|#ffc107|办理中</tr></table>2"
  });
});

test("default subject and display date format", () => {
  const batch = selectReminderBatch([record("李四", "2025-07-01")]);
  const mail = composeReminderMail(batch, DEFAULT_TEMPLATES, today, "DD/MM/YYYY");
  assert.equal(mail.kind, "message");
  if (mail.kind === "message") {
    assert.equal(mail.subject, "证件到期提醒 - 1个证件需要关注 (2025-06-01)");
    assert.ok(mail.html.includes("<td>01/07/2025</td>"));
  }
});

test("test mail carries the send time", () => {
  const now = new Date(2025, 5, 1, 9, 5, 7);
  assert.equal(formatDateTime(now), "2025-06-01 09:05:07");
  assert.equal(composeTestMail(now).subject, "证件管理系统 - 测试邮件 (2025-06-01 09:05:07)");
});
