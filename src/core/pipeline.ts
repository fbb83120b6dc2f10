import type { AppConfig } from "../config.js";
import { calendarDateOf } from "../documents/dateFormat.js";
import { loadDocuments } from "../documents/csvLoader.js";
import { DeliveryFailedError } from "../errors.js";
import { documentsLogger, reportLogger, type Logger } from "../logger.js";
import { composeReminderMail, composeTestMail } from "../mail/composer.js";
import { deliverWithFailover } from "../mail/failover.js";
import { createSmtpTransport, type TransportFactory } from "../mail/smtpTransport.js";
import { projectReport, resolveReportPath, statusCounts, writeReport } from "../report/statusReport.js";
import type { DeliveryResult, DocumentStatus, EvaluationContext, MailMessage } from "../types.js";
import { resolveFromCwd } from "../utils/fs.js";
import { selectReminderBatch, summarizeBatch } from "./reminderRules.js";

export type SentDelivery = Extract<DeliveryResult, { ok: true }>;

export type ReminderOutcome =
  | { kind: "nothing_to_send"; records: number; skipped: number }
  | { kind: "sent"; records: number; skipped: number; count: number; delivery: SentDelivery };

export type ReportOutcome = {
  filePath: string;
  rows: number;
  counts: Record<DocumentStatus, number>;
  skipped: number;
};

export type PipelineDeps = {
  config: AppConfig;
  now: Date;
  transportFactory?: TransportFactory;
  logger?: Logger;
};

export function evaluationContextFor(config: AppConfig, now: Date): EvaluationContext {
  return {
    referenceDate: calendarDateOf(now),
    threshold: config.report.threshold,
    offsets: config.reminder.offsets,
    dateFormat: config.dateFormat
  };
}

export function defaultTransportFactory(config: AppConfig): TransportFactory {
  const timeouts = {
    connectionTimeoutMs: config.smtp.connectionTimeoutMs,
    greetingTimeoutMs: config.smtp.greetingTimeoutMs,
    socketTimeoutMs: config.smtp.socketTimeoutMs
  };
  return (server) => createSmtpTransport(server, timeouts);
}

async function deliver(message: MailMessage, deps: PipelineDeps): Promise<SentDelivery> {
  const { config } = deps;
  const result = await deliverWithFailover(message, config.smtp.servers, config.recipients, {
    transportFactory: deps.transportFactory ?? defaultTransportFactory(config),
    maxAttemptsPerServer: config.smtp.maxAttemptsPerServer,
    attemptTimeoutMs: config.smtp.attemptTimeoutMs || undefined,
    retryDelayMs: config.smtp.retryDelayMs,
    logger: deps.logger
  });
  if (!result.ok) throw new DeliveryFailedError(result.history);
  return result;
}

/** Load, select, compose and send today's reminder. Total delivery failure throws. */
export async function runReminderPipeline(deps: PipelineDeps): Promise<ReminderOutcome> {
  const { config, now } = deps;
  const log = deps.logger ?? documentsLogger;
  const ctx = evaluationContextFor(config, now);
  const loaded = loadDocuments(config.dataFile, ctx, log);

  const batch = selectReminderBatch(loaded.records);
  const mail = composeReminderMail(batch, config.templates, ctx.referenceDate, config.report.dateFormat);
  if (mail.kind === "empty") {
    log.info({ records: loaded.records.length }, "No documents need a reminder today");
    return { kind: "nothing_to_send", records: loaded.records.length, skipped: loaded.skipped.length };
  }

  const summary = summarizeBatch(batch);
  log.info({ count: summary.totalCount, byDaysLeft: summary.byDaysLeft }, "Reminder batch selected");

  const delivery = await deliver({ subject: mail.subject, html: mail.html }, deps);
  return {
    kind: "sent",
    records: loaded.records.length,
    skipped: loaded.skipped.length,
    count: mail.count,
    delivery
  };
}

export function runReportPipeline(deps: Omit<PipelineDeps, "transportFactory"> & { output?: string }): ReportOutcome {
  const { config, now } = deps;
  const log = deps.logger ?? reportLogger;
  const ctx = evaluationContextFor(config, now);
  const loaded = loadDocuments(config.dataFile, ctx, log);

  const rows = projectReport(loaded.records, config.report.dateFormat);
  const filePath = deps.output
    ? resolveFromCwd(deps.output)
    : resolveReportPath(config.report.outputDir, config.report.outputFilename, ctx.referenceDate);
  writeReport(filePath, rows);

  const counts = statusCounts(loaded.records);
  if (loaded.skipped.length) log.warn({ skipped: loaded.skipped.length }, "Rows left out of the report");
  log.info({ filePath, rows: rows.length, ...counts }, "Report written");
  return { filePath, rows: rows.length, counts, skipped: loaded.skipped.length };
}

export async function runTestEmail(deps: PipelineDeps): Promise<SentDelivery> {
  return deliver(composeTestMail(deps.now), deps);
}
