import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { compileDateFormat } from "./documents/dateFormat.js";
import { ConfigurationError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import { DEFAULT_TEMPLATES, type MailTemplates } from "./mail/templates.js";
import type { ScheduleTime, ServerConfig, ServerSecurity } from "./types.js";
import { placeholdersOf } from "./utils/template.js";
import { resolveFrom, resolveFromCwd } from "./utils/fs.js";

type Env = Record<string, string | undefined>;

function unquote(v: string): string {
  const s = v.trim();
  const m1 = s.match(/^["']([\s\S]*)["']$/);
  const v1 = (m1 ? m1[1] : s).trim();
  const m2 = v1.match(/^`([\s\S]*)`$/);
  return (m2 ? m2[1] : v1).trim();
}

function normalizeSecret(v: unknown): unknown {
  return typeof v === "string" ? unquote(v) : v;
}

function parseStringArray(v: unknown): unknown {
  if (Array.isArray(v)) return v.map((x) => String(x).trim()).filter(Boolean);
  if (typeof v !== "string") return v;
  return v
    .split(/[,;\s]+/g)
    .map((x) => x.trim())
    .filter(Boolean);
}

const envSchema = z.object({
  CONFIG_FILE: z.preprocess(normalizeSecret, z.string().min(1)).default("config.yaml"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_FILE: z.string().optional(),
  STATE_DIR: z.preprocess(normalizeSecret, z.string().min(1)).optional()
});

export type EnvConfig = z.infer<typeof envSchema>;

const serverSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  security: z.enum(["ssl", "tls", "none"]).optional(),
  use_ssl: z.boolean().optional(),
  use_tls: z.boolean().optional(),
  user: z.string().min(1).optional(),
  password: z.preprocess(normalizeSecret, z.string()).optional(),
  password_env: z.string().min(1).optional(),
  sender_name: z.string().min(1).default("证件管理系统"),
  sender_address: z.string().email().optional()
});

const scheduleTimePattern = /^([01]?\d|2[0-3]):([0-5]\d)$/;

const fileSchema = z.object({
  data_file: z.string().min(1).default("data/人员证件信息.csv"),
  date_format: z.string().min(1).default("DD/MM/YYYY"),
  state_dir: z.string().min(1).default("data/state"),
  recipients: z.preprocess(parseStringArray, z.array(z.string().email()).min(1, "至少需要一个收件人")),
  smtp: z.object({
    max_attempts_per_server: z.coerce.number().int().min(1).max(10).default(3),
    attempt_timeout_ms: z.coerce.number().int().min(0).default(60_000),
    retry_delay_ms: z.coerce.number().int().min(0).max(600_000).default(2_000),
    connection_timeout_ms: z.coerce.number().int().min(1).default(10_000),
    greeting_timeout_ms: z.coerce.number().int().min(1).default(10_000),
    socket_timeout_ms: z.coerce.number().int().min(1).default(30_000),
    servers: z.array(serverSchema).min(1, "至少需要配置一个 SMTP 服务器")
  }),
  reminder: z
    .object({
      days_before_expiry: z.array(z.number().int().min(0, "提醒天数不能为负数")).min(1).default([60, 30, 10, 7, 1]),
      schedule_time: z.string().regex(scheduleTimePattern, "格式应为 HH:MM").default("21:00")
    })
    .default({}),
  report: z
    .object({
      output_dir: z.string().min(1).default("reports"),
      output_filename: z.string().min(1).default("证件状态报告_{date}.csv"),
      days_until_expiring_threshold: z.coerce.number().int().min(0, "即将过期阈值不能为负数").default(30),
      date_format: z.string().min(1).default("YYYY-MM-DD")
    })
    .default({}),
  mail_template: z
    .object({
      subject: z.string().min(1).default(DEFAULT_TEMPLATES.subject),
      body_html: z.string().min(1).default(DEFAULT_TEMPLATES.bodyHtml),
      table_row_html: z.string().min(1).default(DEFAULT_TEMPLATES.tableRowHtml)
    })
    .default({})
});

type FileConfig = z.infer<typeof fileSchema>;

export type SmtpSettings = {
  maxAttemptsPerServer: number;
  attemptTimeoutMs: number;
  retryDelayMs: number;
  connectionTimeoutMs: number;
  greetingTimeoutMs: number;
  socketTimeoutMs: number;
  servers: ServerConfig[];
};

export type AppConfig = {
  configFile: string;
  dataFile: string;
  dateFormat: string;
  stateDir: string;
  recipients: string[];
  smtp: SmtpSettings;
  reminder: { offsets: number[]; scheduleTime: ScheduleTime };
  report: { outputDir: string; outputFilename: string; threshold: number; dateFormat: string };
  templates: MailTemplates;
  /** Non-fatal findings, logged by the caller. */
  warnings: string[];
};

export function loadEnv(env: Env = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}

export function parseScheduleTime(text: string): ScheduleTime {
  const m = text.trim().match(scheduleTimePattern);
  if (!m) throw new ConfigurationError(`reminder.schedule_time: 无效的时间 ${text}`);
  return { hour: Number(m[1]), minute: Number(m[2]) };
}

function securityOf(s: z.infer<typeof serverSchema>): ServerSecurity {
  if (s.security) return s.security;
  if (s.use_ssl === false) return s.use_tls ? "tls" : "none";
  return "ssl";
}

function buildServers(data: FileConfig, env: Env, issues: string[], warnings: string[]): ServerConfig[] {
  return data.smtp.servers.map((s, i) => {
    const at = `smtp.servers.${i}`;
    let password = s.password;
    if (!password && s.password_env) {
      password = unquote(env[s.password_env] ?? "");
      if (!password) warnings.push(`${at}.password_env: 环境变量 ${s.password_env} 未设置，服务器 ${s.name} 将无法认证`);
    }
    const senderAddress = s.sender_address ?? s.user;
    if (!senderAddress) issues.push(`${at}.sender_address: 未设置发件地址，且 user 为空`);
    return {
      name: s.name,
      host: s.host,
      port: s.port,
      security: securityOf(s),
      user: s.user,
      password: password || undefined,
      senderName: s.sender_name,
      senderAddress: senderAddress ?? ""
    };
  });
}

/** Validate an already-parsed YAML document. Paths resolve against `baseDir`. */
export function parseConfig(raw: unknown, opts: { baseDir: string; env?: Env; configFile?: string }): AppConfig {
  const env = opts.env ?? process.env;
  const parsed = fileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const data = parsed.data;
  const issues: string[] = [];
  const warnings: string[] = [];

  for (const [key, value] of [
    ["date_format", data.date_format],
    ["report.date_format", data.report.date_format]
  ] as const) {
    try {
      compileDateFormat(value);
    } catch (err) {
      issues.push(err instanceof ConfigurationError ? `${key}: ${err.issues.join("; ")}` : `${key}: ${String(err)}`);
    }
  }

  const names = data.smtp.servers.map((s) => s.name);
  const dupes = names.filter((n, i) => names.indexOf(n) !== i);
  if (dupes.length) issues.push(`smtp.servers: 服务器名称重复 ${[...new Set(dupes)].join(", ")}`);

  const servers = buildServers(data, env, issues, warnings);
  if (issues.length) throw new ConfigurationError(issues);

  if (!placeholdersOf(data.mail_template.body_html).includes("table_rows")) {
    warnings.push("mail_template.body_html: 缺少 {table_rows} 占位符，提醒邮件中将不包含证件列表");
  }

  const envStateDir = (env.STATE_DIR ?? "").trim();
  return {
    configFile: opts.configFile ?? path.join(opts.baseDir, "config.yaml"),
    dataFile: resolveFrom(opts.baseDir, data.data_file),
    dateFormat: data.date_format,
    stateDir: envStateDir ? resolveFromCwd(envStateDir) : resolveFrom(opts.baseDir, data.state_dir),
    recipients: data.recipients,
    smtp: {
      maxAttemptsPerServer: data.smtp.max_attempts_per_server,
      attemptTimeoutMs: data.smtp.attempt_timeout_ms,
      retryDelayMs: data.smtp.retry_delay_ms,
      connectionTimeoutMs: data.smtp.connection_timeout_ms,
      greetingTimeoutMs: data.smtp.greeting_timeout_ms,
      socketTimeoutMs: data.smtp.socket_timeout_ms,
      servers
    },
    reminder: {
      offsets: [...new Set(data.reminder.days_before_expiry)].sort((a, b) => b - a),
      scheduleTime: parseScheduleTime(data.reminder.schedule_time)
    },
    report: {
      outputDir: resolveFrom(opts.baseDir, data.report.output_dir),
      outputFilename: data.report.output_filename,
      threshold: data.report.days_until_expiring_threshold,
      dateFormat: data.report.date_format
    },
    templates: {
      subject: data.mail_template.subject,
      bodyHtml: data.mail_template.body_html,
      tableRowHtml: data.mail_template.table_row_html
    },
    warnings
  };
}

export function loadConfig(opts: { configFile?: string; env?: Env } = {}): AppConfig {
  const env = opts.env ?? process.env;
  const envConfig = loadEnv(env);
  const configFile = resolveFromCwd(opts.configFile ?? envConfig.CONFIG_FILE);
  if (!fs.existsSync(configFile)) {
    throw new ConfigurationError(`CONFIG_FILE: 配置文件不存在 ${configFile}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(configFile, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${configFile}: YAML 格式错误 ${msg}`);
  }
  return parseConfig(raw, { baseDir: path.dirname(configFile), env, configFile });
}
