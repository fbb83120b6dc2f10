import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig, parseConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const baseDir = path.join(os.tmpdir(), "cfg-base");

const primary = { name: "primary", host: "smtp.example.test", port: 465, user: "robot@example.test", password: "test-secret" };

function minimal(extra: Record<string, unknown> = {}, smtp: Record<string, unknown> = {}) {
  return { recipients: ["ops@example.test"], smtp: { servers: [primary], ...smtp }, ...extra };
}

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  return [];
}

test("defaults fill an otherwise minimal file", () => {
  const cfg = parseConfig(minimal(), { baseDir, env: {} });
  assert.equal(cfg.dataFile, path.join(baseDir, "data", "人员证件信息.csv"));
  assert.equal(cfg.dateFormat, "DD/MM/YYYY");
  assert.deepEqual(cfg.reminder.offsets, [60, 30, 10, 7, 1]);
  assert.deepEqual(cfg.reminder.scheduleTime, { hour: 21, minute: 0 });
  assert.equal(cfg.report.threshold, 30);
  assert.equal(cfg.smtp.maxAttemptsPerServer, 3);
  assert.deepEqual(cfg.smtp.servers[0], {
    name: "primary",
    host: "smtp.example.test",
    port: 465,
    security: "ssl",
    user: "robot@example.test",
    password: "test-secret",
    senderName: "证件管理系统",
    senderAddress: "robot@example.test"
  });
  assert.deepEqual(cfg.warnings, []);
});

test("offsets are deduplicated and sorted; recipients accept a delimited string", () => {
  const cfg = parseConfig(minimal({ recipients: "a@example.test; b@example.test", reminder: { days_before_expiry: [1, 30, 7, 30] } }), {
    baseDir,
    env: {}
  });
  assert.deepEqual(cfg.recipients, ["a@example.test", "b@example.test"]);
  assert.deepEqual(cfg.reminder.offsets, [30, 7, 1]);
});

test("passwords come from the environment and legacy ssl/tls flags still work", () => {
  const cfg = parseConfig(
    minimal({}, {
      servers: [
        { name: "a", host: "h", port: 587, use_ssl: false, use_tls: true, user: "u@example.test", password_env: "SMTP_A" },
        { name: "b", host: "h", port: 25, use_ssl: false, user: "u@example.test", password_env: "SMTP_B" }
      ]
    }),
    { baseDir, env: { SMTP_A: '"test-secret"' } }
  );
  assert.deepEqual(
    cfg.smtp.servers.map((s) => [s.security, s.password]),
    [
      ["tls", "test-secret"],
      ["none", undefined]
    ]
  );
  assert.deepEqual(cfg.warnings, ["smtp.servers.1.password_env: 环境变量 SMTP_B 未设置，服务器 b 将无法认证"]);
});

test("invalid values are fatal with one line per problem", () => {
  assert.deepEqual(issuesOf(() => parseConfig(minimal({}, { servers: [] }), { baseDir, env: {} })), [
    "smtp.servers: 至少需要配置一个 SMTP 服务器"
  ]);
  assert.deepEqual(issuesOf(() => parseConfig(minimal({ reminder: { days_before_expiry: [30, -1] } }), { baseDir, env: {} })), [
    "reminder.days_before_expiry.1: 提醒天数不能为负数"
  ]);
  assert.deepEqual(issuesOf(() => parseConfig(minimal({ reminder: { schedule_time: "25:00" } }), { baseDir, env: {} })), [
    "reminder.schedule_time: 格式应为 HH:MM"
  ]);
  assert.deepEqual(issuesOf(() => parseConfig(minimal({ date_format: "DD-MM" }), { baseDir, env: {} })), [
    'date_format: 日期格式 "DD-MM" 必须且只能包含 YYYY、MM、DD 各一次'
  ]);
  assert.deepEqual(issuesOf(() => parseConfig(minimal({}, { servers: [primary, primary] }), { baseDir, env: {} })), [
    "smtp.servers: 服务器名称重复 primary"
  ]);
  assert.equal(issuesOf(() => parseConfig(minimal({ recipients: [] }), { baseDir, env: {} })).length, 1);
});

test("a body without the rows placeholder is only a warning", () => {
  const cfg = parseConfig(minimal({ mail_template: { body_html: "<p>{count}</p>" } }), { baseDir, env: {} });
  assert.deepEqual(cfg.warnings, ["mail_template.body_html: 缺少 {table_rows} 占位符，提醒邮件中将不包含证件列表"]);
});

test("loadConfig reads YAML and resolves paths beside the file", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cfg-"));
  try {
    const file = path.join(dir, "config.yaml");
    fs.writeFileSync(
      file,
      [
        "data_file: data/docs.csv",
        "recipients:",
        "  - ops@example.test",
        "smtp:",
        "  servers:",
        "    - name: primary",
        "      host: smtp.example.test",
        "      port: 465",
        "      user: robot@example.test",
        "      password_env: SMTP_PRIMARY_PASSWORD",
        ""
      ].join("\n"),
      "utf8"
    );
    const cfg = loadConfig({ env: { CONFIG_FILE: file, SMTP_PRIMARY_PASSWORD: "test-secret", STATE_DIR: path.join(dir, "st") } });
    assert.equal(cfg.configFile, file);
    assert.equal(cfg.dataFile, path.join(dir, "data", "docs.csv"));
    assert.equal(cfg.stateDir, path.join(dir, "st"));
    assert.equal(cfg.smtp.servers[0].password, "test-secret");

    fs.writeFileSync(file, "recipients: [unclosed\n", "utf8");
    assert.throws(() => loadConfig({ configFile: file, env: {} }), ConfigurationError);
    assert.throws(() => loadConfig({ configFile: path.join(dir, "missing.yaml"), env: {} }), ConfigurationError);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
