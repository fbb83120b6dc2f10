import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { MailTransport } from "../mail/smtpTransport.js";
import type { ServerConfig } from "../types.js";
import { projectRootDir } from "../utils/fs.js";
import { runCommand } from "./commands.js";

const now = new Date(2025, 5, 1, 21, 0, 0);

function workspace() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-"));
  const configFile = path.join(dir, "config.yaml");
  fs.writeFileSync(
    configFile,
    [
      "data_file: docs.csv",
      "date_format: DD/MM/YYYY",
      "recipients: [ops@example.test]",
      "smtp:",
      "  retry_delay_ms: 0",
      "  servers:",
      "    - { name: primary, host: smtp.example.test, port: 465, user: robot@example.test, password: test-secret }",
      ""
    ].join("\n"),
    "utf8"
  );
  return { dir, configFile, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

function fakeSmtp(ok: boolean) {
  let sends = 0;
  const factory = (_s: ServerConfig): MailTransport => ({
    send: async () => {
      sends++;
      if (!ok) throw Object.assign(new Error("refused"), { code: "ECONNECTION" });
      return { messageId: "<id>" };
    },
    verify: async () => {},
    close: () => {}
  });
  return { factory, sends: () => sends };
}

test("help and init-config need no configuration", async (t) => {
  t.mock.method(console, "log", () => {});
  const ws = workspace();
  try {
    assert.equal(await runCommand({ command: "help", force: false }, { now }), 0);

    const target = path.join(ws.dir, "new", "config.yaml");
    assert.equal(await runCommand({ command: "init-config", config: target, force: false }, { now }), 0);
    const template = fs.readFileSync(path.join(projectRootDir(), "config.example.yaml"), "utf8");
    assert.equal(fs.readFileSync(target, "utf8"), template);

    fs.writeFileSync(target, "mine", "utf8");
    assert.equal(await runCommand({ command: "init-config", config: target, force: false }, { now }), 0);
    assert.equal(fs.readFileSync(target, "utf8"), "mine");
  } finally {
    ws.cleanup();
  }
});

test("sample, remind, run and catchup share the config", async (t) => {
  const log = t.mock.method(console, "log", () => {});
  const ws = workspace();
  try {
    const smtp = fakeSmtp(true);
    const ctx = { now, env: {}, transportFactory: smtp.factory };
    const base = { config: ws.configFile, force: false };

    assert.equal(await runCommand({ ...base, command: "sample" }, ctx), 0);
    assert.ok(fs.existsSync(path.join(ws.dir, "docs.csv")));

    assert.equal(await runCommand({ ...base, command: "remind" }, ctx), 0);
    assert.equal(log.mock.calls.at(-1)?.arguments[0], "已发送提醒邮件：3 个证件，服务器 primary");

    assert.equal(await runCommand({ ...base, command: "run" }, ctx), 0);
    const stateFile = path.join(ws.dir, "data", "state", "last_success_iso.txt");
    assert.equal(fs.readFileSync(stateFile, "utf8"), `${now.toISOString()}\n`);

    assert.equal(await runCommand({ ...base, command: "catchup" }, ctx), 0);
    assert.equal(smtp.sends(), 2);
  } finally {
    ws.cleanup();
  }
});

test("configuration and delivery failures exit 1", async (t) => {
  t.mock.method(console, "log", () => {});
  const ws = workspace();
  try {
    const missing = path.join(ws.dir, "absent.yaml");
    assert.equal(await runCommand({ command: "remind", config: missing, force: false }, { now, env: {} }), 1);

    const smtp = fakeSmtp(false);
    const code = await runCommand(
      { command: "test-email", config: ws.configFile, force: false },
      { now, env: {}, transportFactory: smtp.factory }
    );
    assert.equal(code, 1);
    assert.equal(smtp.sends(), 3);
  } finally {
    ws.cleanup();
  }
});
