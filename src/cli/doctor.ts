import type { AppConfig } from "../config.js";
import { evaluateDocuments, parseDocumentCsv } from "../documents/csvLoader.js";
import { mailLogger } from "../logger.js";
import type { TransportFactory } from "../mail/smtpTransport.js";
import { printError, printStatusCounts } from "../observability/console.js";
import { evaluationContextFor } from "../core/pipeline.js";
import { statusCounts } from "../report/statusReport.js";
import type { ServerConfig } from "../types.js";
import { errorMessage, withTimeout } from "../utils/async.js";
import { readTextIfExists } from "../utils/fs.js";

type CheckResult = { server: string; ok: boolean; detail: string };

export async function checkServers(
  servers: readonly ServerConfig[],
  transportFactory: TransportFactory,
  timeoutMs?: number
): Promise<CheckResult[]> {
  const out: CheckResult[] = [];
  for (const server of servers) {
    try {
      const transport = transportFactory(server);
      try {
        await withTimeout(transport.verify(), timeoutMs, `SMTP ${server.name}`);
        out.push({ server: server.name, ok: true, detail: "connected" });
      } finally {
        transport.close();
      }
    } catch (err) {
      mailLogger.warn({ server: server.name, err: errorMessage(err) }, "SMTP verify failed");
      out.push({ server: server.name, ok: false, detail: errorMessage(err) });
    }
  }
  return out;
}

function printConfig(config: AppConfig): void {
  console.log("配置:");
  console.log("  配置文件   =", config.configFile);
  console.log("  数据文件   =", config.dataFile);
  console.log("  日期格式   =", config.dateFormat);
  console.log("  状态目录   =", config.stateDir);
  console.log("  收件人     =", config.recipients.join(", "));
  console.log("  提醒天数   =", config.reminder.offsets.join(", "));
  const { hour, minute } = config.reminder.scheduleTime;
  console.log("  定时       =", `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`);
  console.log("  即将过期   =", `${config.report.threshold} 天内`);
  console.log("SMTP 服务器:");
  config.smtp.servers.forEach((s, i) => {
    const auth = s.user ? `${s.user} / 密码${s.password ? "已设置" : "未设置"}` : "无认证";
    console.log(`  ${i + 1}. ${s.name} ${s.host}:${s.port} ${s.security} ${auth}`);
  });
  console.log("");
}

function checkData(config: AppConfig, now: Date): boolean {
  const text = readTextIfExists(config.dataFile);
  if (text === null) {
    console.log(`数据文件不存在：${config.dataFile}（可运行 sample 命令生成示例）`);
    return false;
  }
  try {
    const loaded = evaluateDocuments(parseDocumentCsv(text, config.dataFile), evaluationContextFor(config, now));
    printStatusCounts(statusCounts(loaded.records), loaded.skipped.length);
    for (const s of loaded.skipped) console.log(`  第 ${s.row} 行：${s.reason}`);
    return true;
  } catch (err) {
    printError("数据文件", err);
    return false;
  }
}

/** Exit code 0 when the data file loads and at least one server answers. */
export async function runDoctor(
  config: AppConfig,
  deps: { transportFactory: TransportFactory; now: Date }
): Promise<number> {
  printConfig(config);
  for (const w of config.warnings) console.log(`WARN ${w}`);

  const dataOk = checkData(config, deps.now);
  console.log("");

  const results = await checkServers(config.smtp.servers, deps.transportFactory, config.smtp.attemptTimeoutMs || undefined);
  console.log("连通性检测:");
  for (const r of results) console.log(`  ${r.server}:`, r.ok ? "OK" : "FAIL", "-", r.detail);
  console.log("");

  const anyServer = results.some((r) => r.ok);
  if (!anyServer) console.log("所有 SMTP 服务器均无法连接，请检查主机、端口、加密方式与账号密码。");
  return dataOk && anyServer ? 0 : 1;
}
