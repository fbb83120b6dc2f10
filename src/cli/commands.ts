import fs from "node:fs";
import path from "node:path";
import { loadConfig, type AppConfig } from "../config.js";
import { defaultTransportFactory, runReminderPipeline, runReportPipeline, runTestEmail } from "../core/pipeline.js";
import { FileRunStateStore } from "../core/runStateStore.js";
import { ScheduleCoordinator } from "../core/scheduleCoordinator.js";
import { calendarDateOf } from "../documents/dateFormat.js";
import { writeSampleCsv } from "../documents/sampleData.js";
import { ConfigurationError, DeliveryFailedError } from "../errors.js";
import { logger } from "../logger.js";
import type { TransportFactory } from "../mail/smtpTransport.js";
import { printDelivery, printError, printStatusCounts } from "../observability/console.js";
import { projectRootDir, resolveFromCwd } from "../utils/fs.js";
import { USAGE, type CliArgs } from "./args.js";
import { runDoctor } from "./doctor.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CommandContext = {
  now: Date;
  env?: Record<string, string | undefined>;
  transportFactory?: TransportFactory;
};

function load(args: CliArgs, ctx: CommandContext): AppConfig {
  const config = loadConfig({ configFile: args.config, env: ctx.env });
  for (const warning of config.warnings) logger.warn({ configFile: config.configFile, warning }, "Configuration warning");
  return config;
}

function initConfig(args: CliArgs): number {
  const target = resolveFromCwd(args.config ?? "config.yaml");
  if (fs.existsSync(target) && !args.force) {
    console.log(`配置文件已存在：${target}（使用 --force 覆盖）`);
    return EXIT_OK;
  }
  const template = path.join(projectRootDir(), "config.example.yaml");
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.copyFileSync(template, target);
  console.log(`已创建配置文件：${target}`);
  console.log("请修改其中的 SMTP 服务器、收件人与数据文件路径。");
  return EXIT_OK;
}

async function dispatch(args: CliArgs, ctx: CommandContext): Promise<number> {
  if (args.command === "help") {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (args.command === "init-config") return initConfig(args);

  const config = load(args, ctx);
  const transportFactory = ctx.transportFactory ?? defaultTransportFactory(config);
  const deps = { config, now: ctx.now, transportFactory };

  switch (args.command) {
    case "remind": {
      const outcome = await runReminderPipeline(deps);
      if (outcome.kind === "nothing_to_send") {
        console.log(`今日无需提醒的证件（共 ${outcome.records} 条记录）`);
        return EXIT_OK;
      }
      printDelivery(outcome.delivery.history);
      console.log(`已发送提醒邮件：${outcome.count} 个证件，服务器 ${outcome.delivery.server}`);
      return EXIT_OK;
    }
    case "run":
    case "catchup": {
      const coordinator = new ScheduleCoordinator({
        store: new FileRunStateStore(config.stateDir),
        clock: () => ctx.now,
        pipeline: () => runReminderPipeline(deps),
        scheduleTime: config.reminder.scheduleTime
      });
      const outcome = await coordinator.runMode(args.command);
      if (outcome.kind === "skipped") {
        console.log(`上次定时任务已成功（${outcome.lastSuccess.toISOString()}），无需补发`);
        return EXIT_OK;
      }
      const r = outcome.result;
      console.log(r.kind === "sent" ? `已发送提醒邮件：${r.count} 个证件` : "今日无需提醒的证件");
      return EXIT_OK;
    }
    case "report": {
      const outcome = runReportPipeline({ config, now: ctx.now, output: args.output });
      printStatusCounts(outcome.counts, outcome.skipped);
      console.log(`报告已生成：${outcome.filePath}`);
      return EXIT_OK;
    }
    case "test-email": {
      const delivery = await runTestEmail(deps);
      printDelivery(delivery.history);
      console.log(`测试邮件已发送：服务器 ${delivery.server}，收件人 ${config.recipients.join(", ")}`);
      return EXIT_OK;
    }
    case "doctor":
      return runDoctor(config, { transportFactory, now: ctx.now });
    case "sample": {
      const res = writeSampleCsv(config.dataFile, calendarDateOf(ctx.now), config.dateFormat, { overwrite: args.force });
      console.log(
        res.written
          ? `已创建示例数据：${config.dataFile}（${res.rows} 条）`
          : `数据文件已存在：${config.dataFile}（使用 --force 覆盖）`
      );
      return EXIT_OK;
    }
  }
}

/** Run one command and map failures to an exit code. */
export async function runCommand(args: CliArgs, ctx: CommandContext): Promise<number> {
  try {
    return await dispatch(args, ctx);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.error({ issues: err.issues }, "Configuration error");
    } else if (err instanceof DeliveryFailedError) {
      logger.error({ attempts: err.history.length }, "Delivery failed");
    } else {
      logger.error({ err }, "Command failed");
    }
    printError(args.command, err);
    return EXIT_FAILURE;
  }
}
