export const COMMANDS = [
  "remind",
  "report",
  "run",
  "catchup",
  "test-email",
  "doctor",
  "sample",
  "init-config",
  "help"
] as const;

export type Command = (typeof COMMANDS)[number];

export type CliArgs = {
  command: Command;
  config?: string;
  output?: string;
  force: boolean;
};

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; error: string };

function isCommand(s: string): s is Command {
  return COMMANDS.some((c) => c === s);
}

const VALUE_FLAGS: Record<string, "config" | "output"> = {
  "--config": "config",
  "-c": "config",
  "--output": "output",
  "-o": "output"
};

export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const args: CliArgs = { command: "remind", force: false };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const eq = token.startsWith("--") ? token.indexOf("=") : -1;
    const flag = eq > 0 ? token.slice(0, eq) : token;

    const key = VALUE_FLAGS[flag];
    if (key) {
      const value = eq > 0 ? token.slice(eq + 1) : argv[++i];
      if (!value || value.startsWith("-")) return { ok: false, error: `${flag} 需要一个参数` };
      args[key] = value;
      continue;
    }
    if (flag === "--force" || flag === "-f") {
      args.force = true;
      continue;
    }
    if (flag === "--help" || flag === "-h") {
      args.command = "help";
      commandSeen = true;
      continue;
    }
    if (token.startsWith("-")) return { ok: false, error: `未知选项 ${token}` };
    if (commandSeen) return { ok: false, error: `多余的参数 ${token}` };
    if (!isCommand(token)) return { ok: false, error: `未知命令 ${token}` };
    args.command = token;
    commandSeen = true;
  }

  if (args.output && args.command !== "report") {
    return { ok: false, error: "--output 只能用于 report 命令" };
  }
  return { ok: true, args };
}

export const USAGE = `人员证件有效期提醒

用法: licence-reminder [命令] [选项]

命令:
  remind        发送今日到期提醒邮件（默认）
  report        生成证件状态报告 CSV
  run           定时执行提醒并记录成功时间
  catchup       若上次定时任务未成功则补发
  test-email    发送测试邮件
  doctor        检查配置与 SMTP 服务器连通性
  sample        生成示例数据文件
  init-config   生成配置文件模板
  help          显示本帮助

选项:
  -c, --config <file>   配置文件路径（默认 CONFIG_FILE 或 config.yaml）
  -o, --output <file>   报告输出路径（仅 report）
  -f, --force           覆盖已存在的文件（sample / init-config）
`;
