import type { DeliveryAttempt, TransportStage } from "./types.js";

/** Missing or malformed configuration; fatal before any send or state write. */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`配置错误:\n${list.join("\n")}`);
    this.name = "ConfigurationError";
    this.issues = list;
  }
}

/** One failed SMTP attempt. Recovered by failover, never fatal on its own. */
export class TransportError extends Error {
  constructor(
    readonly server: string,
    readonly stage: TransportStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** Every server exhausted its attempts. */
export class DeliveryFailedError extends Error {
  constructor(readonly history: DeliveryAttempt[]) {
    const servers = [...new Set(history.map((h) => h.server))];
    super(`邮件发送失败：${servers.length} 个服务器共尝试 ${history.length} 次均未成功`);
    this.name = "DeliveryFailedError";
  }
}
