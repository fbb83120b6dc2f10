import { ConfigurationError, TransportError } from "../errors.js";
import { mailLogger, type Logger } from "../logger.js";
import type { DeliveryAttempt, DeliveryResult, MailMessage, ServerConfig } from "../types.js";
import { errorMessage, settleWithDeadline, sleep, type Settled } from "../utils/async.js";
import { classifyTransportError, type SendReceipt, type TransportFactory } from "./smtpTransport.js";

export const DEFAULT_MAX_ATTEMPTS_PER_SERVER = 3;

/** Success leaves the loop directly, so only the in-flight and exhausted states are modelled. */
export type FailoverState = { stage: "connecting"; serverIndex: number; attempt: number } | { stage: "all_failed" };

export type DeliveryOptions = {
  transportFactory: TransportFactory;
  maxAttemptsPerServer?: number;
  /** Past this, a still-running send is logged and awaited, never abandoned. */
  attemptTimeoutMs?: number;
  /** Pause before retrying the same server. Switching servers does not wait. */
  retryDelayMs?: number;
  logger?: Logger;
  nowMs?: () => number;
};

export function startState(serverCount: number): FailoverState {
  return serverCount > 0 ? { stage: "connecting", serverIndex: 0, attempt: 1 } : { stage: "all_failed" };
}

export function nextAfterFailure(
  current: { serverIndex: number; attempt: number },
  serverCount: number,
  maxAttemptsPerServer: number
): FailoverState {
  if (current.attempt < maxAttemptsPerServer) {
    return { stage: "connecting", serverIndex: current.serverIndex, attempt: current.attempt + 1 };
  }
  if (current.serverIndex + 1 < serverCount) {
    return { stage: "connecting", serverIndex: current.serverIndex + 1, attempt: 1 };
  }
  return { stage: "all_failed" };
}

function toTransportError(server: string, err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  return new TransportError(server, classifyTransportError(err), errorMessage(err), { cause: err });
}

/**
 * Send one message through an ordered server list. Each server gets up to
 * `maxAttemptsPerServer` tries before the next one; the first success ends the run.
 */
export async function deliverWithFailover(
  message: MailMessage,
  servers: readonly ServerConfig[],
  recipients: readonly string[],
  options: DeliveryOptions
): Promise<DeliveryResult> {
  if (!recipients.length) throw new ConfigurationError("recipients: 收件人列表为空");

  const log = options.logger ?? mailLogger;
  const nowMs = options.nowMs ?? Date.now;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttemptsPerServer ?? DEFAULT_MAX_ATTEMPTS_PER_SERVER));
  const history: DeliveryAttempt[] = [];

  let state = startState(servers.length);

  while (state.stage === "connecting") {
    const { serverIndex, attempt } = state;
    const server = servers[serverIndex];
    log.info({ server: server.name, host: server.host, port: server.port, attempt, maxAttempts }, "SMTP attempt");

    let outcome: Settled<SendReceipt>;
    try {
      const transport = options.transportFactory(server);
      try {
        // A send past the deadline is still awaited: starting the next attempt while it
        // runs could deliver the message twice.
        outcome = await settleWithDeadline(transport.send({ ...message, to: recipients }), options.attemptTimeoutMs, () =>
          log.warn(
            { server: server.name, attempt, timeoutMs: options.attemptTimeoutMs },
            "SMTP attempt over time, waiting for it to settle"
          )
        );
      } finally {
        transport.close();
      }
    } catch (err) {
      outcome = { ok: false, error: err, late: false };
    }

    if (outcome.ok) {
      const receipt = outcome.value;
      history.push({ server: server.name, attempt, ok: true, atMs: nowMs() });
      log.info(
        { server: server.name, attempt, messageId: receipt.messageId, recipients: recipients.length, late: outcome.late },
        "Mail sent"
      );
      return {
        ok: true,
        server: server.name,
        attempt,
        attempts: history.length,
        messageId: receipt.messageId,
        history
      };
    }

    const failure = outcome.late
      ? new TransportError(server.name, "timeout", `超时 ${options.attemptTimeoutMs}ms 后失败：${errorMessage(outcome.error)}`, {
          cause: outcome.error
        })
      : toTransportError(server.name, outcome.error);
    history.push({ server: server.name, attempt, ok: false, stage: failure.stage, error: failure.message, atMs: nowMs() });
    log.warn({ server: server.name, attempt, maxAttempts, stage: failure.stage, err: failure.message }, "SMTP attempt failed");

    state = nextAfterFailure({ serverIndex, attempt }, servers.length, maxAttempts);
    if (state.stage === "connecting" && state.serverIndex === serverIndex) {
      await sleep(options.retryDelayMs ?? 0);
    }
  }

  log.error(
    { servers: servers.map((s) => s.name), attempts: history.length },
    "All SMTP servers failed"
  );
  return { ok: false, attempts: history.length, history };
}
