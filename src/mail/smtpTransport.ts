import nodemailer from "nodemailer";
import type { MailMessage, ServerConfig, TransportStage } from "../types.js";
import { errorCode } from "../utils/async.js";

export type OutgoingMail = MailMessage & { to: readonly string[] };

export type SendReceipt = { messageId?: string };

export interface MailTransport {
  send(mail: OutgoingMail): Promise<SendReceipt>;
  verify(): Promise<void>;
  close(): void;
}

export type TransportFactory = (server: ServerConfig) => MailTransport;

export type SmtpTimeouts = {
  connectionTimeoutMs: number;
  greetingTimeoutMs: number;
  socketTimeoutMs: number;
};

export const DEFAULT_SMTP_TIMEOUTS: SmtpTimeouts = {
  connectionTimeoutMs: 10_000,
  greetingTimeoutMs: 10_000,
  socketTimeoutMs: 30_000
};

export function smtpOptionsFor(server: ServerConfig, timeouts: SmtpTimeouts = DEFAULT_SMTP_TIMEOUTS) {
  return {
    host: server.host,
    port: server.port,
    secure: server.security === "ssl",
    requireTLS: server.security === "tls",
    ignoreTLS: server.security === "none",
    auth: server.user ? { user: server.user, pass: server.password ?? "" } : undefined,
    connectionTimeout: timeouts.connectionTimeoutMs,
    greetingTimeout: timeouts.greetingTimeoutMs,
    socketTimeout: timeouts.socketTimeoutMs
  };
}

/** One transporter per attempt; the caller closes it. */
export function createSmtpTransport(server: ServerConfig, timeouts: SmtpTimeouts = DEFAULT_SMTP_TIMEOUTS): MailTransport {
  const transporter = nodemailer.createTransport(smtpOptionsFor(server, timeouts));
  return {
    async send(mail) {
      const info = await transporter.sendMail({
        from: { name: server.senderName, address: server.senderAddress },
        to: mail.to.join(", "),
        subject: mail.subject,
        html: mail.html
      });
      return { messageId: info.messageId };
    },
    async verify() {
      await transporter.verify();
    },
    close() {
      transporter.close();
    }
  };
}

const STAGE_BY_CODE: Record<string, TransportStage> = {
  ECONNECTION: "connect",
  ESOCKET: "connect",
  EDNS: "connect",
  ETLS: "connect",
  ECONNREFUSED: "connect",
  ECONNRESET: "connect",
  ENOTFOUND: "connect",
  EAUTH: "auth",
  ENOAUTH: "auth",
  ETIMEDOUT: "timeout",
  EENVELOPE: "recipient",
  EMESSAGE: "message",
  ESTREAM: "message"
};

/** Map a nodemailer / socket error code to the protocol stage that failed. */
export function classifyTransportError(err: unknown): TransportStage {
  const code = errorCode(err);
  if (!code) return "unknown";
  return STAGE_BY_CODE[code] ?? "unknown";
}
