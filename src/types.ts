export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

export type DocumentStatus = "expired" | "expiring_soon" | "valid";

export type RemarkState = "processed" | "in_progress" | "none";

/** One CSV data row, keyed by header name, before validation. */
export type RawDocumentRow = {
  row: number;
  personName: string;
  documentType: string;
  startDate: string;
  expiryDate: string;
  remarks: string;
};

export type DocumentRecord = {
  readonly row: number;
  readonly personName: string;
  readonly documentType: string;
  readonly startDate?: CalendarDate;
  readonly expiryDate: CalendarDate;
  readonly remarks: string;
  readonly remarkState: RemarkState;
  readonly daysLeft: number;
  readonly status: DocumentStatus;
  readonly needsReminder: boolean;
};

export type SkippedRow = {
  row: number;
  reason: string;
  raw?: string;
};

export type EvaluationContext = {
  referenceDate: CalendarDate;
  threshold: number;
  offsets: readonly number[];
  dateFormat: string;
};

export type ReminderBatch = readonly DocumentRecord[];

export type ServerSecurity = "ssl" | "tls" | "none";

export type ServerConfig = {
  name: string;
  host: string;
  port: number;
  security: ServerSecurity;
  user?: string;
  password?: string;
  senderName: string;
  senderAddress: string;
};

export type MailMessage = {
  subject: string;
  html: string;
};

export type TransportStage = "connect" | "auth" | "timeout" | "recipient" | "message" | "unknown";

export type DeliveryAttempt = {
  server: string;
  attempt: number;
  ok: boolean;
  stage?: TransportStage;
  error?: string;
  atMs: number;
};

export type DeliveryResult =
  | {
      ok: true;
      server: string;
      attempt: number;
      attempts: number;
      messageId?: string;
      history: DeliveryAttempt[];
    }
  | {
      ok: false;
      attempts: number;
      history: DeliveryAttempt[];
    };

export type ScheduleTime = {
  hour: number;
  minute: number;
};

export type RunMode = "run" | "catchup";
