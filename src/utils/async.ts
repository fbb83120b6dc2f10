export type TimeoutError = Error & { code?: string };

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number | undefined, label: string): Promise<T> {
  const ms = Number(timeoutMs);
  if (!Number.isFinite(ms) || ms <= 0) return promise;
  let timer: NodeJS.Timeout | undefined;
  const timeout: TimeoutError = new Error(`${label} timed out after ${ms}ms`);
  timeout.code = "ETIMEDOUT";
  return Promise.race([
    promise.finally(() => {
      if (timer) clearTimeout(timer);
    }),
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(timeout), ms);
    })
  ]);
}

export async function sleep(ms: number): Promise<void> {
  if (!(ms > 0)) return;
  await new Promise((r) => setTimeout(r, ms));
}

export function errorMessage(e: unknown): string {
  if (!e) return "unknown error";
  if (e instanceof Error) return e.message || String(e);
  return String(e);
}

export function errorCode(e: unknown): string | undefined {
  if (!e || typeof e !== "object" || !("code" in e)) return undefined;
  const code = e.code;
  return typeof code === "string" ? code : undefined;
}

export type Settled<T> = { ok: true; value: T; late: boolean } | { ok: false; error: unknown; late: boolean };

/**
 * Wait for `promise` to settle. Past `timeoutMs`, `onLate` fires once and the wait
 * continues; the result is flagged `late`. Nothing is abandoned while still running.
 */
export async function settleWithDeadline<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  onLate: () => void
): Promise<Settled<T>> {
  const settled = promise.then(
    (value) => ({ ok: true as const, value }),
    (error: unknown) => ({ ok: false as const, error })
  );
  const ms = Number(timeoutMs);
  if (!Number.isFinite(ms) || ms <= 0) return { ...(await settled), late: false };

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"late">((resolve) => {
    timer = setTimeout(() => resolve("late"), ms);
  });
  const first = await Promise.race([settled, deadline]);
  if (timer) clearTimeout(timer);
  if (first !== "late") return { ...first, late: false };

  onLate();
  return { ...(await settled), late: true };
}
