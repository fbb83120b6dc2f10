import { schedulerLogger, type Logger } from "../logger.js";
import type { RunMode, ScheduleTime } from "../types.js";
import type { RunStateStore } from "./runStateStore.js";

export type Clock = () => Date;

export type CoordinatorOutcome<T> =
  | { kind: "ran"; mode: RunMode; startedAt: Date; result: T }
  | { kind: "skipped"; mode: RunMode; lastSuccess: Date; boundary: Date };

/** Latest scheduled run time at or before `now`. */
export function mostRecentBoundary(now: Date, scheduleTime: ScheduleTime): Date {
  const boundary = new Date(now.getTime());
  boundary.setHours(scheduleTime.hour, scheduleTime.minute, 0, 0);
  if (boundary.getTime() > now.getTime()) boundary.setDate(boundary.getDate() - 1);
  return boundary;
}

export function needsCatchup(lastSuccess: Date | null, now: Date, scheduleTime: ScheduleTime): boolean {
  if (!lastSuccess) return true;
  return lastSuccess.getTime() < mostRecentBoundary(now, scheduleTime).getTime();
}

export class ScheduleCoordinator<T> {
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      store: RunStateStore;
      clock: Clock;
      pipeline: () => Promise<T>;
      scheduleTime: ScheduleTime;
      logger?: Logger;
    }
  ) {
    this.log = deps.logger ?? schedulerLogger;
  }

  async runMode(mode: RunMode): Promise<CoordinatorOutcome<T>> {
    const startedAt = this.deps.clock();

    if (mode === "catchup") {
      const lastSuccess = this.deps.store.readLastSuccess();
      const boundary = mostRecentBoundary(startedAt, this.deps.scheduleTime);
      if (lastSuccess && !needsCatchup(lastSuccess, startedAt, this.deps.scheduleTime)) {
        this.log.info(
          { lastSuccess: lastSuccess.toISOString(), boundary: boundary.toISOString() },
          "Last scheduled run succeeded, catch-up skipped"
        );
        return { kind: "skipped", mode, lastSuccess, boundary };
      }
      this.log.info(
        { lastSuccess: lastSuccess?.toISOString() ?? null, boundary: boundary.toISOString() },
        "Scheduled run missed, catching up"
      );
    }

    const result = await this.deps.pipeline();
    this.deps.store.writeLastSuccess(startedAt);
    this.log.info({ mode, startedAt: startedAt.toISOString() }, "Run succeeded, state saved");
    return { kind: "ran", mode, startedAt, result };
  }
}
