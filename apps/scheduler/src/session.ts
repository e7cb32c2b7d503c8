import { BusyError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import type { BatchReport } from "../../common/src/types.js";

export interface SessionSnapshot {
  busy: boolean;
  cancellationRequested: boolean;
  postsGeneratedToday: number;
  totalPostsGenerated: number;
  lastGenerationAt: Date | null;
  lastReport: BatchReport | null;
}

function localDayKey(date: Date): string {
  return `${date.getFullYear()}-${date.getMonth() + 1}-${date.getDate()}`;
}

export class GenerationSession {
  private busy = false;
  private cancelRequested = false;
  private dayKey: string;
  private postsToday = 0;
  private postsTotal = 0;
  private lastAt: Date | null = null;
  private lastReport: BatchReport | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.dayKey = localDayKey(now());
  }

  get isBusy(): boolean {
    return this.busy;
  }

  get cancellationRequested(): boolean {
    return this.cancelRequested;
  }

  async exclusive<T>(task: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new BusyError();
    }

    this.busy = true;
    this.cancelRequested = false;
    try {
      return await task();
    } finally {
      this.busy = false;
      this.cancelRequested = false;
    }
  }

  cancel(): boolean {
    if (!this.busy) {
      return false;
    }
    this.cancelRequested = true;
    return true;
  }

  recordBatch(report: BatchReport): void {
    const now = this.now();
    const key = localDayKey(now);
    if (key !== this.dayKey) {
      this.dayKey = key;
      this.postsToday = 0;
    }

    this.postsToday += report.succeeded;
    this.postsTotal += report.succeeded;
    this.lastReport = report;
    if (report.succeeded > 0) {
      this.lastAt = now;
    }
  }

  snapshot(): SessionSnapshot {
    if (localDayKey(this.now()) !== this.dayKey) {
      this.dayKey = localDayKey(this.now());
      this.postsToday = 0;
    }

    return {
      busy: this.busy,
      cancellationRequested: this.cancelRequested,
      postsGeneratedToday: this.postsToday,
      totalPostsGenerated: this.postsTotal,
      lastGenerationAt: this.lastAt,
      lastReport: this.lastReport,
    };
  }
}

export function createInterruptHandler(
  session: GenerationSession,
  exit: (code: number) => void,
): () => void {
  return () => {
    if (!session.cancellationRequested && session.cancel()) {
      logger.warn("cancellation requested, stopping after the current post, interrupt again to exit now");
      return;
    }
    exit(130);
  };
}
