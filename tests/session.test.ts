import { describe, expect, it, vi } from "vitest";
import { BusyError } from "../apps/common/src/errors.js";
import type { BatchReport } from "../apps/common/src/types.js";
import { GenerationSession, createInterruptHandler } from "../apps/scheduler/src/session.js";

function report(succeeded: number): BatchReport {
  return {
    timestamp: "2026-03-01T12:00:00.000Z",
    site: "mfo",
    requested: succeeded,
    requestedOriginal: succeeded,
    reduced: false,
    succeeded,
    failed: 0,
    storeSaved: 0,
    cancelled: false,
    queueUnavailable: false,
    successfulPosts: [],
    failedPosts: [],
    remainingTopics: 0,
    cacheInvalidation: "not-attempted",
    reportPath: null,
  };
}

describe("GenerationSession", () => {
  it("holds the busy flag only while a task runs", async () => {
    const session = new GenerationSession();
    let busyInside = false;

    await session.exclusive(async () => {
      busyInside = session.isBusy;
    });

    expect(busyInside).toBe(true);
    expect(session.isBusy).toBe(false);
  });

  it("releases the busy flag when the task throws", async () => {
    const session = new GenerationSession();

    await expect(
      session.exclusive(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(session.isBusy).toBe(false);
  });

  it("rejects nested runs", async () => {
    const session = new GenerationSession();
    await expect(
      session.exclusive(() => session.exclusive(async () => "inner")),
    ).rejects.toBeInstanceOf(BusyError);
  });

  it("only accepts cancellation while busy", async () => {
    const session = new GenerationSession();
    expect(session.cancel()).toBe(false);

    await session.exclusive(async () => {
      expect(session.cancel()).toBe(true);
      expect(session.cancellationRequested).toBe(true);
    });
    expect(session.cancellationRequested).toBe(false);
  });

  it("counts posts per local day and in total", () => {
    let now = new Date(2026, 2, 1, 12, 0, 0);
    const session = new GenerationSession(() => now);

    session.recordBatch(report(2));
    const first = now;
    session.recordBatch(report(0));
    expect(session.snapshot()).toMatchObject({
      postsGeneratedToday: 2,
      totalPostsGenerated: 2,
      lastGenerationAt: first,
    });

    now = new Date(2026, 2, 2, 9, 0, 0);
    expect(session.snapshot().postsGeneratedToday).toBe(0);

    session.recordBatch(report(1));
    expect(session.snapshot()).toMatchObject({
      postsGeneratedToday: 1,
      totalPostsGenerated: 3,
      lastGenerationAt: now,
    });
    expect(session.snapshot().lastReport?.succeeded).toBe(1);
  });
});

describe("createInterruptHandler", () => {
  it("cancels on the first interrupt and exits on the second", async () => {
    const session = new GenerationSession();
    const exit = vi.fn<(code: number) => void>();
    const onInterrupt = createInterruptHandler(session, exit);

    await session.exclusive(async () => {
      onInterrupt();
      expect(session.cancellationRequested).toBe(true);
      expect(exit).not.toHaveBeenCalled();

      onInterrupt();
      expect(exit).toHaveBeenCalledWith(130);
    });
  });

  it("exits at once when nothing is running", () => {
    const exit = vi.fn<(code: number) => void>();
    createInterruptHandler(new GenerationSession(), exit)();
    expect(exit).toHaveBeenCalledWith(130);
  });
});
