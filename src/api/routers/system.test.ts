import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  createTestDatabase,
  seedTestFeed,
  createTestCaller,
} from "../../test-utils/db";
import type { AppDatabase } from "../../db";

describe("system router", () => {
  let db: AppDatabase;
  let caller: ReturnType<typeof createTestCaller>;

  beforeEach(() => {
    db = createTestDatabase();
    caller = createTestCaller(db);
  });

  it("returns status with config data and no checks yet", async () => {
    const result = await caller.system.status();

    expect(result).toEqual({
      lastCheckTime: null,
      pollSchedule: "*/15 * * * *",
      daemonUrl: "http://daemon.test:9091/transmission/rpc",
      feedCount: 0,
      enabledFeedCount: 0,
    });
  });

  it("reports the most recent feed check time", async () => {
    seedTestFeed(db, { lastCheckedAt: new Date("2026-03-01T10:00:00Z") });
    seedTestFeed(db, { lastCheckedAt: new Date("2026-03-01T12:00:00Z") });
    seedTestFeed(db);

    const result = await caller.system.status();

    expect(result.lastCheckTime?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
  });

  it("counts total and enabled feeds", async () => {
    seedTestFeed(db);
    seedTestFeed(db);
    seedTestFeed(db, { enabled: false });

    const result = await caller.system.status();

    expect(result.feedCount).toBe(3);
    expect(result.enabledFeedCount).toBe(2);
  });

  it("triggers a poll cycle on demand", async () => {
    const runNow = vi.fn().mockResolvedValue({ due: 2, checked: 2, failed: 0 });
    caller = createTestCaller(db, { scheduler: { runNow } });

    const result = await caller.system.pollNow();

    expect(result).toEqual({ due: 2, checked: 2, failed: 0 });
    expect(runNow).toHaveBeenCalledTimes(1);
  });
});
