import { describe, it, expect, beforeEach, vi } from "vitest";
import pino from "pino";
import { createTestConfig, createTestDatabase, seedDownloadedItem, seedTestFeed } from "../test-utils/db";
import { createFakeTransmissionClient } from "../test-utils/transmission";
import type { AppDatabase } from "../db";
import { getFeed, listDownloadedItems } from "../feeds/registry";
import { FeedNotFoundError, PersistenceError, TransportError } from "../errors";
import { fetchFeed } from "./fetcher";
import { recordDownload } from "../feeds/dedup";
import { createFeedChecker } from "./checker";
import type { CandidateItem, FetchFeedResult } from "./types";

vi.mock("./fetcher");
vi.mock("../feeds/dedup", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../feeds/dedup")>();
  return { ...actual, recordDownload: vi.fn(actual.recordDownload) };
});

const NOW = new Date("2026-05-01T12:00:00Z");

function candidate(guid: string, title: string, link: string | null): CandidateItem {
  return { guid, title, link, enclosures: [], vendorLinks: [] };
}

function feedWith(...items: Array<CandidateItem>): FetchFeedResult {
  return { success: true, items };
}

describe("createFeedChecker", () => {
  let db: AppDatabase;
  let client: ReturnType<typeof createFakeTransmissionClient>;

  function makeChecker() {
    return createFeedChecker({
      db,
      client,
      config: createTestConfig(),
      logger: pino({ level: "silent" }),
      now: () => NOW,
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    db = createTestDatabase();
    client = createFakeTransmissionClient();
  });

  it("submits matching items, records them and updates the feed status", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu", matchCount: 1, lastError: "old" });
    vi.mocked(fetchFeed).mockResolvedValue(
      feedWith(
        candidate("u1", "Ubuntu 24.04 Desktop", "magnet:?xt=urn:btih:u1"),
        candidate("d1", "Debian 12 Netinst", "magnet:?xt=urn:btih:d1"),
        candidate("u2", "Ubuntu 24.04 Server", "https://example.com/u2.torrent"),
      ),
    );

    const result = await makeChecker().checkFeed(feedId);

    expect(client.addTorrent).toHaveBeenCalledTimes(2);
    expect(client.addTorrent).toHaveBeenNthCalledWith(
      1,
      { filename: "magnet:?xt=urn:btih:u1" },
      expect.any(AbortSignal),
    );
    expect(client.addTorrent).toHaveBeenNthCalledWith(
      2,
      { filename: "https://example.com/u2.torrent" },
      expect.any(AbortSignal),
    );
    expect(result).toEqual({
      feedId,
      status: "ok",
      error: null,
      itemCount: 3,
      matched: 2,
      submitted: 2,
      duplicates: 0,
      unresolved: 0,
      failedSubmissions: 0,
    });
    expect(getFeed(db, feedId)).toMatchObject({
      lastCheckedAt: NOW,
      lastError: null,
      matchCount: 3,
    });
    expect(listDownloadedItems(db, feedId).map((i) => i.itemGuid).sort()).toEqual(["u1", "u2"]);
  });

  it("does not resubmit an item that is already recorded", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu" });
    seedDownloadedItem(db, feedId, { itemGuid: "u1" });
    vi.mocked(fetchFeed).mockResolvedValue(
      feedWith(candidate("u1", "Ubuntu 24.04 Desktop", "magnet:?xt=urn:btih:u1")),
    );

    const result = await makeChecker().checkFeed(feedId);

    expect(client.addTorrent).not.toHaveBeenCalled();
    expect(result.status).toBe("ok");
    expect(result.duplicates).toBe(1);
    expect(getFeed(db, feedId)?.lastError).toBeNull();
  });

  it("skips matching items without a torrent link", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu" });
    vi.mocked(fetchFeed).mockResolvedValue(
      feedWith(
        candidate("u1", "Ubuntu 24.04 Desktop", "https://example.com/details/1"),
        candidate("u2", "Ubuntu 24.04 Server", "magnet:?xt=urn:btih:u2"),
      ),
    );

    const result = await makeChecker().checkFeed(feedId);

    expect(client.addTorrent).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ matched: 2, unresolved: 1, submitted: 1 });
  });

  it("continues past a failed submission and reports it on the feed", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu", matchCount: 0 });
    vi.mocked(fetchFeed).mockResolvedValue(
      feedWith(
        candidate("u1", "Ubuntu 24.04 Desktop", "magnet:?xt=urn:btih:u1"),
        candidate("u2", "Ubuntu 24.04 Server", "magnet:?xt=urn:btih:u2"),
      ),
    );
    client.addTorrent.mockRejectedValueOnce(new TransportError("daemon returned HTTP 500 for torrent-add", 500));

    const result = await makeChecker().checkFeed(feedId);

    expect(client.addTorrent).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({ status: "ok", submitted: 1, failedSubmissions: 1 });
    expect(getFeed(db, feedId)).toMatchObject({
      matchCount: 1,
      lastError: 'failed to add "Ubuntu 24.04 Desktop": daemon returned HTTP 500 for torrent-add',
      lastCheckedAt: NOW,
    });
    expect(listDownloadedItems(db, feedId).map((i) => i.itemGuid)).toEqual(["u2"]);
  });

  it("records a fetch failure without touching the match count", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu", matchCount: 4 });
    vi.mocked(fetchFeed).mockResolvedValue({
      success: false,
      kind: "transport",
      error: "HTTP 503: Service Unavailable",
    });

    const result = await makeChecker().checkFeed(feedId);

    expect(result).toMatchObject({ status: "failed", error: "transport error: HTTP 503: Service Unavailable" });
    expect(client.addTorrent).not.toHaveBeenCalled();
    expect(getFeed(db, feedId)).toMatchObject({
      lastCheckedAt: NOW,
      lastError: "transport error: HTTP 503: Service Unavailable",
      matchCount: 4,
    });
  });

  it("records an invalid stored pattern without fetching", async () => {
    const feedId = seedTestFeed(db, { pattern: "(unterminated" });

    const result = await makeChecker().checkFeed(feedId);

    expect(result.status).toBe("failed");
    expect(fetchFeed).not.toHaveBeenCalled();
    const feed = getFeed(db, feedId);
    expect(feed?.lastError).toMatch(/^invalid pattern "\(unterminated": /);
    expect(feed?.lastCheckedAt).toEqual(NOW);
  });

  it("runs one check when the same feed is triggered twice concurrently", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu" });
    vi.mocked(fetchFeed).mockImplementation(
      () =>
        new Promise((resolve) => {
          setTimeout(
            () => resolve(feedWith(candidate("u1", "Ubuntu 24.04 Desktop", "magnet:?xt=urn:btih:u1"))),
            5,
          );
        }),
    );
    const checker = makeChecker();

    const [scheduled, manual] = await Promise.all([
      checker.checkFeed(feedId),
      checker.checkFeed(feedId),
    ]);

    expect(client.addTorrent).toHaveBeenCalledTimes(1);
    expect(fetchFeed).toHaveBeenCalledTimes(1);
    expect(manual).toBe(scheduled);
    expect(getFeed(db, feedId)?.matchCount).toBe(1);
  });

  it("starts a fresh check once the previous one has finished", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu" });
    vi.mocked(fetchFeed).mockResolvedValue(
      feedWith(candidate("u1", "Ubuntu 24.04 Desktop", "magnet:?xt=urn:btih:u1")),
    );
    const checker = makeChecker();

    await checker.checkFeed(feedId);
    const second = await checker.checkFeed(feedId);

    expect(fetchFeed).toHaveBeenCalledTimes(2);
    expect(client.addTorrent).toHaveBeenCalledTimes(1);
    expect(second.duplicates).toBe(1);
  });

  it("leaves a submitted but unrecorded item eligible for the next check", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu" });
    vi.mocked(fetchFeed).mockResolvedValue(
      feedWith(candidate("u1", "Ubuntu 24.04 Desktop", "magnet:?xt=urn:btih:u1")),
    );
    vi.mocked(recordDownload).mockImplementationOnce(() => {
      throw new PersistenceError("failed to record item u1", new Error("disk I/O error"));
    });
    const checker = makeChecker();

    const first = await checker.checkFeed(feedId);
    const second = await checker.checkFeed(feedId);

    expect(first).toMatchObject({ status: "ok", submitted: 0 });
    expect(second).toMatchObject({ status: "ok", submitted: 1 });
    expect(client.addTorrent).toHaveBeenCalledTimes(2);
    expect(getFeed(db, feedId)?.matchCount).toBe(1);
  });

  it("rejects with FeedNotFoundError for an unknown feed", async () => {
    await expect(makeChecker().checkFeed(9999)).rejects.toBeInstanceOf(FeedNotFoundError);
  });

  it("aborts in-flight work on stop and leaves the feed status untouched", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu" });
    vi.mocked(fetchFeed).mockImplementation(
      (_url, options) =>
        new Promise((resolve) => {
          options.signal?.addEventListener("abort", () => {
            resolve({ success: false, kind: "transport", error: "This operation was aborted" });
          });
        }),
    );
    const checker = makeChecker();

    const pending = checker.checkFeed(feedId);
    await checker.stop();
    const result = await pending;

    expect(result).toMatchObject({ status: "failed", error: "check aborted" });
    expect(getFeed(db, feedId)).toMatchObject({ lastCheckedAt: null, lastError: null });
  });

  it("stops mid-submission without recording an error or a check time", async () => {
    const feedId = seedTestFeed(db, { pattern: "^Ubuntu" });
    vi.mocked(fetchFeed).mockResolvedValue(
      feedWith(
        candidate("u1", "Ubuntu 1", "magnet:?xt=urn:btih:u1"),
        candidate("u2", "Ubuntu 2", "magnet:?xt=urn:btih:u2"),
        candidate("u3", "Ubuntu 3", "magnet:?xt=urn:btih:u3"),
      ),
    );
    client.addTorrent
      .mockResolvedValueOnce({ id: 1, name: "Ubuntu 1", hashString: "u1", duplicate: false })
      .mockImplementationOnce(
        (_input, signal) =>
          new Promise((_resolve, reject) => {
            signal?.addEventListener("abort", () => {
              reject(new Error("This operation was aborted"));
            });
          }),
      );
    const checker = makeChecker();

    const pending = checker.checkFeed(feedId);
    await vi.waitFor(() => expect(client.addTorrent).toHaveBeenCalledTimes(2));
    await checker.stop();
    const result = await pending;

    expect(client.addTorrent).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({
      status: "failed",
      error: "check aborted",
      submitted: 1,
      failedSubmissions: 0,
    });
    expect(getFeed(db, feedId)).toMatchObject({
      lastCheckedAt: null,
      lastError: null,
      matchCount: 1,
    });
    expect(listDownloadedItems(db, feedId).map((i) => i.itemGuid)).toEqual(["u1"]);
  });
});
