import { vi } from "vitest";
import type { TransmissionClient } from "../transmission/client";

/**
 * A TransmissionClient whose every operation is a vi.fn() resolving to an
 * empty or successful result. Override per test with mockResolvedValue etc.
 */
export function createFakeTransmissionClient() {
  return {
    url: "http://daemon.test:9091/transmission/rpc",
    execute: vi.fn<TransmissionClient["execute"]>().mockResolvedValue({}),
    getTorrents: vi.fn<TransmissionClient["getTorrents"]>().mockResolvedValue([]),
    getSessionStats: vi
      .fn<TransmissionClient["getSessionStats"]>()
      .mockResolvedValue({
        activeTorrentCount: 0,
        pausedTorrentCount: 0,
        torrentCount: 0,
        downloadSpeed: 0,
        uploadSpeed: 0,
        cumulativeStats: { uploadedBytes: 0, downloadedBytes: 0 },
      }),
    testPort: vi.fn<TransmissionClient["testPort"]>().mockResolvedValue(true),
    getFreeSpace: vi.fn<TransmissionClient["getFreeSpace"]>().mockResolvedValue({
      path: "/downloads",
      sizeBytes: 0,
      totalSize: null,
    }),
    addTorrent: vi.fn<TransmissionClient["addTorrent"]>().mockResolvedValue({
      id: 1,
      name: "torrent",
      hashString: "0000",
      duplicate: false,
    }),
    startTorrent: vi.fn<TransmissionClient["startTorrent"]>().mockResolvedValue(undefined),
    stopTorrent: vi.fn<TransmissionClient["stopTorrent"]>().mockResolvedValue(undefined),
    removeTorrent: vi.fn<TransmissionClient["removeTorrent"]>().mockResolvedValue(undefined),
    reannounceTorrent: vi
      .fn<TransmissionClient["reannounceTorrent"]>()
      .mockResolvedValue(undefined),
    reannounceAll: vi.fn<TransmissionClient["reannounceAll"]>().mockResolvedValue(undefined),
    getPeers: vi.fn<TransmissionClient["getPeers"]>().mockResolvedValue([]),
  } satisfies TransmissionClient;
}
