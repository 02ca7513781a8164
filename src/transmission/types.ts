import { z } from "zod";

export const TORRENT_FIELDS = [
  "id",
  "name",
  "status",
  "percentDone",
  "rateDownload",
  "rateUpload",
  "uploadRatio",
  "totalSize",
  "downloadedEver",
  "uploadedEver",
  "peersConnected",
  "eta",
  "error",
  "errorString",
  "addedDate",
] as const;

export type TorrentField = (typeof TORRENT_FIELDS)[number] | "peers";

// ---------- Request shapes, one per daemon method ----------

export type TorrentIds = ReadonlyArray<number>;

export type RpcArguments = {
  readonly "torrent-get": {
    readonly fields: ReadonlyArray<TorrentField>;
    readonly ids?: TorrentIds;
  };
  readonly "torrent-add":
    | { readonly metainfo: string; readonly filename?: never }
    | { readonly filename: string; readonly metainfo?: never };
  readonly "torrent-start": { readonly ids: TorrentIds };
  readonly "torrent-stop": { readonly ids: TorrentIds };
  readonly "torrent-remove": {
    readonly ids: TorrentIds;
    readonly "delete-local-data": boolean;
  };
  readonly "torrent-reannounce": { readonly ids?: TorrentIds } | undefined;
  readonly "session-stats": undefined;
  readonly "port-test": undefined;
  readonly "free-space": { readonly path: string };
};

export type RpcMethod = keyof RpcArguments;

// ---------- Response decoders ----------

export const rpcEnvelopeSchema = z.object({
  result: z.string(),
  arguments: z.unknown().optional(),
});

export const torrentSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  status: z.number().int(),
  percentDone: z.number(),
  rateDownload: z.number(),
  rateUpload: z.number(),
  uploadRatio: z.number(),
  totalSize: z.number(),
  downloadedEver: z.number(),
  uploadedEver: z.number(),
  peersConnected: z.number().int(),
  eta: z.number().int(),
  error: z.number().int(),
  errorString: z.string(),
  addedDate: z.number().int(),
});

export const torrentListSchema = z.object({
  torrents: z.array(torrentSchema),
});

export const sessionStatsSchema = z
  .object({
    activeTorrentCount: z.number().int(),
    pausedTorrentCount: z.number().int(),
    torrentCount: z.number().int(),
    downloadSpeed: z.number(),
    uploadSpeed: z.number(),
    "cumulative-stats": z.object({
      uploadedBytes: z.number(),
      downloadedBytes: z.number(),
    }),
  })
  .transform((raw) => ({
    activeTorrentCount: raw.activeTorrentCount,
    pausedTorrentCount: raw.pausedTorrentCount,
    torrentCount: raw.torrentCount,
    downloadSpeed: raw.downloadSpeed,
    uploadSpeed: raw.uploadSpeed,
    cumulativeStats: raw["cumulative-stats"],
  }));

export const portTestSchema = z.object({
  "port-is-open": z.boolean(),
});

export const freeSpaceSchema = z
  .object({
    path: z.string(),
    "size-bytes": z.number(),
    total_size: z.number().optional(),
  })
  .transform((raw) => ({
    path: raw.path,
    sizeBytes: raw["size-bytes"],
    totalSize: raw.total_size ?? null,
  }));

const addedTorrentSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  hashString: z.string(),
});

export const torrentAddSchema = z
  .object({
    "torrent-added": addedTorrentSchema.optional(),
    "torrent-duplicate": addedTorrentSchema.optional(),
  })
  .transform((raw, ctx) => {
    const added = raw["torrent-added"] ?? raw["torrent-duplicate"];
    if (!added) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "response names neither torrent-added nor torrent-duplicate",
      });
      return z.NEVER;
    }
    return { ...added, duplicate: raw["torrent-added"] === undefined };
  });

export const peerSchema = z.object({
  address: z.string(),
  clientName: z.string(),
  clientIsChoked: z.boolean(),
  clientIsInterested: z.boolean(),
  flagStr: z.string(),
  isDownloadingFrom: z.boolean(),
  isEncrypted: z.boolean(),
  isIncoming: z.boolean(),
  isUploadingTo: z.boolean(),
  isUTP: z.boolean(),
  peerIsChoked: z.boolean(),
  peerIsInterested: z.boolean(),
  port: z.number().int(),
  progress: z.number(),
  rateToClient: z.number(),
  rateToPeer: z.number(),
});

export const torrentPeersSchema = z.object({
  torrents: z.array(
    z.object({
      id: z.number().int(),
      peers: z.array(peerSchema),
    }),
  ),
});

export type Torrent = z.infer<typeof torrentSchema>;
export type SessionStats = z.output<typeof sessionStatsSchema>;
export type FreeSpace = z.output<typeof freeSpaceSchema>;
export type AddedTorrent = z.output<typeof torrentAddSchema>;
export type Peer = z.infer<typeof peerSchema>;

/** Either raw .torrent contents or a magnet/URL string, never both. */
export type AddTorrentInput =
  | { readonly metainfo: Uint8Array; readonly filename?: undefined }
  | { readonly filename: string; readonly metainfo?: undefined };
