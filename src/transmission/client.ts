// pattern: Imperative Shell
import type { Logger } from "pino";
import type { z } from "zod";
import {
  InvalidArgumentError,
  ProtocolError,
  TransportError,
  errorMessage,
} from "../errors";
import {
  TORRENT_FIELDS,
  freeSpaceSchema,
  portTestSchema,
  rpcEnvelopeSchema,
  sessionStatsSchema,
  torrentAddSchema,
  torrentListSchema,
  torrentPeersSchema,
} from "./types";
import type {
  AddTorrentInput,
  AddedTorrent,
  FreeSpace,
  Peer,
  RpcArguments,
  RpcMethod,
  SessionStats,
  Torrent,
} from "./types";

export const SESSION_HEADER = "X-Transmission-Session-Id";
const SESSION_CONFLICT = 409;

export type TransmissionClientOptions = {
  readonly url: string;
  readonly username?: string;
  readonly password?: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
};

export type TransmissionClient = {
  readonly url: string;
  readonly execute: <M extends RpcMethod>(
    method: M,
    args: RpcArguments[M],
    signal?: AbortSignal,
  ) => Promise<unknown>;
  readonly getTorrents: (signal?: AbortSignal) => Promise<Array<Torrent>>;
  readonly getSessionStats: (signal?: AbortSignal) => Promise<SessionStats>;
  readonly testPort: (signal?: AbortSignal) => Promise<boolean>;
  readonly getFreeSpace: (path: string, signal?: AbortSignal) => Promise<FreeSpace>;
  readonly addTorrent: (
    input: AddTorrentInput,
    signal?: AbortSignal,
  ) => Promise<AddedTorrent>;
  readonly startTorrent: (id: number, signal?: AbortSignal) => Promise<void>;
  readonly stopTorrent: (id: number, signal?: AbortSignal) => Promise<void>;
  readonly removeTorrent: (
    id: number,
    deleteData: boolean,
    signal?: AbortSignal,
  ) => Promise<void>;
  readonly reannounceTorrent: (id: number, signal?: AbortSignal) => Promise<void>;
  readonly reannounceAll: (signal?: AbortSignal) => Promise<void>;
  readonly getPeers: (id: number, signal?: AbortSignal) => Promise<Array<Peer>>;
};

function decode<S extends z.ZodTypeAny>(
  schema: S,
  method: RpcMethod,
  value: unknown,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ProtocolError(`unexpected ${method} response: ${issues}`);
  }
  return result.data;
}

/**
 * Creates a client for the daemon's JSON RPC endpoint.
 *
 * The session id lives only in this closure. It is read when each attempt's
 * headers are built, so a retry always carries the id adopted from the
 * rejection. A rejected request is retried once; a second rejection is a
 * ProtocolError.
 */
export function createTransmissionClient(
  options: TransmissionClientOptions,
): TransmissionClient {
  const { url, logger } = options;
  const authorization = options.username
    ? `Basic ${Buffer.from(`${options.username}:${options.password ?? ""}`).toString("base64")}`
    : null;

  let sessionId: string | null = null;

  async function send(body: string, signal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (authorization) headers["Authorization"] = authorization;
    if (sessionId) headers[SESSION_HEADER] = sessionId;

    const timeout = AbortSignal.timeout(options.timeoutMs);
    try {
      return await fetch(url, {
        method: "POST",
        headers,
        body,
        signal: signal ? AbortSignal.any([timeout, signal]) : timeout,
      });
    } catch (err) {
      throw new TransportError(
        `daemon request failed: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }
  }

  async function adoptSession(response: Response): Promise<void> {
    await response.body?.cancel();
    const fresh = response.headers.get(SESSION_HEADER);
    if (!fresh) {
      throw new ProtocolError(
        `daemon answered ${SESSION_CONFLICT} without a ${SESSION_HEADER} header`,
      );
    }
    sessionId = fresh;
  }

  async function execute<M extends RpcMethod>(
    method: M,
    args: RpcArguments[M],
    signal?: AbortSignal,
  ): Promise<unknown> {
    const body = JSON.stringify({ method, arguments: args });

    let response = await send(body, signal);
    if (response.status === SESSION_CONFLICT) {
      await adoptSession(response);
      logger.debug({ method }, "daemon session refreshed, retrying");

      response = await send(body, signal);
      if (response.status === SESSION_CONFLICT) {
        await adoptSession(response);
        throw new ProtocolError(
          `daemon rejected the session again after refresh (${method})`,
        );
      }
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransportError(
        `daemon returned HTTP ${response.status} for ${method}`,
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new ProtocolError(
        `daemon sent invalid JSON for ${method}: ${errorMessage(err)}`,
      );
    }

    const envelope = decode(rpcEnvelopeSchema, method, payload);
    if (envelope.result !== "success") {
      throw new ProtocolError(
        `${method} failed: ${envelope.result}`,
        envelope.result,
      );
    }

    return envelope.arguments;
  }

  return {
    url,
    execute,

    getTorrents: async (signal) => {
      const args = await execute(
        "torrent-get",
        { fields: TORRENT_FIELDS },
        signal,
      );
      return decode(torrentListSchema, "torrent-get", args).torrents;
    },

    getSessionStats: async (signal) =>
      decode(
        sessionStatsSchema,
        "session-stats",
        await execute("session-stats", undefined, signal),
      ),

    testPort: async (signal) =>
      decode(
        portTestSchema,
        "port-test",
        await execute("port-test", undefined, signal),
      )["port-is-open"],

    getFreeSpace: async (path, signal) =>
      decode(
        freeSpaceSchema,
        "free-space",
        await execute("free-space", { path }, signal),
      ),

    addTorrent: async (input, signal) => {
      let args: RpcArguments["torrent-add"];
      if (input.metainfo !== undefined && input.filename !== undefined) {
        throw new InvalidArgumentError(
          "supply either torrent metainfo or a filename, not both",
        );
      } else if (input.metainfo !== undefined && input.metainfo.length > 0) {
        args = { metainfo: Buffer.from(input.metainfo).toString("base64") };
      } else if (input.filename) {
        args = { filename: input.filename };
      } else {
        throw new InvalidArgumentError("no torrent data provided");
      }

      return decode(
        torrentAddSchema,
        "torrent-add",
        await execute("torrent-add", args, signal),
      );
    },

    startTorrent: async (id, signal) => {
      await execute("torrent-start", { ids: [id] }, signal);
    },

    stopTorrent: async (id, signal) => {
      await execute("torrent-stop", { ids: [id] }, signal);
    },

    removeTorrent: async (id, deleteData, signal) => {
      await execute(
        "torrent-remove",
        { ids: [id], "delete-local-data": deleteData },
        signal,
      );
    },

    reannounceTorrent: async (id, signal) => {
      await execute("torrent-reannounce", { ids: [id] }, signal);
    },

    reannounceAll: async (signal) => {
      await execute("torrent-reannounce", undefined, signal);
    },

    getPeers: async (id, signal) => {
      const args = await execute(
        "torrent-get",
        { ids: [id], fields: ["id", "peers"] },
        signal,
      );
      const { torrents } = decode(torrentPeersSchema, "torrent-get", args);
      return torrents[0]?.peers ?? [];
    },
  };
}
