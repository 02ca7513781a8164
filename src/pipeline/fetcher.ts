import Parser from "rss-parser";
import type { Logger } from "pino";
import type { CandidateItem, FetchFeedResult } from "./types";

type EnclosureNode = {
  readonly $?: { readonly url?: string };
};

// RSS <link> elements come through as strings, Atom ones as attribute nodes.
type LinkNode =
  | string
  | { readonly $?: { readonly rel?: string; readonly href?: string } };

type CustomItem = {
  id?: string;
  enclosures?: Array<EnclosureNode>;
  links?: Array<LinkNode>;
  magnetUri?: unknown;
  torrentLink?: unknown;
};

export type FeedParser = Pick<
  Parser<Record<string, unknown>, CustomItem>,
  "parseString"
>;

export type FetchFeedOptions = {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
};

let parserInstance: FeedParser | null = null;

export function createParser(): Parser<Record<string, unknown>, CustomItem> {
  return new Parser<Record<string, unknown>, CustomItem>({
    customFields: {
      item: [
        ["enclosure", "enclosures", { keepArray: true }],
        ["link", "links", { keepArray: true }],
        ["torrent:magnetURI", "magnetUri"],
        ["torrent:link", "torrentLink"],
      ],
    },
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

function text(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

type ParsedItem = Awaited<ReturnType<FeedParser["parseString"]>>["items"][number];

function toCandidate(item: ParsedItem): CandidateItem {
  const link = text(item.link);
  const title = text(item.title) ?? "";

  const enclosures: Array<string> = [];
  for (const node of item.enclosures ?? []) {
    const url = text(node.$?.url);
    if (url) enclosures.push(url);
  }
  const single = text(item.enclosure?.url);
  if (single && !enclosures.includes(single)) enclosures.push(single);
  for (const node of item.links ?? []) {
    if (typeof node === "string" || node.$?.rel !== "enclosure") continue;
    const href = text(node.$?.href);
    if (href && !enclosures.includes(href)) enclosures.push(href);
  }

  const vendorLinks = [text(item.magnetUri), text(item.torrentLink)].filter(
    (value): value is string => value !== null,
  );

  return {
    guid: text(item.guid) ?? text(item.id) ?? link ?? title,
    title,
    link,
    enclosures,
    vendorLinks,
  };
}

/**
 * Downloads and parses a feed document. Never throws: network and HTTP
 * failures come back as kind "transport", undecodable documents as "parse".
 * An empty feed is a success with no items.
 */
export async function fetchFeed(
  feedUrl: string,
  options: FetchFeedOptions,
  logger: Logger,
): Promise<FetchFeedResult> {
  const signal = options.signal
    ? AbortSignal.any([AbortSignal.timeout(options.timeoutMs), options.signal])
    : AbortSignal.timeout(options.timeoutMs);

  let body: string;
  try {
    const response = await fetch(feedUrl, {
      signal,
      headers: {
        "User-Agent": "rss-torrent-relay/0.1 (feed poller)",
        Accept:
          "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5",
      },
    });

    if (!response.ok) {
      const error = `HTTP ${response.status}: ${response.statusText}`;
      logger.warn({ feedUrl, error }, "feed fetch failed");
      return { success: false, kind: "transport", error };
    }

    body = await response.text();
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.warn({ feedUrl, error }, "feed fetch failed");
    return { success: false, kind: "transport", error };
  }

  try {
    const feed = await getParserInstance().parseString(body);
    const items = feed.items.map(toCandidate);
    logger.debug({ feedUrl, itemCount: items.length }, "feed parsed");
    return { success: true, items };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.warn({ feedUrl, error }, "feed document could not be parsed");
    return { success: false, kind: "parse", error };
  }
}
