export { createFeedChecker } from "./checker";
export { fetchFeed } from "./fetcher";
export { compilePattern, filterMatching } from "./matcher";
export { isDownloadLink, isMagnetLink, isTorrentFile, resolveDownloadLink } from "./links";
export type { FeedChecker, FeedCheckerDeps } from "./checker";
export type { FeedParser, FetchFeedOptions } from "./fetcher";
export type { TitleMatcher } from "./matcher";
export type { CandidateItem, CheckResult, FetchFeedResult } from "./types";
