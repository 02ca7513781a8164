/**
 * One entry parsed from a feed document, before match and dedup filtering.
 * Lives only for the duration of a single feed check.
 */
export type CandidateItem = {
  readonly guid: string;
  readonly title: string;
  readonly link: string | null;
  readonly enclosures: ReadonlyArray<string>;
  readonly vendorLinks: ReadonlyArray<string>;
};

export type FetchFeedResult =
  | { readonly success: true; readonly items: ReadonlyArray<CandidateItem> }
  | {
      readonly success: false;
      readonly kind: "transport" | "parse";
      readonly error: string;
    };

export type CheckResult = {
  readonly feedId: number;
  readonly status: "ok" | "failed";
  readonly error: string | null;
  readonly itemCount: number;
  readonly matched: number;
  readonly submitted: number;
  readonly duplicates: number;
  readonly unresolved: number;
  readonly failedSubmissions: number;
};
