import { PatternError } from "../errors";
import type { CandidateItem } from "./types";

export type TitleMatcher = {
  readonly pattern: string;
  readonly matches: (title: string) => boolean;
};

/**
 * Compiles a feed's match expression. Matching is case-sensitive and
 * unanchored: the expression may match anywhere in the title.
 *
 * @throws PatternError when the expression does not compile
 */
export function compilePattern(pattern: string): TitleMatcher {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PatternError(pattern, reason);
  }

  // No g/y flags, so test() keeps no lastIndex state between titles.
  return { pattern, matches: (title) => regex.test(title) };
}

export function filterMatching(
  matcher: TitleMatcher,
  items: ReadonlyArray<CandidateItem>,
): Array<CandidateItem> {
  return items.filter((item) => matcher.matches(item.title));
}
