import type { Source } from "./types.js";

/** First occurrence of each url wins; order of first appearance is kept. */
export function mergeSources(accumulated: Source[], newSources: Source[]): Source[] {
  const seen = new Set<string>();
  return [...accumulated, ...newSources].filter((s) => {
    if (seen.has(s.url)) return false;
    seen.add(s.url);
    return true;
  });
}
