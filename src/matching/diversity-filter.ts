import { DEFAULT_EXCLUDED_MARKERS } from "../config/env";
import { InvalidParameterError } from "../shared/errors";
import { Match } from "../shared/types/matching.types";

/**
 * Prefers matches whose titles do not look like generic company posts, then
 * backfills from the remaining matches in their original order.
 */
export function filterDiverse(
  matches: ReadonlyArray<Match>,
  targetCount: number,
  excludedMarkers: ReadonlyArray<string> = DEFAULT_EXCLUDED_MARKERS,
): Match[] {
  if (!Number.isInteger(targetCount) || targetCount < 0) {
    throw new InvalidParameterError("targetCount", targetCount);
  }
  const limit = Math.min(targetCount, matches.length);
  const markers = excludedMarkers.map((marker) => marker.trim().toLowerCase()).filter((marker) => marker.length > 0);

  const selected: Match[] = [];
  const taken = new Set<number>();
  matches.forEach((match, index) => {
    if (selected.length < limit && !isGeneric(match.document.title, markers)) {
      selected.push(match);
      taken.add(index);
    }
  });
  matches.forEach((match, index) => {
    if (selected.length < limit && !taken.has(index)) {
      selected.push(match);
    }
  });

  return selected;
}

export function isGeneric(title: string, markers: ReadonlyArray<string>): boolean {
  const normalized = title.toLowerCase();
  return markers.some((marker) => normalized.includes(marker));
}
