import type { PlayCandidate } from "./types";

/** Only the top results are considered; they are the most relevant. */
export const SELECTION_WINDOW = 3;

export function excludeUrl(
  candidates: PlayCandidate[],
  excludedUrl: string
): PlayCandidate[] {
  return candidates.filter((candidate) => candidate.url !== excludedUrl);
}

/**
 * Pick one candidate at random from the first SELECTION_WINDOW entries that
 * are not the excluded url. Returns null when nothing is left.
 * `random` is expected to return values in [0, 1), like Math.random.
 */
export function selectCandidate(
  candidates: PlayCandidate[],
  excludedUrl: string,
  random: () => number = Math.random
): PlayCandidate | null {
  const remaining = excludeUrl(candidates, excludedUrl);
  if (remaining.length === 0) return null;

  const window = Math.min(SELECTION_WINDOW, remaining.length);
  const roll = random();
  // NaN and negative rolls take the top result; 1 and above the last in window.
  const clamped = Number.isFinite(roll) && roll > 0 ? roll : 0;
  const index = Math.min(Math.floor(clamped * window), window - 1);
  return remaining[index] ?? null;
}
