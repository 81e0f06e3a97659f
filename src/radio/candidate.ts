import type { PlayCandidate } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode one line of `yt-dlp --dump-json` output.
 * Returns null for anything that is not a JSON object with a usable url.
 *
 * webpage_url wins over url: in flat-playlist mode `url` can be a bare id.
 */
export function parseCandidate(line: string): PlayCandidate | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(decoded)) return null;

  const url =
    typeof decoded.webpage_url === "string"
      ? decoded.webpage_url
      : typeof decoded.url === "string"
        ? decoded.url
        : "";
  if (url === "") return null;

  const title = typeof decoded.title === "string" ? decoded.title : "Unknown";
  return { url, title };
}

export function parseCandidates(text: string): PlayCandidate[] {
  const candidates: PlayCandidate[] = [];
  for (const raw of text.split("\n")) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    if (line.length === 0) continue;
    const candidate = parseCandidate(line);
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}
