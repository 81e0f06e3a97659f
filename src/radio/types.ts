/**
 * One possible next track, as reported by yt-dlp.
 */
export interface PlayCandidate {
  url: string;
  title: string;
}

export type DiscoveryFailureKind = "spawn" | "tool" | "no_candidates" | "timeout";

/**
 * Terminal result of one discovery run. Failures are values, not exceptions.
 */
export type DiscoveryOutcome =
  | { ok: true; candidate: PlayCandidate }
  | { ok: false; kind: DiscoveryFailureKind; message: string };

export type DiscoveryState =
  | "idle"
  | "spawning"
  | "streaming"
  | "succeeded"
  | "failed"
  | "spawn_failed";

export type QueueEndSkipReason =
  | "disabled"
  | "no_last_url"
  | "player_stopped"
  | "in_flight";

export type QueueEndResult =
  | { status: "started" }
  | { status: "skipped"; reason: QueueEndSkipReason };
