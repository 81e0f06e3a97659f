/**
 * The subset of the player the radio needs. mpv is the only implementation,
 * but the controller stays agnostic of it.
 */
export interface PlaybackEngine {
  isRunning(): boolean;
  sendCommand(command: string[]): void;
}

export type TrackInfo = {
  url: string;
  title?: string | undefined;
  /** Seconds, rounded. */
  duration?: number | undefined;
};

export type MpvMessage =
  | { type: "property-change"; id: number | null; name: string; data: unknown }
  | { type: "event"; event: string }
  | { type: "reply"; requestId: number | null; error: string; data: unknown };
