import { log } from "../lib/logger";
import type { Notifier } from "../lib/notify";
import type { PlaybackEngine } from "../player/types";
import type { SessionState } from "../session/state";
import type { DiscoveryRunner } from "./runner";
import type { DiscoveryOutcome, PlayCandidate, QueueEndResult } from "./types";

export interface AutoplayControllerDeps {
  engine: PlaybackEngine;
  session: SessionState;
  notifier: Notifier;
  runner: DiscoveryRunner;
}

/**
 * Radio mode. Owns the on/off flag and the last-played cursor; when the
 * player's queue drains it looks up a related track and appends it.
 */
export class AutoplayController {
  private mode = false;
  private cursor: string | null = null;
  private running = false;

  constructor(private readonly deps: AutoplayControllerDeps) {}

  get enabled(): boolean {
    return this.mode;
  }

  get lastUrl(): string | null {
    return this.cursor;
  }

  get inFlight(): boolean {
    return this.running;
  }

  toggle(): boolean {
    this.mode = !this.mode;
    this.deps.notifier.notify(`Radio mode ${this.mode ? "ON" : "OFF"}`, "info");
    return this.mode;
  }

  setEnabled(value: boolean): void {
    this.mode = value;
  }

  setLastPlayed(url: string | null): void {
    this.cursor = url;
  }

  onQueueEnd(): QueueEndResult {
    if (!this.mode) return { status: "skipped", reason: "disabled" };
    const seed = this.cursor;
    if (!seed) return { status: "skipped", reason: "no_last_url" };
    if (!this.deps.engine.isRunning()) {
      return { status: "skipped", reason: "player_stopped" };
    }
    if (this.running) return { status: "skipped", reason: "in_flight" };

    this.running = true;
    this.deps.notifier.notify("Finding related track...", "info");
    this.deps.runner.run(seed, (outcome) => this.handleOutcome(outcome));
    return { status: "started" };
  }

  private handleOutcome(outcome: DiscoveryOutcome): void {
    this.running = false;
    if (!outcome.ok) {
      log(`[radio] discovery failed (${outcome.kind})`);
      this.deps.notifier.notify(outcome.message, "warn");
      return;
    }
    this.enqueue(outcome.candidate);
  }

  private enqueue(candidate: PlayCandidate): void {
    this.deps.session.setTitle(candidate.url, candidate.title);
    this.deps.engine.sendCommand(["loadfile", candidate.url, "append-play"]);
    this.cursor = candidate.url;
    this.deps.notifier.notify(`Auto-playing → ${candidate.title}`, "info");
  }
}
