import { spawn as spawnChild, type ChildProcess } from "child_process";
import type { EventEmitter } from "events";
import { DEFAULT_RESULT_COUNT } from "../lib/config";
import { log } from "../lib/logger";
import { parseCandidates } from "./candidate";
import { SerialQueue } from "./scheduler";
import { selectCandidate } from "./selector";
import type { DiscoveryOutcome, DiscoveryState } from "./types";

export type DiscoveryProcess = Pick<ChildProcess, "stdout" | "kill"> &
  EventEmitter;

export type SpawnFn = (command: string, args: string[]) => DiscoveryProcess;

export interface DiscoveryRunnerOptions {
  binary?: string;
  resultCount?: number;
  /** 0 disables the timeout; a hung tool then keeps its run open. */
  timeoutMs?: number;
  spawn?: SpawnFn;
  scheduler?: SerialQueue;
  random?: () => number;
}

const DEFAULT_BINARY = "yt-dlp";

const defaultSpawn: SpawnFn = (command, args) =>
  spawnChild(command, args, { stdio: ["ignore", "pipe", "ignore"] });

export function buildDiscoveryQuery(seedUrl: string, resultCount: number): string {
  return `ytsearch${resultCount}:related to ${seedUrl}`;
}

export function buildDiscoveryArgs(seedUrl: string, resultCount: number): string[] {
  return [
    "--flat-playlist",
    "--dump-json",
    "--no-warnings",
    "--no-download",
    "--default-search",
    "ytsearch",
    buildDiscoveryQuery(seedUrl, resultCount),
  ];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One yt-dlp invocation. Owns the child process and the output buffer until
 * the outcome is settled.
 */
export class DiscoveryRun {
  private current: DiscoveryState = "idle";
  private readonly chunks: Buffer[] = [];
  private child: DiscoveryProcess | null = null;
  private timer: NodeJS.Timeout | null = null;
  private released = false;
  private settled = false;

  constructor(
    readonly seedUrl: string,
    private readonly runner: DiscoveryRunner,
    private readonly onSettle: (outcome: DiscoveryOutcome) => void
  ) {}

  get state(): DiscoveryState {
    return this.current;
  }

  get bufferedBytes(): number {
    return this.chunks.reduce((total, chunk) => total + chunk.length, 0);
  }

  start(): void {
    const { binary, resultCount, timeoutMs } = this.runner;
    const args = buildDiscoveryArgs(this.seedUrl, resultCount);
    this.current = "spawning";
    log(`[discover] ${binary} ${args.join(" ")}`);

    let child: DiscoveryProcess;
    try {
      child = this.runner.spawnProcess(binary, args);
    } catch (error) {
      this.spawnFailed(error);
      return;
    }
    this.child = child;

    child.once("error", (error: unknown) => this.spawnFailed(error));
    child.once("close", (code: unknown) => this.exited(code));

    if (child.stdout) {
      child.stdout.on("error", (error: Error) => this.streamFailed(error));
      child.stdout.on("data", (chunk: Buffer | string) => {
        this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
      });
    }

    if (timeoutMs > 0) {
      this.timer = setTimeout(() => this.timedOut(), timeoutMs);
    }

    if (this.current === "spawning") {
      this.current = "streaming";
    }
  }

  private spawnFailed(error: unknown): void {
    if (this.settled) return;
    this.current = "spawn_failed";
    this.release();
    this.settle({
      ok: false,
      kind: "spawn",
      message: `Could not start ${this.runner.binary}: ${errorMessage(error)}`,
    });
  }

  private timedOut(): void {
    if (this.settled) return;
    this.timer = null;
    this.current = "failed";
    this.child?.kill("SIGTERM");
    this.release();
    this.settle({
      ok: false,
      kind: "timeout",
      message: "Related track search timed out",
    });
  }

  private streamFailed(error: Error): void {
    if (this.settled) return;
    log(`[discover] reading ${this.runner.binary} output failed: ${error.message}`);
    this.current = "failed";
    this.child?.kill("SIGTERM");
    this.release();
    this.settle({
      ok: false,
      kind: "tool",
      message: "Failed to find related tracks",
    });
  }

  private exited(code: unknown): void {
    if (this.settled) return;
    this.release();

    if (code !== 0) {
      this.current = "failed";
      log(`[discover] ${this.runner.binary} exited with code ${String(code)}`);
      this.settle({
        ok: false,
        kind: "tool",
        message: "Failed to find related tracks",
      });
      return;
    }

    const text = Buffer.concat(this.chunks).toString("utf8");
    const candidates = parseCandidates(text);
    log(`[discover] Parsed ${candidates.length} candidates`);

    const pick = selectCandidate(candidates, this.seedUrl, this.runner.random);
    if (!pick) {
      this.current = "failed";
      this.settle({
        ok: false,
        kind: "no_candidates",
        message: "No related tracks found",
      });
      return;
    }

    this.current = "succeeded";
    this.settle({ ok: true, candidate: pick });
  }

  /**
   * Drop data listeners, destroy stdout and clear the timer. The stdout error
   * listener stays so a late pipe error is still absorbed. Safe to call more
   * than once and on streams that are already closed.
   */
  private release(): void {
    if (this.released) return;
    this.released = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const stdout = this.child?.stdout;
    if (stdout) {
      stdout.removeAllListeners("data");
      if (!stdout.destroyed) stdout.destroy();
    }
  }

  private settle(outcome: DiscoveryOutcome): void {
    this.settled = true;
    this.onSettle(outcome);
  }
}

/**
 * Runs the related-track search in yt-dlp. Every run reports exactly once,
 * through the scheduler rather than from the process callbacks.
 */
export class DiscoveryRunner {
  readonly binary: string;
  readonly resultCount: number;
  readonly timeoutMs: number;
  readonly random: () => number;
  readonly scheduler: SerialQueue;
  private readonly spawnFn: SpawnFn;

  constructor(options: DiscoveryRunnerOptions = {}) {
    this.binary = options.binary ?? DEFAULT_BINARY;
    this.resultCount = options.resultCount ?? DEFAULT_RESULT_COUNT;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.scheduler = options.scheduler ?? new SerialQueue();
    this.random = options.random ?? Math.random;
  }

  spawnProcess(command: string, args: string[]): DiscoveryProcess {
    return this.spawnFn(command, args);
  }

  run(
    seedUrl: string,
    onComplete: (outcome: DiscoveryOutcome) => void
  ): DiscoveryRun {
    const run = new DiscoveryRun(seedUrl, this, (outcome) => {
      this.scheduler.post(() => onComplete(outcome));
    });
    run.start();
    return run;
  }

  discover(seedUrl: string): Promise<DiscoveryOutcome> {
    return new Promise((resolve) => {
      this.run(seedUrl, resolve);
    });
  }
}
