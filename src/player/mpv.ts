import { EventEmitter } from "events";
import net from "net";
import type { Duplex } from "stream";
import { log } from "../lib/logger";
import type { MpvMessage, PlaybackEngine, TrackInfo } from "./types";

const OBSERVE_PATH = 1;
const OBSERVE_IDLE = 2;
const OBSERVE_TITLE = 3;
const OBSERVE_DURATION = 4;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode one line from mpv's JSON IPC socket. Unknown or malformed lines
 * return null.
 */
export function parseMpvMessage(line: string): MpvMessage | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(decoded)) return null;

  if (decoded.event === "property-change" && typeof decoded.name === "string") {
    return {
      type: "property-change",
      id: typeof decoded.id === "number" ? decoded.id : null,
      name: decoded.name,
      data: decoded.data,
    };
  }
  if (typeof decoded.event === "string") {
    return { type: "event", event: decoded.event };
  }
  if (typeof decoded.error === "string") {
    return {
      type: "reply",
      requestId: typeof decoded.request_id === "number" ? decoded.request_id : null,
      error: decoded.error,
      data: decoded.data,
    };
  }
  return null;
}

/**
 * mpv over its JSON IPC socket (`--input-ipc-server`).
 *
 * Emits `track-start` when the playing path changes, `track-update` when the
 * title or duration of that track becomes known, and `queue-end` when mpv
 * goes idle after having played something. mpv has to run with `--idle`
 * for the latter; without it mpv exits at the end of the playlist and the
 * client emits `close` instead.
 */
export class MpvClient extends EventEmitter implements PlaybackEngine {
  private stream: Duplex | null = null;
  private pending = "";
  private currentPath: string | null = null;
  private currentTitle: string | undefined;
  private currentDuration: number | undefined;
  private hasPlayed = false;
  private nextRequestId = 100;

  connect(socketPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(socketPath);
      const onError = (error: Error) => {
        reject(new Error(`Could not connect to mpv at ${socketPath}: ${error.message}`));
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        socket.on("error", (error: Error) => {
          log(`[mpv] socket error: ${error.message}`);
        });
        this.attach(socket);
        resolve();
      });
    });
  }

  attach(stream: Duplex): void {
    this.stream = stream;
    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => this.receive(chunk));
    stream.once("close", () => this.detach());
    stream.once("end", () => this.detach());

    this.write({ command: ["observe_property", OBSERVE_PATH, "path"] });
    this.write({ command: ["observe_property", OBSERVE_TITLE, "media-title"] });
    this.write({ command: ["observe_property", OBSERVE_DURATION, "duration"] });
    this.write({ command: ["observe_property", OBSERVE_IDLE, "idle-active"] });
  }

  get playingPath(): string | null {
    return this.currentPath;
  }

  get currentTrack(): TrackInfo | null {
    if (!this.currentPath) return null;
    return {
      url: this.currentPath,
      title: this.currentTitle,
      duration: this.currentDuration,
    };
  }

  isRunning(): boolean {
    const stream = this.stream;
    return stream !== null && !stream.destroyed && stream.writable;
  }

  sendCommand(command: string[]): void {
    if (!this.isRunning()) {
      log(`[mpv] not running, dropped command: ${command.join(" ")}`);
      return;
    }
    this.write({ command, request_id: this.nextRequestId++ });
  }

  close(): void {
    if (this.isRunning()) this.stream?.end();
  }

  private write(payload: Record<string, unknown>): void {
    this.stream?.write(`${JSON.stringify(payload)}\n`);
  }

  private receive(chunk: string): void {
    this.pending += chunk;
    let newline = this.pending.indexOf("\n");
    while (newline !== -1) {
      const line = this.pending.slice(0, newline).trim();
      this.pending = this.pending.slice(newline + 1);
      if (line.length > 0) {
        const message = parseMpvMessage(line);
        if (message) this.handle(message);
      }
      newline = this.pending.indexOf("\n");
    }
  }

  private handle(message: MpvMessage): void {
    if (message.type === "reply") {
      if (message.error !== "success") {
        log(`[mpv] request ${String(message.requestId)} failed: ${message.error}`);
      }
      return;
    }
    if (message.type === "event") return;

    if (message.name === "path") {
      const path = typeof message.data === "string" ? message.data : null;
      if (path && path !== this.currentPath) {
        this.hasPlayed = true;
        this.currentPath = path;
        this.currentTitle = undefined;
        this.currentDuration = undefined;
        this.emit("track-start", this.currentTrack);
      } else if (!path) {
        this.currentPath = null;
      }
      return;
    }

    if (message.name === "media-title") {
      // Until the stream is opened mpv reports the url itself as the title.
      const title =
        typeof message.data === "string" &&
        message.data.length > 0 &&
        message.data !== this.currentPath
          ? message.data
          : undefined;
      if (title !== this.currentTitle) {
        this.currentTitle = title;
        if (title !== undefined) this.emitUpdate();
      }
      return;
    }

    if (message.name === "duration") {
      const duration =
        typeof message.data === "number" && message.data > 0
          ? Math.round(message.data)
          : undefined;
      if (duration !== this.currentDuration) {
        this.currentDuration = duration;
        if (duration !== undefined) this.emitUpdate();
      }
      return;
    }

    if (message.name === "idle-active" && message.data === true && this.hasPlayed) {
      this.emit("queue-end");
    }
  }

  private emitUpdate(): void {
    const track = this.currentTrack;
    if (track) this.emit("track-update", track);
  }

  private detach(): void {
    if (!this.stream) return;
    this.stream = null;
    this.pending = "";
    this.emit("close");
  }
}
