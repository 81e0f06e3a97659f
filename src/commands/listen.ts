import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { info, log } from "../lib/logger";
import { ConsoleNotifier } from "../lib/notify";
import { HistoryStore } from "../history/store";
import { MpvClient } from "../player/mpv";
import type { TrackInfo } from "../player/types";
import { AutoplayController, DiscoveryRunner, SerialQueue } from "../radio";
import { SessionState } from "../session/state";

type ListenOptions = {
  socket?: string;
  radio?: boolean;
};

/**
 * Hook the controller and history up to a connected client. Track starts
 * are recorded and move the cursor; title and duration updates refresh the
 * history entry; queue ends trigger radio mode.
 */
export function wireSession(
  client: MpvClient,
  controller: AutoplayController,
  session: SessionState,
  history: HistoryStore,
  scheduler: SerialQueue
): void {
  const record = (track: TrackInfo) => {
    history.add({
      url: track.url,
      title: session.getTitle(track.url) ?? track.title,
      duration: track.duration,
    });
  };

  client.on("track-start", (track: TrackInfo) => {
    scheduler.post(() => {
      controller.setLastPlayed(track.url);
      record(track);
      log(`[listen] now playing ${track.url}`);
    });
  });

  client.on("track-update", (track: TrackInfo) => {
    scheduler.post(() => {
      // Ignore late updates for a track that is no longer playing.
      if (client.playingPath === track.url) record(track);
    });
  });

  client.on("queue-end", () => {
    scheduler.post(() => {
      const result = controller.onQueueEnd();
      if (result.status === "skipped") {
        log(`[listen] queue end ignored (${result.reason})`);
      }
    });
  });
}

export async function runListen(options: ListenOptions): Promise<void> {
  const config = loadConfig();
  const socketPath = options.socket ?? config.mpv.socket_path;

  const scheduler = new SerialQueue();
  const session = new SessionState();
  const history = new HistoryStore(config.history.path);
  const client = new MpvClient();
  const runner = new DiscoveryRunner({
    binary: config.ytdlp.path,
    resultCount: config.ytdlp.result_count,
    timeoutMs: config.ytdlp.timeout_ms,
    scheduler,
  });
  const controller = new AutoplayController({
    engine: client,
    session,
    notifier: new ConsoleNotifier(),
    runner,
  });
  controller.setEnabled(options.radio !== false);

  wireSession(client, controller, session, history, scheduler);

  const onToggle = () => scheduler.post(() => controller.toggle());
  process.on("SIGUSR1", onToggle);

  try {
    await client.connect(socketPath);
    info(
      `[listen] Connected to mpv at ${socketPath} (radio ${controller.enabled ? "on" : "off"})`
    );
    await new Promise<void>((resolve) => {
      client.once("close", () => resolve());
    });
    info("[listen] mpv closed the connection");
  } finally {
    process.off("SIGUSR1", onToggle);
  }
}

export function registerListenCommand(program: Command): void {
  program
    .command("listen")
    .description("Attach to mpv, record history and keep radio mode running")
    .option("--socket <path>", "mpv IPC socket (--input-ipc-server)")
    .option("--no-radio", "Start with radio mode off (toggle with SIGUSR1)")
    .action(async (options: ListenOptions) => {
      await runListen(options);
    });
}
