import { Command } from "commander";
import { loadConfig } from "../lib/config";
import {
  formatHistoryAsJson,
  formatHistoryAsText,
  type OutputFormat,
} from "../history/formatting";
import { HistoryStore } from "../history/store";
import { MpvClient } from "../player/mpv";

type ListOptions = {
  limit?: number;
  format?: string;
};

type QueueOptions = {
  socket?: string;
};

type QueueDeps = {
  store?: HistoryStore;
  client?: MpvClient;
};

function normalizeFormat(value: string | undefined): OutputFormat {
  const normalized = (value ?? "text").toLowerCase();
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new Error("Unsupported format. Use text or json.");
}

function openStore(): HistoryStore {
  const config = loadConfig();
  return new HistoryStore(config.history.path);
}

export function runList(options: ListOptions, store: HistoryStore = openStore()): void {
  const format = normalizeFormat(options.format);
  const limit =
    typeof options.limit === "number" && Number.isFinite(options.limit) && options.limit > 0
      ? Math.floor(options.limit)
      : undefined;
  const entries = store.get().slice(0, limit);

  if (format === "json") {
    console.log(formatHistoryAsJson(entries));
    return;
  }
  console.log(formatHistoryAsText(entries, Math.floor(Date.now() / 1000)));
}

export function runClear(store: HistoryStore = openStore()): void {
  store.clear();
  console.log("History cleared.");
}

async function connectClient(socket: string | undefined): Promise<MpvClient> {
  const socketPath = socket ?? loadConfig().mpv.socket_path;
  const client = new MpvClient();
  await client.connect(socketPath);
  return client;
}

/**
 * Append entry `position` (1-based, as printed by `history list`) to the
 * running mpv's playlist.
 */
export async function runQueue(
  position: number,
  options: QueueOptions,
  deps: QueueDeps = {}
): Promise<void> {
  const store = deps.store ?? openStore();
  const entries = store.get();
  const entry = Number.isInteger(position) ? entries[position - 1] : undefined;
  if (position < 1 || !entry) {
    throw new Error(
      `No history entry #${String(position)} (history has ${entries.length} entries).`
    );
  }

  const client = deps.client ?? (await connectClient(options.socket));
  try {
    if (!client.isRunning()) {
      throw new Error("mpv is not running.");
    }
    client.sendCommand(["loadfile", entry.url, "append-play"]);
  } finally {
    client.close();
  }
  console.log(`Queued → ${entry.title}`);
}

export function registerHistoryCommand(program: Command): void {
  const historyCmd = program
    .command("history")
    .description("Inspect and manage the play history");

  historyCmd
    .command("list")
    .description("Show recently played tracks, newest first")
    .option("--limit <count>", "Max entries", (v) => Number.parseInt(v, 10))
    .option("--format <format>", "Output format (text|json)", "text")
    .action((options: ListOptions) => runList(options));

  historyCmd
    .command("queue")
    .description("Append a history entry to mpv's playlist")
    .argument("<position>", "Entry number as shown by history list", (v) =>
      Number.parseInt(v, 10)
    )
    .option("--socket <path>", "mpv IPC socket (--input-ipc-server)")
    .action(async (position: number, options: QueueOptions) => {
      await runQueue(position, options);
    });

  historyCmd
    .command("clear")
    .description("Remove every history entry")
    .action(() => runClear());
}
