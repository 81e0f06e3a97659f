import fs from "fs";
import path from "path";

export const MAX_HISTORY_ENTRIES = 100;

export type HistoryEntry = {
  title: string;
  url: string;
  /** Seconds; 0 when unknown. */
  duration: number;
  /** Unix time in seconds. */
  timestamp: number;
};

export type NewHistoryEntry = {
  url: string;
  title?: string | undefined;
  duration?: number | undefined;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEntry(value: unknown): HistoryEntry | null {
  if (!isRecord(value) || typeof value.url !== "string" || value.url === "") {
    return null;
  }
  return {
    title: typeof value.title === "string" ? value.title : "Unknown",
    url: value.url,
    duration: typeof value.duration === "number" ? value.duration : 0,
    timestamp: typeof value.timestamp === "number" ? value.timestamp : 0,
  };
}

/**
 * Play history kept as a JSON array, newest first, one entry per url.
 * A missing or corrupt file reads as an empty history.
 */
export class HistoryStore {
  constructor(
    readonly filePath: string,
    private readonly now: () => number = Date.now
  ) {}

  get(): HistoryEntry[] {
    if (!fs.existsSync(this.filePath)) return [];
    let parsed: unknown;
    try {
      const raw = fs.readFileSync(this.filePath, "utf8");
      if (raw.trim() === "") return [];
      parsed = JSON.parse(raw);
    } catch {
      return [];
    }
    if (!Array.isArray(parsed)) return [];

    const entries: HistoryEntry[] = [];
    for (const item of parsed) {
      const entry = toEntry(item);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  add(entry: NewHistoryEntry): void {
    if (!entry.url) return;

    const history = this.get().filter((item) => item.url !== entry.url);
    history.unshift({
      title: entry.title ?? "Unknown",
      url: entry.url,
      duration: entry.duration ?? 0,
      timestamp: Math.floor(this.now() / 1000),
    });

    this.save(history.slice(0, MAX_HISTORY_ENTRIES));
  }

  clear(): void {
    this.save([]);
  }

  private save(entries: HistoryEntry[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(entries));
  }
}
