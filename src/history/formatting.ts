import type { HistoryEntry } from "./store";

export type OutputFormat = "text" | "json";

export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return "";
  const whole = Math.floor(seconds);
  return `${Math.floor(whole / 60)}:${String(whole % 60).padStart(2, "0")}`;
}

/**
 * Both arguments are unix seconds.
 */
export function formatRelativeTime(timestamp: number, now: number): string {
  const diff = now - timestamp;
  if (diff < 60) return "just now";
  if (diff < 3600) return `${Math.floor(diff / 60)}m ago`;
  if (diff < 86400) return `${Math.floor(diff / 3600)}h ago`;
  return `${Math.floor(diff / 86400)}d ago`;
}

export function formatHistoryAsText(entries: HistoryEntry[], now: number): string {
  if (entries.length === 0) {
    return "No history yet.";
  }
  const lines = ["Recently played:"];
  entries.forEach((entry, index) => {
    const duration = formatDuration(entry.duration);
    const details = [duration, formatRelativeTime(entry.timestamp, now)]
      .filter((part) => part.length > 0)
      .join(" • ");
    lines.push(`  ${index + 1}. ${entry.title} (${details})`);
    lines.push(`     ${entry.url}`);
  });
  return lines.join("\n");
}

export function formatHistoryAsJson(entries: HistoryEntry[]): string {
  return JSON.stringify({ count: entries.length, entries }, null, 2);
}
