import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { DiscoveryRunner } from "../radio/runner";
import type { PlayCandidate } from "../radio/types";

type RelatedOptions = {
  format?: string;
  count?: number;
};

type OutputFormat = "text" | "json";

function normalizeFormat(value: string | undefined): OutputFormat {
  const normalized = (value ?? "text").toLowerCase();
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new Error("Unsupported format. Use text or json.");
}

function normalizeCount(value: number | undefined, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}

export function formatPick(
  format: OutputFormat,
  seedUrl: string,
  pick: PlayCandidate
): string {
  if (format === "json") {
    return JSON.stringify({ seed: seedUrl, url: pick.url, title: pick.title }, null, 2);
  }
  return `${pick.title}\n${pick.url}`;
}

export async function runRelated(url: string, options: RelatedOptions): Promise<void> {
  const seed = url.trim();
  if (seed.length === 0) {
    throw new Error("A track url is required.");
  }
  const format = normalizeFormat(options.format);
  const config = loadConfig();

  const runner = new DiscoveryRunner({
    binary: config.ytdlp.path,
    resultCount: normalizeCount(options.count, config.ytdlp.result_count),
    timeoutMs: config.ytdlp.timeout_ms,
  });

  const outcome = await runner.discover(seed);
  if (!outcome.ok) {
    throw new Error(outcome.message);
  }
  console.log(formatPick(format, seed, outcome.candidate));
}

export function registerRelatedCommand(program: Command): void {
  program
    .command("related")
    .description("Find one track related to the given url")
    .argument("<url>", "Url of the seed track")
    .option("--format <format>", "Output format (text|json)", "text")
    .option(
      "--count <count>",
      "How many search results to ask yt-dlp for",
      (value) => Number.parseInt(value, 10)
    )
    .action(async (url: string, options: RelatedOptions) => {
      await runRelated(url, options);
    });
}
