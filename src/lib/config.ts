import fs from "fs";
import yaml from "yaml";
import {
  defaultConfigPath,
  defaultHistoryPath,
  defaultMpvSocketPath,
  expandHome,
} from "./paths";

export type RadioConfig = {
  ytdlp: {
    path: string;
    result_count: number;
    timeout_ms: number;
  };
  mpv: {
    socket_path: string;
  };
  history: {
    path: string;
  };
};

type PartialConfig = {
  ytdlp?: Partial<RadioConfig["ytdlp"]>;
  mpv?: Partial<RadioConfig["mpv"]>;
  history?: Partial<RadioConfig["history"]>;
};

export const DEFAULT_RESULT_COUNT = 5;

const DEFAULT_CONFIG: RadioConfig = {
  ytdlp: {
    path: "yt-dlp",
    result_count: DEFAULT_RESULT_COUNT,
    timeout_ms: 0,
  },
  mpv: {
    socket_path: defaultMpvSocketPath(),
  },
  history: {
    path: defaultHistoryPath(),
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(section: unknown, key: string): string | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function pickNumber(section: unknown, key: string): number | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Narrow a parsed YAML document to the fields we understand. Unknown keys and
 * wrongly-typed values are dropped rather than rejected.
 */
export function parseConfigFile(raw: string): PartialConfig {
  const parsed: unknown = yaml.parse(raw);
  if (!isRecord(parsed)) return {};

  return {
    ytdlp: {
      path: pickString(parsed.ytdlp, "path"),
      result_count: pickNumber(parsed.ytdlp, "result_count"),
      timeout_ms: pickNumber(parsed.ytdlp, "timeout_ms"),
    },
    mpv: {
      socket_path: pickString(parsed.mpv, "socket_path"),
    },
    history: {
      path: pickString(parsed.history, "path"),
    },
  };
}

function normalizeResultCount(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_RESULT_COUNT;
  }
  return Math.floor(value);
}

function normalizeTimeout(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value);
}

export function loadConfig(): RadioConfig {
  const configPath = expandHome(
    process.env.YTRADIO_CONFIG_PATH ?? defaultConfigPath()
  );

  let fileConfig: PartialConfig = {};
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, "utf8");
    fileConfig = parseConfigFile(raw);
  }

  const merged: RadioConfig = {
    ytdlp: {
      path: fileConfig.ytdlp?.path ?? DEFAULT_CONFIG.ytdlp.path,
      result_count: normalizeResultCount(fileConfig.ytdlp?.result_count),
      timeout_ms: normalizeTimeout(fileConfig.ytdlp?.timeout_ms),
    },
    mpv: {
      socket_path:
        fileConfig.mpv?.socket_path ?? DEFAULT_CONFIG.mpv.socket_path,
    },
    history: {
      path: fileConfig.history?.path ?? DEFAULT_CONFIG.history.path,
    },
  };

  const ytdlpPath = process.env.YTRADIO_YTDLP_PATH ?? merged.ytdlp.path;
  const socketPath = process.env.YTRADIO_MPV_SOCKET ?? merged.mpv.socket_path;
  const historyPath = process.env.YTRADIO_HISTORY_PATH ?? merged.history.path;

  return {
    ytdlp: {
      path: expandHome(ytdlpPath),
      result_count: merged.ytdlp.result_count,
      timeout_ms: merged.ytdlp.timeout_ms,
    },
    mpv: { socket_path: expandHome(socketPath) },
    history: { path: expandHome(historyPath) },
  };
}
