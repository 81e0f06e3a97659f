import os from "os";
import path from "path";

export function expandHome(input: string): string {
  if (input === "~") return os.homedir();
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function defaultConfigPath(): string {
  const base = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(base, "ytradio", "config.yaml");
}

export function defaultHistoryPath(): string {
  const base =
    process.env.XDG_DATA_HOME || path.join(os.homedir(), ".local", "share");
  return path.join(base, "ytradio", "history.json");
}

export function defaultMpvSocketPath(): string {
  return path.join(os.tmpdir(), "mpvsocket");
}
