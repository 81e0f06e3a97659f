let verbose = process.env.YTRADIO_VERBOSE === "1";

export function setVerbose(value: boolean): void {
  verbose = value;
}

/**
 * Debug output. Goes to stderr so stdout stays clean for command output.
 */
export function log(message: string): void {
  if (!verbose) return;
  console.error(message);
}

export function info(message: string): void {
  console.error(message);
}

export function warn(message: string): void {
  console.error(`warning: ${message}`);
}
