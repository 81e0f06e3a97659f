import { info, warn } from "./logger";

export type NotifyLevel = "info" | "warn";

export interface Notifier {
  notify(message: string, level: NotifyLevel): void;
}

export class ConsoleNotifier implements Notifier {
  constructor(private readonly prefix = "[radio]") {}

  notify(message: string, level: NotifyLevel): void {
    const line = `${this.prefix} ${message}`;
    if (level === "warn") {
      warn(line);
      return;
    }
    info(line);
  }
}
