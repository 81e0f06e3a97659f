import { describe, expect, test } from "vitest";

import type { Notifier, NotifyLevel } from "../../lib/notify";
import type { PlaybackEngine } from "../../player/types";
import { SessionState } from "../../session/state";
import { AutoplayController } from "../controller";
import { DiscoveryRunner } from "../runner";
import { SerialQueue } from "../scheduler";
import { fakeSpawn, type FakeProcess } from "./fakeProcess";

class FakeEngine implements PlaybackEngine {
  running = true;
  readonly commands: string[][] = [];

  isRunning(): boolean {
    return this.running;
  }

  sendCommand(command: string[]): void {
    this.commands.push(command);
  }
}

class RecordingNotifier implements Notifier {
  readonly messages: Array<{ message: string; level: NotifyLevel }> = [];

  notify(message: string, level: NotifyLevel): void {
    this.messages.push({ message, level });
  }
}

const OUTPUT = [
  '{"webpage_url":"https://x/b","title":"Song B"}',
  '{"url":"https://x/a","title":"Song A"}',
  '{"webpage_url":"https://x/c","title":"Song C"}',
].join("\n");

function setup(random: () => number = () => 0) {
  const fake = fakeSpawn();
  const scheduler = new SerialQueue();
  const engine = new FakeEngine();
  const notifier = new RecordingNotifier();
  const session = new SessionState();
  const runner = new DiscoveryRunner({ spawn: fake.spawn, scheduler, random });
  const controller = new AutoplayController({ engine, session, notifier, runner });
  return { ...fake, scheduler, engine, notifier, session, controller };
}

function firstProcess(processes: FakeProcess[]): FakeProcess {
  const child = processes[0];
  if (!child) throw new Error("no process was spawned");
  return child;
}

describe("AutoplayController", () => {
  test("starts disabled with no cursor", () => {
    const { controller } = setup();
    expect(controller.enabled).toBe(false);
    expect(controller.lastUrl).toBeNull();
  });

  test("toggle flips the mode and notifies", () => {
    const { controller, notifier } = setup();
    expect(controller.toggle()).toBe(true);
    expect(controller.toggle()).toBe(false);
    expect(notifier.messages).toEqual([
      { message: "Radio mode ON", level: "info" },
      { message: "Radio mode OFF", level: "info" },
    ]);
  });

  test("does nothing when radio mode is off", () => {
    const { controller, calls, notifier } = setup();
    controller.setLastPlayed("https://x/a");

    expect(controller.onQueueEnd()).toEqual({ status: "skipped", reason: "disabled" });
    expect(calls).toEqual([]);
    expect(notifier.messages).toEqual([]);
  });

  test("does nothing without a last played url", () => {
    const { controller, calls, notifier } = setup();
    controller.setEnabled(true);

    expect(controller.onQueueEnd()).toEqual({ status: "skipped", reason: "no_last_url" });
    controller.setLastPlayed("");
    expect(controller.onQueueEnd()).toEqual({ status: "skipped", reason: "no_last_url" });
    expect(calls).toEqual([]);
    expect(notifier.messages).toEqual([]);
  });

  test("does nothing when the player is not running", () => {
    const { controller, calls, engine } = setup();
    controller.setEnabled(true);
    controller.setLastPlayed("https://x/a");
    engine.running = false;

    expect(controller.onQueueEnd()).toEqual({
      status: "skipped",
      reason: "player_stopped",
    });
    expect(calls).toEqual([]);
  });

  test("queues a related track and moves the cursor", async () => {
    const { controller, calls, processes, scheduler, engine, session, notifier } =
      setup(() => 0.99);
    controller.setEnabled(true);
    controller.setLastPlayed("https://x/a");

    expect(controller.onQueueEnd()).toEqual({ status: "started" });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.args.at(-1)).toBe("ytsearch5:related to https://x/a");
    expect(controller.inFlight).toBe(true);

    await firstProcess(processes).finish(OUTPUT, 0);
    await scheduler.drained();

    expect(session.getTitle("https://x/c")).toBe("Song C");
    expect(engine.commands).toEqual([["loadfile", "https://x/c", "append-play"]]);
    expect(controller.lastUrl).toBe("https://x/c");
    expect(controller.inFlight).toBe(false);
    expect(notifier.messages).toEqual([
      { message: "Finding related track...", level: "info" },
      { message: "Auto-playing → Song C", level: "info" },
    ]);
  });

  test("the winner is one of the non-excluded results", async () => {
    const { controller, processes, scheduler, engine, session } = setup(Math.random);
    controller.setEnabled(true);
    controller.setLastPlayed("https://x/a");

    controller.onQueueEnd();
    await firstProcess(processes).finish(OUTPUT, 0);
    await scheduler.drained();

    const winner = controller.lastUrl;
    expect(["https://x/b", "https://x/c"]).toContain(winner);
    expect(engine.commands).toEqual([["loadfile", winner, "append-play"]]);
    expect(session.size).toBe(1);
  });

  test("leaves state alone and warns once when the tool fails", async () => {
    const { controller, processes, scheduler, engine, session, notifier } = setup();
    controller.setEnabled(true);
    controller.setLastPlayed("https://x/a");

    controller.onQueueEnd();
    await firstProcess(processes).finish(OUTPUT, 1);
    await scheduler.drained();

    expect(controller.lastUrl).toBe("https://x/a");
    expect(engine.commands).toEqual([]);
    expect(session.size).toBe(0);
    expect(notifier.messages.filter((m) => m.level === "warn")).toEqual([
      { message: "Failed to find related tracks", level: "warn" },
    ]);
    expect(controller.enabled).toBe(true);
  });

  test("warns when nothing related is found", async () => {
    const { controller, processes, scheduler, engine, notifier } = setup();
    controller.setEnabled(true);
    controller.setLastPlayed("https://x/a");

    controller.onQueueEnd();
    await firstProcess(processes).finish('{"url":"https://x/a"}\n', 0);
    await scheduler.drained();

    expect(engine.commands).toEqual([]);
    expect(notifier.messages.at(-1)).toEqual({
      message: "No related tracks found",
      level: "warn",
    });
  });

  test("warns when yt-dlp cannot be started", async () => {
    const { controller, processes, scheduler, notifier } = setup();
    controller.setEnabled(true);
    controller.setLastPlayed("https://x/a");

    controller.onQueueEnd();
    firstProcess(processes).emit("error", new Error("spawn yt-dlp ENOENT"));
    await scheduler.drained();

    expect(controller.lastUrl).toBe("https://x/a");
    expect(notifier.messages.at(-1)).toEqual({
      message: "Could not start yt-dlp: spawn yt-dlp ENOENT",
      level: "warn",
    });
  });

  test("allows only one discovery at a time", async () => {
    const { controller, calls, processes, scheduler } = setup();
    controller.setEnabled(true);
    controller.setLastPlayed("https://x/a");

    expect(controller.onQueueEnd()).toEqual({ status: "started" });
    expect(controller.onQueueEnd()).toEqual({ status: "skipped", reason: "in_flight" });
    expect(calls).toHaveLength(1);

    await firstProcess(processes).finish(OUTPUT, 0);
    await scheduler.drained();
    expect(controller.onQueueEnd()).toEqual({ status: "started" });
    expect(calls).toHaveLength(2);
  });
});
