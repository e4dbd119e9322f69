import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import { ProgressBroker } from "./broker.js";
import type { ProgressEvent } from "../shared/types.js";

function makeEvent(taskId: string, message = "tick"): ProgressEvent {
  return { taskId, type: "stage_update", stage: "Architect", status: "running", message, timestamp: 0 };
}

function makeClock(start = 0) {
  let time = start;
  return { now: () => time, set: (value: number) => (time = value) };
}

describe("ProgressBroker", () => {
  it("delivers a broadcast to every subscriber of the task", async () => {
    const broker = new ProgressBroker();
    const a = vi.fn();
    const b = vi.fn();
    const other = vi.fn();
    broker.register("task-1", "a", a);
    broker.register("task-1", "b", b);
    broker.register("task-2", "c", other);

    const event = makeEvent("task-1");
    const delivered = await broker.broadcast("task-1", event);

    expect(delivered).toBe(2);
    expect(a).toHaveBeenCalledWith(event);
    expect(b).toHaveBeenCalledWith(event);
    expect(other).not.toHaveBeenCalled();
  });

  it("treats broadcasting to a task without subscribers as a no-op", async () => {
    const broker = new ProgressBroker();
    await expect(broker.broadcast("nobody", makeEvent("nobody"))).resolves.toBe(0);
    expect(broker.getConnectedTasks()).toEqual([]);
  });

  it("tracks buckets and removes them once empty", () => {
    const broker = new ProgressBroker();
    broker.register("task-1", "a", vi.fn());
    broker.register("task-1", "b", vi.fn());
    broker.register("task-2", "c", vi.fn());

    expect(broker.getTaskClients("task-1")).toEqual(["a", "b"]);
    expect(broker.getConnectedTasks()).toEqual(["task-1", "task-2"]);
    expect(broker.getTotalConnections()).toBe(3);

    expect(broker.unregister("task-1", "a")).toBe(true);
    expect(broker.unregister("task-1", "b")).toBe(true);
    expect(broker.getConnectedTasks()).toEqual(["task-2"]);
    expect(broker.getTaskClients("task-1")).toEqual([]);
    expect(broker.getTotalConnections()).toBe(1);
  });

  it("ignores unregistering an unknown subscriber", () => {
    const broker = new ProgressBroker();
    broker.register("task-1", "a", vi.fn());

    expect(broker.unregister("task-1", "missing")).toBe(false);
    expect(broker.unregister("missing", "a")).toBe(false);
    expect(broker.unregister("task-1", "a")).toBe(true);
    expect(broker.unregister("task-1", "a")).toBe(false);
  });

  it("replaces a subscriber registered twice under the same client id", async () => {
    const broker = new ProgressBroker();
    const first = vi.fn();
    const second = vi.fn();
    broker.register("task-1", "a", first);
    broker.register("task-1", "a", second);

    await broker.broadcast("task-1", makeEvent("task-1"));

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledOnce();
    expect(broker.getTotalConnections()).toBe(1);
  });

  it("isolates a failing subscriber and drops it", async () => {
    const broker = new ProgressBroker();
    const close = vi.fn();
    const healthy = vi.fn();
    const broken = vi.fn(() => {
      throw new Error("socket closed");
    });
    broker.register("task-1", "broken", broken, { close });
    broker.register("task-1", "healthy", healthy);

    const delivered = await broker.broadcast("task-1", makeEvent("task-1", "first"));

    expect(delivered).toBe(1);
    expect(healthy).toHaveBeenCalledOnce();
    expect(close).toHaveBeenCalledOnce();
    expect(broker.getTaskClients("task-1")).toEqual(["healthy"]);

    await broker.broadcast("task-1", makeEvent("task-1", "second"));
    expect(broken).toHaveBeenCalledOnce();
    expect(healthy).toHaveBeenCalledTimes(2);
  });

  it("drops subscribers whose async send rejects", async () => {
    const broker = new ProgressBroker();
    broker.register("task-1", "a", async () => {
      throw new Error("write EPIPE");
    });

    await expect(broker.broadcast("task-1", makeEvent("task-1"))).resolves.toBe(0);
    expect(broker.getConnectedTasks()).toEqual([]);
  });

  it("logs delivery failures as warnings", async () => {
    const lines: Array<{ level: number; msg: string; clientId?: string }> = [];
    const logger = pino({ level: "warn" }, { write: (line: string) => lines.push(JSON.parse(line)) });
    const broker = new ProgressBroker({ logger });
    broker.register("task-1", "a", () => {
      throw new Error("gone");
    });

    await broker.broadcast("task-1", makeEvent("task-1"));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 40, msg: "Dropping subscriber", clientId: "a" });
  });

  it("does not drop a replacement registered while a failing delivery was in flight", async () => {
    const broker = new ProgressBroker();
    const replacement = vi.fn();
    broker.register("task-1", "a", async () => {
      broker.register("task-1", "a", replacement);
      throw new Error("old connection died");
    });

    await broker.broadcast("task-1", makeEvent("task-1"));

    expect(broker.getTaskClients("task-1")).toEqual(["a"]);
    await broker.broadcast("task-1", makeEvent("task-1"));
    expect(replacement).toHaveBeenCalledOnce();
  });

  it("delivers to the subscriber set snapshotted at broadcast time", async () => {
    const broker = new ProgressBroker();
    const late = vi.fn();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    broker.register("task-1", "slow", () => gate);

    const inFlight = broker.broadcast("task-1", makeEvent("task-1", "first"));
    broker.register("task-1", "late", late);
    release();
    await inFlight;
    expect(late).not.toHaveBeenCalled();

    await broker.broadcast("task-1", makeEvent("task-1", "second"));
    expect(late).toHaveBeenCalledOnce();
  });

  it("does not let a slow subscriber hold up registry changes", async () => {
    const broker = new ProgressBroker({ sendTimeout: 20 });
    broker.register("task-1", "slow", () => new Promise<void>(() => {}));

    const inFlight = broker.broadcast("task-1", makeEvent("task-1"));
    broker.register("task-2", "b", vi.fn());
    broker.unregister("task-1", "slow");

    expect(broker.getConnectedTasks()).toEqual(["task-2"]);
    await expect(inFlight).resolves.toBe(0);
  });

  it("drops a subscriber whose send never settles", async () => {
    const lines: Array<{ level: number; msg: string; clientId?: string; err?: { message: string } }> = [];
    const logger = pino({ level: "warn" }, { write: (line: string) => lines.push(JSON.parse(line)) });
    const broker = new ProgressBroker({ sendTimeout: 20, logger });
    const close = vi.fn();
    const healthy = vi.fn();
    broker.register("task-1", "stuck", () => new Promise<void>(() => {}), { close });
    broker.register("task-1", "healthy", healthy);

    const delivered = await broker.broadcast("task-1", makeEvent("task-1"));

    expect(delivered).toBe(1);
    expect(healthy).toHaveBeenCalledOnce();
    expect(close).toHaveBeenCalledOnce();
    expect(broker.getTaskClients("task-1")).toEqual(["healthy"]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 40, msg: "Dropping subscriber", clientId: "stuck" });
    expect(lines[0].err?.message).toBe('Delivery to client "stuck" of task "task-1" failed: Send timed out after 20ms');
  });

  it("sends to a single client", async () => {
    const broker = new ProgressBroker();
    const a = vi.fn();
    const b = vi.fn();
    broker.register("task-1", "a", a);
    broker.register("task-1", "b", b);

    expect(await broker.sendToClient("task-1", "a", makeEvent("task-1"))).toBe(true);
    expect(await broker.sendToClient("task-1", "missing", makeEvent("task-1"))).toBe(false);
    expect(a).toHaveBeenCalledOnce();
    expect(b).not.toHaveBeenCalled();
  });

  describe("evictIdle", () => {
    it("removes exactly the subscribers idle longer than the timeout", () => {
      const clock = makeClock(0);
      const broker = new ProgressBroker({ now: clock.now });
      const closeOld = vi.fn();
      const closeFresh = vi.fn();

      broker.register("task-1", "old", vi.fn(), { close: closeOld });
      clock.set(500);
      broker.register("task-1", "edge", vi.fn());
      clock.set(900);
      broker.register("task-2", "fresh", vi.fn(), { close: closeFresh });

      // idle times at t=1500: old 1500, edge 1000, fresh 600
      const evicted = broker.evictIdle(1_000, 1_500);

      expect(evicted).toBe(1);
      expect(closeOld).toHaveBeenCalledOnce();
      expect(closeFresh).not.toHaveBeenCalled();
      expect(broker.getTaskClients("task-1")).toEqual(["edge"]);
      expect(broker.getTaskClients("task-2")).toEqual(["fresh"]);
    });

    it("counts heartbeats and successful sends as activity", async () => {
      const clock = makeClock(0);
      const broker = new ProgressBroker({ now: clock.now });
      broker.register("task-1", "heartbeat", vi.fn());
      broker.register("task-1", "silent", vi.fn());
      broker.register("task-2", "receiver", vi.fn());

      clock.set(800);
      expect(broker.touch("task-1", "heartbeat")).toBe(true);
      await broker.broadcast("task-2", makeEvent("task-2"));

      expect(broker.evictIdle(500, 1_000)).toBe(1);
      expect(broker.getTaskClients("task-1")).toEqual(["heartbeat"]);
      expect(broker.getTaskClients("task-2")).toEqual(["receiver"]);
    });

    it("reports unknown subscribers on touch", () => {
      const broker = new ProgressBroker();
      expect(broker.touch("task-1", "missing")).toBe(false);
    });

    it("runs periodically until stopped", async () => {
      const clock = makeClock(0);
      const broker = new ProgressBroker({ now: clock.now });
      broker.register("task-1", "a", vi.fn());

      const stop = broker.startEviction({ idleTimeout: 1_000, interval: 10 });
      clock.set(900);
      await new Promise((resolve) => setTimeout(resolve, 40));
      expect(broker.getTotalConnections()).toBe(1);

      clock.set(1_200);
      await new Promise((resolve) => setTimeout(resolve, 40));
      expect(broker.getTotalConnections()).toBe(0);

      broker.register("task-1", "b", vi.fn());
      stop();
      clock.set(5_000);
      await new Promise((resolve) => setTimeout(resolve, 40));
      expect(broker.getTotalConnections()).toBe(1);
    });
  });

  it("dispose stops eviction and forgets every subscriber", async () => {
    const clock = makeClock(0);
    const broker = new ProgressBroker({ now: clock.now });
    const close = vi.fn();
    broker.register("task-1", "a", vi.fn(), { close });
    broker.startEviction({ idleTimeout: 1, interval: 5 });
    clock.set(100);

    broker.dispose();
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(broker.getTotalConnections()).toBe(0);
    expect(close).not.toHaveBeenCalled();
  });
});
