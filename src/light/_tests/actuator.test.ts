import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ActuatorScheduler, DEFAULT_RATE_INTERVAL_MS } from "../actuator";
import { OFF_COLOR } from "../../color/mapping";
import { InvalidConfigurationError } from "../../errors";
import type { Color, ColorCommand, LightConnection } from "../../types";

class FakeConnection implements LightConnection {
  readonly label = "test";
  readonly address = "127.0.0.1";
  readonly commands: ColorCommand[] = [];
  closed = false;
  sendColor(command: ColorCommand): void {
    this.commands.push(command);
  }
  async close(): Promise<void> {
    this.closed = true;
  }
}

const color = (hue: number): Color => ({ hue, saturation: 80, lightness: 50 });

describe("light/ActuatorScheduler", () => {
  let conn: FakeConnection;

  beforeEach(() => {
    vi.useFakeTimers();
    conn = new FakeConnection();
  });
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("starts off at the neutral temperature without sending anything", async () => {
    const act = new ActuatorScheduler(conn, { initialTransitionMs: 120 });
    expect(act.getState()).toMatchObject({ color: OFF_COLOR, temperature: 5750, transitionDurationMs: 120 });
    expect(new ActuatorScheduler(new FakeConnection(), { kelvinRange: { min: 2000, max: 6000 } }).getState().temperature).toBe(4000);
    await vi.advanceTimersByTimeAsync(200);
    expect(conn.commands).toEqual([]);
  });

  it("coalesces requests made before the dispatch into one command with the latest value", async () => {
    const act = new ActuatorScheduler(conn);
    act.setColor(color(0));
    act.setColor(color(120));
    expect(vi.getTimerCount()).toBe(1);
    await vi.advanceTimersByTimeAsync(DEFAULT_RATE_INTERVAL_MS - 1);
    expect(conn.commands).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(conn.commands).toEqual([{ color: color(120), kelvin: 5750, durationMs: 0 }]);
    expect(act.commandsSent).toBe(1);
  });

  it("sends color, temperature and duration together from the live state", async () => {
    const act = new ActuatorScheduler(conn);
    act.setColor(color(60));
    act.setTemperature(3000);
    act.setTransitionDuration(250);
    await vi.advanceTimersByTimeAsync(50);
    expect(conn.commands).toEqual([{ color: color(60), kelvin: 3000, durationMs: 250 }]);
  });

  it("waits one interval after the previous command", async () => {
    const act = new ActuatorScheduler(conn);
    act.setColor(color(10));
    await vi.advanceTimersByTimeAsync(50);
    expect(conn.commands).toHaveLength(1);
    act.setColor(color(20));
    await vi.advanceTimersByTimeAsync(49);
    expect(conn.commands).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(conn.commands).toHaveLength(2);

    // Au repos depuis plus d'un intervalle: envoi immédiat
    await vi.advanceTimersByTimeAsync(200);
    act.setColor(color(30));
    await vi.advanceTimersByTimeAsync(1);
    expect(conn.commands).toHaveLength(3);
    expect(conn.commands[2].color).toEqual(color(30));
  });

  it("honours a custom rate interval", async () => {
    const act = new ActuatorScheduler(conn, { rateIntervalMs: 200 });
    act.setColor(color(10));
    await vi.advanceTimersByTimeAsync(199);
    expect(conn.commands).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(conn.commands).toHaveLength(1);
  });

  it("unchanged color or temperature never schedules a dispatch", async () => {
    const act = new ActuatorScheduler(conn);
    const before = act.getState().lastSendTime;
    act.setColor(null);
    act.setColor(OFF_COLOR);
    act.setTemperature(5750);
    expect(vi.getTimerCount()).toBe(0);
    await vi.advanceTimersByTimeAsync(100);
    expect(conn.commands).toHaveLength(0);
    expect(act.getState().lastSendTime).toBe(before);
  });

  it("transition duration alone never schedules a dispatch", async () => {
    const act = new ActuatorScheduler(conn);
    act.setTransitionDuration(400);
    expect(vi.getTimerCount()).toBe(0);
    await vi.advanceTimersByTimeAsync(100);
    expect(conn.commands).toHaveLength(0);
    act.setColor(color(200));
    await vi.advanceTimersByTimeAsync(50);
    expect(conn.commands[0].durationMs).toBe(400);
  });

  it("bounds the number of commands for a burst and ends on the latest color", async () => {
    const act = new ActuatorScheduler(conn);
    const window = 495;
    for (let t = 0; t <= window; t += 5) {
      act.setColor(color(t % 360));
      await vi.advanceTimersByTimeAsync(5);
    }
    await vi.advanceTimersByTimeAsync(100);
    expect(conn.commands.length).toBeLessThanOrEqual(Math.ceil(window / DEFAULT_RATE_INTERVAL_MS) + 1);
    expect(conn.commands.at(-1)?.color).toEqual(color(window % 360));
  });

  it("shutdown sends the off color last, then releases the connection", async () => {
    const act = new ActuatorScheduler(conn);
    act.setColor(color(90));
    await vi.advanceTimersByTimeAsync(50);
    act.setColor(color(180));
    const done = act.shutdown();
    expect(act.shutdown()).toBe(done);
    await vi.advanceTimersByTimeAsync(50);
    await done;
    expect(conn.commands.map((c) => c.color)).toEqual([color(90), OFF_COLOR]);
    expect(conn.closed).toBe(true);
    expect(act.isRunning).toBe(false);
  });

  it("shutdown still sends an off command when the light is already off", async () => {
    const act = new ActuatorScheduler(conn);
    const done = act.shutdown();
    await vi.advanceTimersByTimeAsync(50);
    await done;
    expect(conn.commands).toEqual([{ color: OFF_COLOR, kelvin: 5750, durationMs: 0 }]);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("ignores changes once shut down", async () => {
    const act = new ActuatorScheduler(conn);
    const done = act.shutdown();
    await vi.advanceTimersByTimeAsync(50);
    await done;
    act.setColor(color(45));
    act.setTemperature(3000);
    act.setTransitionDuration(10);
    expect(vi.getTimerCount()).toBe(0);
    expect(act.getState()).toMatchObject({ color: OFF_COLOR, temperature: 5750, transitionDurationMs: 0 });
    expect(conn.commands).toHaveLength(1);
  });

  it("keeps dispatching when a send throws", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => { /* no-op */ });
    const failing = new FakeConnection();
    const send = vi.spyOn(failing, "sendColor").mockImplementationOnce(() => { throw new Error("EHOSTUNREACH"); });
    const act = new ActuatorScheduler(failing);
    act.setColor(color(1));
    await vi.advanceTimersByTimeAsync(50);
    act.setColor(color(2));
    await vi.advanceTimersByTimeAsync(50);
    expect(send).toHaveBeenCalledTimes(2);
    expect(failing.commands).toEqual([{ color: color(2), kelvin: 5750, durationMs: 0 }]);
    expect(act.commandsSent).toBe(2);
  });

  it("rejects a negative initial transition duration", () => {
    expect(() => new ActuatorScheduler(conn, { initialTransitionMs: -1 })).toThrow(InvalidConfigurationError);
    expect(() => new ActuatorScheduler(conn, { rateIntervalMs: 0 })).toThrow(InvalidConfigurationError);
    expect(() => new ActuatorScheduler(conn, { kelvinRange: { min: 9000, max: 2500 } })).toThrow(InvalidConfigurationError);
  });
});
