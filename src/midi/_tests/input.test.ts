import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const midi = vi.hoisted(() => {
  type Listener = (delta: number, message: number[]) => void;
  const state = {
    ports: [] as string[],
    instances: [] as FakeInput[],
  };
  class FakeInput {
    virtualName: string | null = null;
    openedIndex: number | null = null;
    ignored: boolean[] = [];
    closed = false;
    private listener: Listener | null = null;
    constructor() {
      state.instances.push(this);
    }
    getPortCount(): number {
      return state.ports.length;
    }
    getPortName(i: number): string {
      return state.ports[i] ?? "";
    }
    ignoreTypes(sysex: boolean, timing: boolean, sensing: boolean): void {
      this.ignored = [sysex, timing, sensing];
    }
    on(_event: "message", listener: Listener): void {
      this.listener = listener;
    }
    openPort(index: number): void {
      this.openedIndex = index;
    }
    openVirtualPort(name: string): void {
      this.virtualName = name;
    }
    closePort(): void {
      this.closed = true;
    }
    trigger(message: number[]): void {
      this.listener?.(0, message);
    }
  }
  return { state, FakeInput };
});

vi.mock("@julusian/midi", () => ({ Input: midi.FakeInput }));

import { MidiEventSource, findPortByNameFragment } from "../input";
import type { PerformanceEvent } from "../decoder";

function lastInput() {
  const input = midi.state.instances.at(-1);
  if (!input) throw new Error("no Input created");
  return input;
}

describe("midi/input", () => {
  beforeEach(() => {
    midi.state.ports = ["IAC Bus 1", "Keystation 49 MIDI 1"];
    midi.state.instances = [];
    vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("finds a port on a device by case-insensitive fragment", () => {
    const device = {
      getPortCount: () => 2,
      getPortName: (i: number) => ["IAC Bus 1", "Keystation 49 MIDI 1"][i] ?? "",
    };
    expect(findPortByNameFragment(device, " keystation ")).toEqual({ index: 1, name: "Keystation 49 MIDI 1" });
    expect(findPortByNameFragment(device, "IAC")).toEqual({ index: 0, name: "IAC Bus 1" });
    expect(findPortByNameFragment(device, "nope")).toBeNull();
  });

  it("creates a virtual port and streams decoded events", async () => {
    const source = new MidiEventSource({ virtualPort: "Light Input" });
    source.open();
    const input = lastInput();
    expect(input.virtualName).toBe("Light Input");
    expect(input.ignored).toEqual([true, true, true]);
    expect(source.name).toBe("Light Input");
    expect(source.isOpen).toBe(true);

    input.trigger([0x90, 60, 100]);
    input.trigger([0xe0, 0, 0x40]);
    source.close();
    input.trigger([0x80, 60, 0]);

    const received: PerformanceEvent[] = [];
    for await (const evt of source) received.push(evt);
    expect(received.map((e) => e.type)).toEqual(["noteOn", "pitchBend"]);
    expect(input.closed).toBe(true);
    expect(source.isOpen).toBe(false);
  });

  it("opens an existing port when one is named", () => {
    const source = new MidiEventSource({ virtualPort: "Light Input", inputPort: "keystation" });
    source.open();
    expect(midi.state.instances).toHaveLength(1);
    const input = lastInput();
    expect(input.openedIndex).toBe(1);
    expect(input.virtualName).toBeNull();
    expect(source.name).toBe("Keystation 49 MIDI 1");
    source.close();
  });

  it("fails when the named port does not exist", () => {
    const source = new MidiEventSource({ virtualPort: "Light Input", inputPort: "Launchpad" });
    expect(() => source.open()).toThrow(
      "Port MIDI IN introuvable pour 'Launchpad' (disponibles: IAC Bus 1, Keystation 49 MIDI 1)"
    );
    expect(midi.state.instances).toHaveLength(1);
    expect(lastInput().closed).toBe(true);
    expect(source.isOpen).toBe(false);
  });

  it("close() before open() ends the stream", async () => {
    const source = new MidiEventSource({ virtualPort: "Light Input" });
    source.close();
    const iterator = source[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ value: undefined, done: true });
  });
});
