import { Input } from "@julusian/midi";
import { createLogger } from "../logger";
import { AsyncQueue } from "../shared/asyncQueue";
import { decodeMidi, hex } from "./decoder";
import type { PerformanceEvent } from "./decoder";

const log = createLogger("midi");

export interface MidiPortInfo {
  index: number;
  name: string;
}

export interface MidiSourceOptions {
  /** Nom du port virtuel à créer (si `inputPort` absent) */
  virtualPort: string;
  /** Fragment de nom d'un port existant à ouvrir à la place du port virtuel */
  inputPort?: string;
}

/** Sous‑ensemble d'un port `@julusian/midi` suffisant pour énumérer ses ports. */
export interface PortEnumerator {
  getPortCount(): number;
  getPortName(index: number): string;
}

export function portsOf(device: PortEnumerator): MidiPortInfo[] {
  const ports: MidiPortInfo[] = [];
  for (let i = 0; i < device.getPortCount(); i += 1) {
    ports.push({ index: i, name: device.getPortName(i) });
  }
  return ports;
}

/**
 * Recherche un port par fragment de nom (insensible à la casse) sur un device déjà créé.
 */
export function findPortByNameFragment(device: PortEnumerator, nameFragment: string): MidiPortInfo | null {
  const needle = nameFragment.trim().toLowerCase();
  return portsOf(device).find((p) => p.name.toLowerCase().includes(needle)) ?? null;
}

/**
 * Source d'événements MIDI: port virtuel (ou port existant) exposé en itérable asynchrone.
 * `close()` ferme le port et termine l'itération.
 */
export class MidiEventSource implements AsyncIterable<PerformanceEvent> {
  private input: Input | null = null;
  private readonly queue = new AsyncQueue<PerformanceEvent>();
  private portName = "";

  constructor(private readonly options: MidiSourceOptions) {}

  /**
   * Ouvre le port.
   * @throws Error si `inputPort` est défini et introuvable
   */
  open(): void {
    if (this.input) return;
    const input = new Input();
    input.ignoreTypes(true, true, true);
    input.on("message", (_delta: number, message: number[]) => {
      log.trace(`RX [${hex(message)}]`);
      this.queue.push(decodeMidi(message.slice()));
    });
    const wanted = this.options.inputPort?.trim();
    if (wanted) {
      const port = findPortByNameFragment(input, wanted);
      if (!port) {
        const known = portsOf(input).map((p) => p.name);
        input.closePort();
        throw new Error(
          `Port MIDI IN introuvable pour '${wanted}' (disponibles: ${known.length ? known.join(", ") : "aucun"})`
        );
      }
      input.openPort(port.index);
      this.portName = port.name;
      log.info(`Port MIDI ouvert '${port.name}'`);
    } else {
      input.openVirtualPort(this.options.virtualPort);
      this.portName = this.options.virtualPort;
      log.info(`Port MIDI virtuel créé '${this.options.virtualPort}'`);
    }
    this.input = input;
  }

  get name(): string {
    return this.portName;
  }

  get isOpen(): boolean {
    return this.input !== null;
  }

  close(): void {
    this.queue.end();
    if (!this.input) return;
    try {
      this.input.closePort();
    } catch (err) {
      log.warn("Fermeture du port MIDI échouée:", err);
    }
    this.input = null;
    log.info("Port MIDI fermé.");
  }

  [Symbol.asyncIterator](): AsyncIterator<PerformanceEvent> {
    return this.queue[Symbol.asyncIterator]();
  }
}
