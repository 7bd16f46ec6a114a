/**
 * Événements de jeu reconnus par le router. Toute autre trame devient `other`.
 */
export type PerformanceEventType = "noteOn" | "noteOff" | "pitchBend" | "controlChange" | "other";

interface BaseEvent {
  channel?: number; // 1..16 quand applicable
  raw: number[];
}

export interface NoteOnEvent extends BaseEvent {
  type: "noteOn";
  channel: number;
  note: number; // 0..127
  velocity: number; // 0..127, 0 conservé tel quel
}

export interface NoteOffEvent extends BaseEvent {
  type: "noteOff";
  channel: number;
  note: number;
  velocity: number;
}

export interface PitchBendEvent extends BaseEvent {
  type: "pitchBend";
  channel: number;
  pitch: number; // -8192..8191 (0 = neutre)
}

export interface ControlChangeEvent extends BaseEvent {
  type: "controlChange";
  channel: number;
  controller: number; // 0..127
  value: number; // 0..127
}

export interface OtherEvent extends BaseEvent {
  type: "other";
}

export type PerformanceEvent = NoteOnEvent | NoteOffEvent | PitchBendEvent | ControlChangeEvent | OtherEvent;

/** Numéro de CC "modulation" (molette). */
export const CC_MODULATION = 1;

/**
 * Décode une trame MIDI brute.
 * Note On vélocité 0 reste un `noteOn`: la politique est décidée par le router.
 */
export function decodeMidi(raw: number[]): PerformanceEvent {
  if (raw.length === 0) return { type: "other", raw };
  const status = raw[0];
  if (status >= 0xf0 || status < 0x80) return { type: "other", raw };

  const high = (status & 0xf0) >> 4;
  const channel = (status & 0x0f) + 1;
  const d1 = (raw[1] ?? 0) & 0x7f;
  const d2 = (raw[2] ?? 0) & 0x7f;

  switch (high) {
    case 0x8:
      return { type: "noteOff", channel, raw, note: d1, velocity: d2 };
    case 0x9:
      return { type: "noteOn", channel, raw, note: d1, velocity: d2 };
    case 0xB:
      return { type: "controlChange", channel, raw, controller: d1, value: d2 };
    case 0xE: {
      const value14 = (d2 << 7) | d1; // LSB (d1) + MSB (d2)
      return { type: "pitchBend", channel, raw, pitch: value14 - 8192 };
    }
    default:
      return { type: "other", channel, raw };
  }
}

export function formatEvent(evt: PerformanceEvent): string {
  switch (evt.type) {
    case "noteOn":
      return `NoteOn ch=${evt.channel} note=${evt.note} vel=${evt.velocity}`;
    case "noteOff":
      return `NoteOff ch=${evt.channel} note=${evt.note} vel=${evt.velocity}`;
    case "pitchBend":
      return `PitchBend ch=${evt.channel} pitch=${evt.pitch}`;
    case "controlChange":
      return `CC ch=${evt.channel} cc=${evt.controller} val=${evt.value}`;
    case "other":
      return `Other ch=${evt.channel ?? "-"} [${hex(evt.raw)}]`;
  }
}

/**
 * Représentation hexadécimale lisible (ex: "90 3c 7f").
 */
export function hex(bytes: number[]): string {
  return bytes.map((b) => b.toString(16).padStart(2, "0")).join(" ");
}
