import { PitchRangeError } from "../errors";
import type { Color, KelvinRange } from "../types";

/**
 * Teintes HSL nommées, d'après le cercle chromatique de Newton.
 */
export const HslHue = {
  RED: 0,
  RED_ORANGE: 15,
  ORANGE: 30,
  ORANGE_YELLOW: 45,
  YELLOW: 60,
  YELLOW_GREEN: 90,
  GREEN: 120,
  GREEN_BLUE: 180,
  BLUE: 240,
  BLUE_INDIGO: 255,
  INDIGO_VIOLET: 285,
  VIOLET: 300,
  VIOLET_RED: 330,
} as const;

export const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

export type NoteName = (typeof NOTE_NAMES)[number];

/** Teinte associée à chaque classe de hauteur (C..B). */
export const NEWTON_HUES: Record<NoteName, number> = {
  "C": HslHue.INDIGO_VIOLET,
  "C#": HslHue.VIOLET,
  "D": HslHue.VIOLET_RED,
  "D#": HslHue.RED,
  "E": HslHue.RED_ORANGE,
  "F": HslHue.ORANGE_YELLOW,
  "F#": HslHue.YELLOW,
  "G": HslHue.YELLOW_GREEN,
  "G#": HslHue.GREEN,
  "A": HslHue.GREEN_BLUE,
  "A#": HslHue.BLUE,
  "B": HslHue.BLUE_INDIGO,
};

export const OFF_COLOR: Color = Object.freeze({ hue: HslHue.RED, saturation: 0, lightness: 0 });

export const DEFAULT_KELVIN_RANGE: Readonly<KelvinRange> = Object.freeze({ min: 2500, max: 9000 });

export const MAX_PITCH = 8192;

const TOTAL_NOTES = NOTE_NAMES.length;
const OCTAVES = 11;
const COLOR_CACHE_LIMIT = 128 * 128;
const colorCache = new Map<number, Color>();

export function noteName(note: number): NoteName {
  return NOTE_NAMES[((note % TOTAL_NOTES) + TOTAL_NOTES) % TOTAL_NOTES];
}

function computeNoteColor(note: number, velocity: number): Color {
  const octave = Math.floor(note / TOTAL_NOTES) + 1;
  return Object.freeze({
    hue: NEWTON_HUES[noteName(note)],
    saturation: (velocity / 127) * 100,
    lightness: (octave / OCTAVES) * 100,
  });
}

/**
 * Convertit une note MIDI et sa vélocité en couleur HSL.
 * - teinte: classe de hauteur (cercle de Newton)
 * - luminosité: octave
 * - saturation: vélocité
 */
export function noteToColor(note: number, velocity: number): Color {
  const key = note * 128 + velocity;
  const cached = colorCache.get(key);
  if (cached) return cached;
  const color = computeNoteColor(note, velocity);
  if (colorCache.size >= COLOR_CACHE_LIMIT) colorCache.clear();
  colorCache.set(key, color);
  return color;
}

/** Vide le cache de {@link noteToColor} (n'influe pas sur le résultat). */
export function clearColorCache(): void {
  colorCache.clear();
}

/**
 * Convertit un pitch bend (-8192..8192) en température, de façon inversée:
 * -8192 → `max`, 0 → milieu, +8192 → `min`.
 * @throws PitchRangeError si `pitch` est hors limites
 */
export function pitchToTemperature(pitch: number, range: KelvinRange = DEFAULT_KELVIN_RANGE): number {
  if (!(pitch >= -MAX_PITCH && pitch <= MAX_PITCH)) {
    throw new PitchRangeError(pitch);
  }
  const ratio = (pitch + MAX_PITCH) / (MAX_PITCH * 2);
  return range.max - Math.round(ratio * (range.max - range.min));
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.hue === b.hue && a.saturation === b.saturation && a.lightness === b.lightness;
}

export function formatColor(c: Color): string {
  return `hsl(${c.hue}, ${c.saturation.toFixed(1)}%, ${c.lightness.toFixed(1)}%)`;
}
