import type { PerformanceEvent } from "./decoder";

/**
 * Détermine si un événement est sur un canal écouté.
 * Les trames sans canal (système) ne passent jamais.
 */
export function matchChannel(evt: PerformanceEvent, channels: ReadonlySet<number>): boolean {
  return evt.channel !== undefined && channels.has(evt.channel);
}

/**
 * Normalise une liste de canaux (1..16) en ensemble.
 * @throws Error si la liste est vide ou contient un canal hors limites
 */
export function toChannelSet(channels: Iterable<number>): Set<number> {
  const set = new Set<number>();
  for (const ch of channels) {
    if (!Number.isInteger(ch) || ch < 1 || ch > 16) {
      throw new Error(`Canal MIDI invalide: ${ch} (attendu 1..16)`);
    }
    set.add(ch);
  }
  if (set.size === 0) throw new Error("Au moins un canal MIDI doit être écouté");
  return set;
}
