import type { AppConfig } from "../config";

/**
 * Changements applicables à chaud après un rechargement de configuration.
 */
export interface ReloadPlan {
  /** Nouveaux canaux écoutés, si modifiés */
  channels?: number[];
  /** Nouvelle durée de transition, si `light.transition_ms` a changé */
  transitionMs?: number;
  /** Clés modifiées qui ne prennent effet qu'au redémarrage */
  restartRequired: string[];
}

function sameChannels(a: readonly number[], b: readonly number[]): boolean {
  const sa = [...new Set(a)].sort((x, y) => x - y);
  const sb = [...new Set(b)].sort((x, y) => x - y);
  return sa.length === sb.length && sa.every((v, i) => v === sb[i]);
}

/**
 * Compare deux configurations validées et décrit ce qui doit être appliqué.
 */
export function planConfigReload(prev: AppConfig, next: AppConfig): ReloadPlan {
  const plan: ReloadPlan = { restartRequired: [] };
  if (!sameChannels(prev.midi.channels, next.midi.channels)) {
    plan.channels = [...next.midi.channels];
  }
  if (prev.light.transition_ms !== next.light.transition_ms) {
    plan.transitionMs = next.light.transition_ms;
  }
  const midiKeys = ["virtual_port", "input_port", "zero_velocity"] as const;
  for (const k of midiKeys) {
    if (prev.midi[k] !== next.midi[k]) plan.restartRequired.push(`midi.${k}`);
  }
  const lightKeys = [
    "address",
    "broadcast",
    "port",
    "discovery_timeout_ms",
    "discovery_interval_ms",
    "label_timeout_ms",
    "min_kelvin",
    "max_kelvin",
    "rate_interval_ms",
  ] as const;
  for (const k of lightKeys) {
    if (prev.light[k] !== next.light[k]) plan.restartRequired.push(`light.${k}`);
  }
  return plan;
}
