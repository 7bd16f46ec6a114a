/**
 * Configuration refusée (fichier YAML, arguments ou options du scheduler).
 * Détectée avant toute tentative de découverte de l'ampoule.
 */
export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration invalide: ${issues.join("; ")}`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

/** Aucune ampoule n'a répondu à la découverte dans le délai imparti. */
export class DeviceNotFoundError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, target: string) {
    super(`Aucune ampoule trouvée via ${target} après ${timeoutMs}ms`);
    this.name = "DeviceNotFoundError";
    this.timeoutMs = timeoutMs;
  }
}

/** Découverte interrompue par une demande d'arrêt. */
export class DiscoveryAbortedError extends Error {
  constructor() {
    super("Découverte de l'ampoule interrompue");
    this.name = "DiscoveryAbortedError";
  }
}

/** Valeur de pitch bend hors de [-8192, 8192]. */
export class PitchRangeError extends RangeError {
  constructor(readonly pitch: number) {
    super(`Pitch hors limites: ${pitch} (attendu -8192..8192)`);
    this.name = "PitchRangeError";
  }
}
