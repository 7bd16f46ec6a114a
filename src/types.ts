/**
 * Couleur HSL. Valeur immuable produite par `color/mapping`.
 */
export interface Color {
  /** Teinte 0..360 */
  readonly hue: number;
  /** Saturation 0..100 */
  readonly saturation: number;
  /** Luminosité 0..100 */
  readonly lightness: number;
}

/** Plage de température supportée par l'ampoule (Kelvin). */
export interface KelvinRange {
  min: number;
  max: number;
}

/**
 * Commande unique envoyée à l'ampoule: couleur + température + durée de transition.
 */
export interface ColorCommand {
  color: Color;
  kelvin: number;
  durationMs: number;
}

/**
 * Connexion établie vers une ampoule.
 */
export interface LightConnection {
  /** Libellé lisible (nom donné à l'ampoule, ou adresse MAC à défaut) */
  readonly label: string;
  /** Adresse IP de l'ampoule */
  readonly address: string;
  /** Modèle annoncé par l'ampoule, si connu */
  readonly product?: string;
  /** Envoi sans accusé de réception (fire-and-forget) */
  sendColor(command: ColorCommand): void;
  close(): Promise<void>;
}

/**
 * Découverte d'une ampoule sur le réseau.
 * Rejette avec `DeviceNotFoundError` si rien ne répond dans le délai,
 * avec `DiscoveryAbortedError` si `signal` est déclenché avant.
 */
export interface LightConnector {
  connect(signal?: AbortSignal): Promise<LightConnection>;
}

/**
 * Opérations exposées par l'actionneur aux autres composants.
 * Seul moyen de modifier l'état cible de l'ampoule.
 */
export interface LightActuator {
  /** `null` → couleur "éteinte" */
  setColor(color: Color | null): void;
  setTemperature(kelvin: number): void;
  setTransitionDuration(ms: number): void;
}
