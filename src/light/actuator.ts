import { createLogger } from "../logger";
import { InvalidConfigurationError } from "../errors";
import { DEFAULT_KELVIN_RANGE, OFF_COLOR, colorsEqual, formatColor, pitchToTemperature } from "../color/mapping";
import { Signal } from "../shared/signal";
import type { Color, KelvinRange, LightActuator, LightConnection } from "../types";

const log = createLogger("actuator");

/** Cadence acceptée par les ampoules LIFX: 20 messages/s au plus. */
export const DEFAULT_RATE_INTERVAL_MS = 50;

export interface ActuatorOptions {
  /** Durée de transition initiale (ms, ≥ 0). Défaut: 0 */
  initialTransitionMs?: number;
  /** Intervalle minimal entre deux commandes (ms, > 0). Défaut: 50 */
  rateIntervalMs?: number;
  /** Plage de température; la température initiale est celle du pitch neutre. */
  kelvinRange?: KelvinRange;
  /** Horloge (ms). Défaut: Date.now */
  now?: () => number;
}

/**
 * État cible de l'ampoule. Possédé par {@link ActuatorScheduler}; les autres
 * composants passent par `setColor`/`setTemperature`/`setTransitionDuration`.
 */
export interface ActuatorState {
  color: Color;
  temperature: number;
  transitionDurationMs: number;
  lastSendTime: number;
}

/**
 * Vérifie les options avant toute connexion.
 * @throws InvalidConfigurationError
 */
export function validateActuatorOptions(options: ActuatorOptions): void {
  const issues: string[] = [];
  const t = options.initialTransitionMs;
  if (t !== undefined && !(Number.isInteger(t) && t >= 0)) {
    issues.push(`initialTransitionMs doit être un entier ≥ 0 (reçu ${t})`);
  }
  const r = options.rateIntervalMs;
  if (r !== undefined && !(Number.isFinite(r) && r > 0)) {
    issues.push(`rateIntervalMs doit être > 0 (reçu ${r})`);
  }
  const k = options.kelvinRange;
  if (k && !(Number.isInteger(k.min) && Number.isInteger(k.max) && k.min < k.max)) {
    issues.push(`kelvinRange invalide (${k.min}..${k.max})`);
  }
  if (issues.length) throw new InvalidConfigurationError(issues);
}

/**
 * Actionneur limité en débit pour une ampoule.
 * - Les demandes de changement modifient l'état cible immédiatement
 * - Au plus un envoi planifié à la fois: les demandes suivantes s'y agrègent
 * - La boucle d'envoi relit l'état courant au moment d'envoyer (jamais de valeur périmée)
 * - `shutdown()` force la couleur éteinte, attend son envoi puis ferme la connexion
 */
export class ActuatorScheduler implements LightActuator {
  private readonly state: ActuatorState;
  private readonly rateIntervalMs: number;
  private readonly now: () => number;
  private readonly needsUpdate = new Signal();
  private readonly loop: Promise<void>;
  private pending: NodeJS.Timeout | null = null;
  private running = true;
  private closing: Promise<void> | null = null;
  private sent = 0;

  constructor(private readonly connection: LightConnection, options: ActuatorOptions = {}) {
    validateActuatorOptions(options);
    this.now = options.now ?? (() => Date.now());
    this.rateIntervalMs = options.rateIntervalMs ?? DEFAULT_RATE_INTERVAL_MS;
    this.state = {
      color: OFF_COLOR,
      temperature: pitchToTemperature(0, options.kelvinRange ?? DEFAULT_KELVIN_RANGE),
      transitionDurationMs: options.initialTransitionMs ?? 0,
      lastSendTime: this.now(),
    };
    this.loop = this.dispatchForever();
  }

  /** `null` → couleur éteinte. Sans effet si la couleur est inchangée. */
  setColor(color: Color | null): void {
    if (!this.accepting("setColor")) return;
    const value = color ?? OFF_COLOR;
    if (colorsEqual(value, this.state.color)) return;
    log.debug(`Changement de couleur demandé: ${formatColor(value)}`);
    this.state.color = value;
    this.requestDispatch();
  }

  setTemperature(kelvin: number): void {
    if (!this.accepting("setTemperature")) return;
    if (kelvin === this.state.temperature) return;
    log.debug(`Changement de température demandé: ${kelvin}K`);
    this.state.temperature = kelvin;
    this.requestDispatch();
  }

  /** Ne déclenche aucun envoi: s'applique à la prochaine commande. */
  setTransitionDuration(ms: number): void {
    if (!this.accepting("setTransitionDuration")) return;
    log.debug(`Durée de transition: ${ms}ms`);
    this.state.transitionDurationMs = Math.max(0, Math.trunc(ms));
  }

  getState(): Readonly<ActuatorState> {
    return { ...this.state };
  }

  /** Nombre de commandes réellement envoyées à l'ampoule. */
  get commandsSent(): number {
    return this.sent;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Arrêt coopératif: refuse les nouveaux changements, force l'extinction,
   * attend l'envoi final (au plus un intervalle) puis libère la connexion.
   * Idempotent.
   */
  shutdown(): Promise<void> {
    if (!this.closing) this.closing = this.drainAndClose();
    return this.closing;
  }

  private async drainAndClose(): Promise<void> {
    this.running = false;
    this.state.color = OFF_COLOR;
    log.debug("Arrêt: extinction de l'ampoule");
    this.requestDispatch();
    await this.loop;
    // La boucle a déjà envoyé l'état éteint; un timer encore armé n'a plus d'objet.
    this.cancelPending();
    await this.connection.close();
    log.debug("Connexion ampoule libérée");
  }

  private accepting(op: string): boolean {
    if (this.running) return true;
    log.trace(`${op} ignoré: actionneur arrêté`);
    return false;
  }

  private requestDispatch(): void {
    if (this.pending || this.needsUpdate.isSet()) {
      log.trace("Mise à jour déjà planifiée");
      return;
    }
    const delay = Math.max(0, this.state.lastSendTime + this.rateIntervalMs - this.now());
    this.pending = setTimeout(() => {
      this.pending = null;
      log.trace(`Mise à jour déclenchée après ${delay}ms`);
      this.needsUpdate.set();
    }, delay);
  }

  private cancelPending(): void {
    if (this.pending) {
      clearTimeout(this.pending);
      this.pending = null;
    }
  }

  private async dispatchForever(): Promise<void> {
    for (;;) {
      await this.needsUpdate.wait();
      this.needsUpdate.clear();
      this.dispatch();
      if (!this.running) break;
    }
    log.debug("Sortie de la boucle d'envoi");
  }

  private dispatch(): void {
    const { color, temperature, transitionDurationMs } = this.state;
    log.trace(`Envoi ${formatColor(color)} ${temperature}K en ${transitionDurationMs}ms`);
    try {
      this.connection.sendColor({ color, kelvin: temperature, durationMs: transitionDurationMs });
    } catch (err) {
      log.warn("Envoi vers l'ampoule échoué:", err);
    }
    this.state.lastSendTime = this.now();
    this.sent += 1;
  }
}
