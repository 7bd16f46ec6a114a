import { createLogger } from "./logger";
import { DEFAULT_KELVIN_RANGE, noteToColor, pitchToTemperature } from "./color/mapping";
import { ActiveNoteTracker } from "./router/activeNotes";
import { CC_MODULATION, formatEvent } from "./midi/decoder";
import type { PerformanceEvent } from "./midi/decoder";
import { matchChannel, toChannelSet } from "./midi/filter";
import type { KelvinRange, LightActuator } from "./types";

const log = createLogger("router");

/**
 * Traitement d'un Note On de vélocité 0:
 * - "release": équivalent Note Off (convention MIDI)
 * - "ignore": pas de modification des notes tenues, couleur simplement réaffirmée
 */
export type ZeroVelocityPolicy = "release" | "ignore";

export interface EventRouterOptions {
  /** Canaux écoutés (1..16), non vide */
  channels: Iterable<number>;
  kelvinRange?: KelvinRange;
  zeroVelocity?: ZeroVelocityPolicy;
}

/** Facteur appliqué à la valeur du CC modulation pour obtenir la durée de transition (ms). */
export const MODULATION_MS_PER_STEP = 4;

/**
 * Routeur principal: traduit les événements de jeu en demandes à l'actionneur.
 *
 * Invariants clés:
 * - Un événement hors des canaux écoutés n'atteint jamais l'actionneur
 * - Pitch bend et modulation court‑circuitent le recalcul de couleur
 * - Tout autre événement filtré recalcule la couleur de la note active (la plus ancienne tenue)
 */
export class EventRouter {
  private channels: Set<number>;
  private readonly kelvinRange: KelvinRange;
  private readonly zeroVelocity: ZeroVelocityPolicy;
  private readonly notes = new ActiveNoteTracker();

  constructor(private readonly actuator: LightActuator, options: EventRouterOptions) {
    this.channels = toChannelSet(options.channels);
    this.kelvinRange = options.kelvinRange ?? DEFAULT_KELVIN_RANGE;
    this.zeroVelocity = options.zeroVelocity ?? "release";
  }

  /** Remplace l'ensemble des canaux écoutés (hot reload). */
  setChannels(channels: Iterable<number>): void {
    this.channels = toChannelSet(channels);
    log.info(`Écoute des canaux ${this.describeChannels()}`);
  }

  getChannels(): number[] {
    return [...this.channels].sort((a, b) => a - b);
  }

  describeChannels(): string {
    return this.getChannels().join(",");
  }

  /** Notes tenues, de la plus ancienne à la plus récente. */
  heldNotes(): ReturnType<ActiveNoteTracker["snapshot"]> {
    return this.notes.snapshot();
  }

  /**
   * Consomme la source d'événements jusqu'à son épuisement.
   * Les erreurs de la source sont propagées.
   */
  async run(events: AsyncIterable<PerformanceEvent>): Promise<void> {
    log.info(`Écoute des événements MIDI sur le(s) canal(aux) ${this.describeChannels()}`);
    for await (const evt of events) {
      this.handle(evt);
    }
    log.debug("Fin du flux d'événements MIDI");
    this.notes.clear();
  }

  /** Applique un événement à l'état des notes et à l'actionneur. */
  handle(evt: PerformanceEvent): void {
    if (!matchChannel(evt, this.channels)) return;
    log.debug(`${formatEvent(evt)} reçu`);

    switch (evt.type) {
      case "noteOn":
        if (evt.velocity > 0) this.notes.noteOn(evt.note, evt.velocity);
        else if (this.zeroVelocity === "release") this.notes.noteOff(evt.note);
        break;
      case "noteOff":
        this.notes.noteOff(evt.note);
        break;
      case "pitchBend":
        // Changer la température met déjà l'ampoule à jour: pas de recalcul de couleur.
        this.actuator.setTemperature(pitchToTemperature(evt.pitch, this.kelvinRange));
        return;
      case "controlChange":
        if (evt.controller === CC_MODULATION) {
          // Ne déclenche pas d'envoi: concerne le prochain changement de couleur.
          this.actuator.setTransitionDuration(evt.value * MODULATION_MS_PER_STEP);
          return;
        }
        break;
      case "other":
        break;
    }

    this.recomputeColor();
  }

  private recomputeColor(): void {
    log.trace(`Notes tenues: ${JSON.stringify(this.notes.snapshot())}`);
    const active = this.notes.activeNote();
    if (active) {
      this.actuator.setColor(noteToColor(active.note, active.velocity));
    } else {
      // Aucune note: luminosité 0
      this.actuator.setColor(null);
    }
  }
}
