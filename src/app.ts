import { logger, parseLogLevel, setLogLevel } from "./logger";
import { DiscoveryAbortedError } from "./errors";
import { loadConfig, parseConfig, watchConfig } from "./config";
import type { AppConfig } from "./config";
import { planConfigReload } from "./config/reload";
import { USAGE, applyCliOverrides, parseArgs } from "./cli/args";
import type { CliOptions } from "./cli/args";
import { EventRouter } from "./router";
import { MidiEventSource } from "./midi/input";
import { LifxConnector } from "./light/lifx/connector";
import { withLight } from "./light/session";
import type { ActuatorOptions, ActuatorScheduler } from "./light/actuator";

export interface AppHandle {
  /** Résolue après l'extinction de l'ampoule et la fermeture des ports */
  done: Promise<void>;
  /** Interrompt la découverte et ferme la source MIDI: l'arrêt propre suit */
  stop(): void;
}

function actuatorOptions(cfg: AppConfig): ActuatorOptions {
  return {
    initialTransitionMs: cfg.light.transition_ms,
    rateIntervalMs: cfg.light.rate_interval_ms,
    kelvinRange: { min: cfg.light.min_kelvin, max: cfg.light.max_kelvin },
  };
}

function attachConfigReload(
  configPath: string,
  cli: CliOptions,
  initial: AppConfig,
  router: EventRouter,
  actuator: ActuatorScheduler
): () => Promise<void> {
  let current = initial;
  return watchConfig(
    configPath,
    (next) => {
      let cfg: AppConfig;
      try {
        cfg = parseConfig(applyCliOverrides(next, cli));
      } catch (err) {
        logger.warn("Configuration rechargée invalide, ignorée:", err);
        return;
      }
      const plan = planConfigReload(current, cfg);
      if (plan.channels) router.setChannels(plan.channels);
      if (plan.transitionMs !== undefined) actuator.setTransitionDuration(plan.transitionMs);
      if (plan.restartRequired.length) {
        logger.warn(`Redémarrage nécessaire pour: ${plan.restartRequired.join(", ")}`);
      }
      current = cfg;
      logger.info("Configuration rechargée.");
    },
    (err) => logger.warn("Erreur hot reload config:", err)
  );
}

/**
 * Point d'entrée de l'application.
 * - Analyse les arguments et charge la configuration (validée avant toute découverte)
 * - Ouvre le port MIDI (virtuel par défaut)
 * - Découvre l'ampoule et relie router → actionneur
 * - Active le hot‑reload de la configuration
 *
 * @returns null si seule l'aide a été demandée
 */
export async function startApp(argv: string[]): Promise<AppHandle | null> {
  const cli = parseArgs(argv);
  if (cli.help) {
    process.stdout.write(USAGE);
    return null;
  }
  setLogLevel(cli.debug ? "debug" : parseLogLevel(process.env.LOG_LEVEL));

  logger.info("Démarrage midi-light…");
  const loaded = await loadConfig(cli.configPath);
  if (cli.configPath && loaded.path !== cli.configPath) {
    logger.warn(`Configuration '${cli.configPath}' introuvable.`);
  }
  logger.info(loaded.path ? `Chargement configuration: ${loaded.path}` : "Aucun config.yaml: valeurs par défaut.");
  const cfg = parseConfig(applyCliOverrides(loaded.config, cli));
  logger.debug("Configuration:", JSON.stringify(cfg, null, 2));

  const source = new MidiEventSource({ virtualPort: cfg.midi.virtual_port, inputPort: cfg.midi.input_port });
  source.open();

  const connector = new LifxConnector({
    address: cfg.light.address,
    broadcast: cfg.light.broadcast,
    port: cfg.light.port,
    discoveryTimeoutMs: cfg.light.discovery_timeout_ms,
    discoveryIntervalMs: cfg.light.discovery_interval_ms,
    labelTimeoutMs: cfg.light.label_timeout_ms,
  });

  const stopping = new AbortController();
  const run = async (): Promise<void> => {
    try {
      await withLight(connector, actuatorOptions(cfg), async (actuator) => {
        const router = new EventRouter(actuator, {
          channels: cfg.midi.channels,
          kelvinRange: { min: cfg.light.min_kelvin, max: cfg.light.max_kelvin },
          zeroVelocity: cfg.midi.zero_velocity,
        });
        const stopWatch = loaded.path ? attachConfigReload(loaded.path, cli, cfg, router, actuator) : null;
        try {
          await router.run(source);
        } finally {
          await stopWatch?.();
        }
      }, stopping.signal);
    } catch (err) {
      if (!(err instanceof DiscoveryAbortedError)) throw err;
      logger.info("Arrêt demandé pendant la découverte de l'ampoule.");
    } finally {
      source.close();
    }
  };

  return {
    done: run(),
    stop: () => {
      stopping.abort();
      source.close();
    },
  };
}
