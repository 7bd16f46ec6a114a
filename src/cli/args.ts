import { InvalidConfigurationError } from "../errors";
import type { AppConfig } from "../config";

export interface CliOptions {
  configPath?: string;
  port?: string;
  channels?: number[];
  transitionMs?: number;
  debug: boolean;
  help: boolean;
}

export const USAGE = `midi-light [options]

Crée un port MIDI virtuel et pilote la première ampoule LIFX trouvée.
La teinte dépend de la note, la luminosité de l'octave et la saturation de la vélocité.

Options:
  --config <path>       Fichier YAML (défaut: config.yaml ou config/config.yaml)
  -p, --port <name>     Nom du port MIDI virtuel à créer
  -c, --channels <list> Canaux écoutés, séparés par des virgules (1..16)
  -t, --transition <ms> Durée de transition initiale (modifiable via CC modulation)
  -d, --debug           Logs de debug
  -h, --help            Affiche cette aide
`;

function parseIntStrict(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidConfigurationError([`${flag}: entier attendu (reçu '${value}')`]);
  }
  return parseInt(value, 10);
}

/**
 * Analyse les arguments de ligne de commande (sans `node` ni le script).
 * @throws InvalidConfigurationError pour un drapeau inconnu ou une valeur manquante/illisible
 */
export function parseArgs(argv: string[]): CliOptions {
  const out: CliOptions = { debug: false, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const takeValue = (): string => {
      const v = argv[i + 1];
      if (v === undefined || (v.startsWith("-") && !/^-\d+$/.test(v))) {
        throw new InvalidConfigurationError([`${arg}: valeur manquante`]);
      }
      i += 1;
      return v;
    };
    switch (arg) {
      case "--config":
        out.configPath = takeValue();
        break;
      case "-p":
      case "--port":
        out.port = takeValue();
        break;
      case "-c":
      case "--channels":
        out.channels = takeValue()
          .split(",")
          .filter((s) => s.trim() !== "")
          .map((s) => parseIntStrict(arg, s));
        break;
      case "-t":
      case "--transition":
        out.transitionMs = parseIntStrict(arg, takeValue());
        break;
      case "-d":
      case "--debug":
        out.debug = true;
        break;
      case "-h":
      case "--help":
        out.help = true;
        break;
      default:
        throw new InvalidConfigurationError([`argument inconnu '${arg}'`]);
    }
  }
  return out;
}

/**
 * Applique les options de ligne de commande par‑dessus la configuration (forme brute, avant validation).
 */
export function applyCliOverrides(config: AppConfig, cli: CliOptions): unknown {
  return {
    ...config,
    midi: {
      ...config.midi,
      ...(cli.port !== undefined ? { virtual_port: cli.port } : {}),
      ...(cli.channels !== undefined ? { channels: cli.channels } : {}),
    },
    light: {
      ...config.light,
      ...(cli.transitionMs !== undefined ? { transition_ms: cli.transitionMs } : {}),
    },
  };
}
