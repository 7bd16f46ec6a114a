import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { z } from "zod";
import { InvalidConfigurationError } from "./errors";

const channelSchema = z.number().int().min(1).max(16);

/**
 * Section MIDI: port d'entrée et canaux écoutés.
 */
const midiSchema = z
  .object({
    /** Nom du port virtuel créé. Défaut: "midi-light" */
    virtual_port: z.string().min(1).default("midi-light"),
    /** Fragment de nom d'un port existant (remplace le port virtuel) */
    input_port: z.string().min(1).optional(),
    /** Canaux écoutés (1..16). Défaut: [1] */
    channels: z.array(channelSchema).nonempty().default([1]),
    /** Note On vélocité 0: "release" (= Note Off) ou "ignore". Défaut: "release" */
    zero_velocity: z.enum(["release", "ignore"]).default("release"),
  })
  .strict()
  .default({});

/**
 * Section ampoule: découverte, plage de température, cadence.
 */
const lightSchema = z
  .object({
    /** IP de l'ampoule (sinon découverte par diffusion) */
    address: z.string().min(1).optional(),
    broadcast: z.string().min(1).default("255.255.255.255"),
    port: z.number().int().min(1).max(65535).default(56700),
    discovery_timeout_ms: z.number().int().positive().default(10_000),
    discovery_interval_ms: z.number().int().positive().default(1_000),
    label_timeout_ms: z.number().int().positive().default(3_000),
    min_kelvin: z.number().int().positive().default(2500),
    max_kelvin: z.number().int().positive().default(9000),
    /** Durée de transition initiale (ms). Modifiable ensuite via CC modulation. */
    transition_ms: z.number().int().nonnegative().default(0),
    /** Intervalle minimal entre deux commandes (ms). Défaut: 50 (20 msg/s) */
    rate_interval_ms: z.number().int().positive().default(50),
  })
  .strict()
  .default({})
  .refine((l) => l.min_kelvin < l.max_kelvin, {
    message: "min_kelvin doit être inférieur à max_kelvin",
    path: ["min_kelvin"],
  });

export const appConfigSchema = z
  .object({
    midi: midiSchema,
    light: lightSchema,
  })
  .strict();

/** Configuration racine (valeurs par défaut appliquées). */
export type AppConfig = z.infer<typeof appConfigSchema>;

const DEFAULT_PATHS = ["config.yaml", path.join("config", "config.yaml")];

/**
 * Valide une configuration brute et applique les défauts.
 * @throws InvalidConfigurationError avec un message par problème ("chemin: message")
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = appConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(racine)"}: ${i.message}`)
    );
  }
  return result.data;
}

export function defaultConfig(): AppConfig {
  return parseConfig({});
}

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // candidat suivant
    }
  }
  return null;
}

async function readConfigFile(filePath: string): Promise<AppConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    throw new InvalidConfigurationError([`${filePath}: YAML illisible (${String(err)})`]);
  }
  return parseConfig(doc);
}

/**
 * Charge et valide le fichier YAML de configuration.
 * Aucun fichier trouvé → configuration par défaut.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws InvalidConfigurationError si le contenu est invalide
 */
export async function loadConfig(filePath?: string): Promise<{ config: AppConfig; path: string | null }> {
  const p = await findConfigPath(filePath);
  if (!p) return { config: defaultConfig(), path: null };
  return { config: await readConfigFile(p), path: p };
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification valide.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative (YAML illisible, validation)
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: AppConfig) => void,
  onError?: (err: unknown) => void
): () => Promise<void> {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async (): Promise<void> => {
    try {
      onChange(await readConfigFile(filePath));
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", () => void handler());
  return () => watcher.close();
}
