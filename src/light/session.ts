import { createLogger } from "../logger";
import { ActuatorScheduler, validateActuatorOptions } from "./actuator";
import type { ActuatorOptions } from "./actuator";
import type { LightConnection, LightConnector } from "../types";

const log = createLogger("light");

/**
 * Connecte une ampoule, construit l'actionneur et exécute `body`.
 * Quelle que soit l'issue (retour, erreur), l'actionneur est arrêté:
 * dernière commande = éteinte, puis fermeture de la connexion.
 *
 * Les options sont validées avant la découverte; `signal` interrompt la découverte.
 */
export async function withLight<T>(
  connector: LightConnector,
  options: ActuatorOptions,
  body: (actuator: ActuatorScheduler, connection: LightConnection) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  validateActuatorOptions(options);
  const connection = await connector.connect(signal);
  const model = connection.product ? ` (${connection.product})` : "";
  log.info(`Connecté à '${connection.label}'${model} à ${connection.address}`);
  const actuator = new ActuatorScheduler(connection, options);
  try {
    return await body(actuator, connection);
  } finally {
    await actuator.shutdown();
    log.info(`Ampoule '${connection.label}' éteinte et libérée`);
  }
}
