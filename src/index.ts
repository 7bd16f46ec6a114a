#!/usr/bin/env node
import { logger } from "./logger";
import { startApp } from "./app";

async function main(): Promise<void> {
  const app = await startApp(process.argv.slice(2));
  if (!app) return;

  // Sur interruption: abandon de la découverte, fermeture de la source MIDI, puis extinction
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} reçu, arrêt…`);
    app.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await app.done;
  logger.info("Arrêt midi-light");
}

main().catch((err) => {
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
