/**
 * Server launcher used by `pdfdex serve`
 * Opens the index, listens, and releases both on SIGINT/SIGTERM.
 */

import type { PdfdexConfig } from "../utils/config.js";
import { getLogger } from "../utils/logger.js";
import { PdfdexService, type PdfdexServiceDependencies } from "../rag/service.js";
import { createApp, listen, type PdfdexServer } from "./server.js";

export interface RunningServer {
  server: PdfdexServer;
  service: PdfdexService;
  /** Stop listening, then close the index */
  stop: () => Promise<void>;
}

export async function startServer(
  config: PdfdexConfig,
  deps: PdfdexServiceDependencies = {}
): Promise<RunningServer> {
  const logger = getLogger();
  const service = PdfdexService.open(config, deps);

  let server: PdfdexServer;
  try {
    server = await listen(createApp(service), config.host, config.port);
  } catch (err) {
    service.close();
    throw err;
  }

  logger.info(`pdfdex listening at ${server.url}`);
  logger.info(`Index: ${service.storageLocation}`);

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (!stopping) {
      stopping = server.shutdown().finally(() => service.close());
    }
    return stopping;
  };

  return { server, service, stop };
}

/**
 * Stop the server when the process is asked to terminate
 */
export function handleSignals(running: RunningServer): void {
  const onSignal = (signal: NodeJS.Signals) => {
    getLogger().info(`Received ${signal}, shutting down...`);
    running
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        getLogger().error("Shutdown failed", err);
        process.exit(1);
      });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);
}
