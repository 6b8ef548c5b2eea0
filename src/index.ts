import { resolve } from "node:path";

import { isDevMode, loadConfigFromDisk, validateStartupConfig } from "./config.js";
import { buildGateway } from "./gateway.js";
import { createLogger } from "./logger.js";
import { PersistenceEngine } from "./persistence.js";
import { FileSnapshotStore } from "./queue/file-backend.js";
import { QueueRegistry } from "./queue/registry.js";
import { AuthService } from "./security.js";

async function main(): Promise<void> {
  const workspaceDir = process.cwd();
  const config = loadConfigFromDisk({ cwd: workspaceDir });
  const devMode = isDevMode();
  validateStartupConfig(config, {
    allowInsecureDefaults: devMode
  });
  const logger = createLogger({
    level: config.logging.level,
    ...(config.logging.file !== undefined ? { file: config.logging.file } : {})
  });

  const registry = new QueueRegistry({
    defaults: {
      maxMessages: config.queue.maxMessagesPerQueue,
      persistIntervalSeconds: config.queue.persistIntervalSeconds
    },
    logger: logger.child({ component: "registry" })
  });
  const storagePath = resolve(workspaceDir, config.queue.storagePath);
  const persistence = new PersistenceEngine({
    registry,
    store: new FileSnapshotStore({ basePath: storagePath }),
    tickMs: config.persistence.tickMs,
    logger: logger.child({ component: "persistence" })
  });
  await persistence.recover();
  persistence.start();

  const auth = new AuthService({
    secret: config.gateway.auth.secret,
    tokenTtlMinutes: config.gateway.auth.tokenTtlMinutes,
    users: config.gateway.auth.users
  });
  const gateway = buildGateway({
    config,
    registry,
    auth,
    logger: logger.child({ component: "gateway" })
  });

  const host = config.gateway.bind === "loopback" ? "127.0.0.1" : "0.0.0.0";
  await gateway.listen({ host, port: config.gateway.port });
  logger.info({ host, port: config.gateway.port, storagePath, devMode }, "relayq listening");

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "shutting down; writing final snapshot");
    await gateway.close();
    await persistence.stop();
    process.exit(0);
  };
  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.fatal({ err: error }, "shutdown failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
