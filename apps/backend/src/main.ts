import { envLoadedFrom } from './env';
import { loadConfig } from './config';
import { logger } from './logger';
import { GameServer } from './server/gameServer';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  logger.info({ envFile: envLoadedFrom }, 'configuration loaded');
  const server = new GameServer(config);
  await server.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'game server failed to start');
  process.exit(1);
});
