import { createComponents } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { buildServer } from './server.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger({ pretty: process.env.NODE_ENV !== 'production' });

  logger.info('remediation-gate starting...');

  const app = await buildServer(createComponents(config, logger));

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`remediation-gate listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch(error => {
  console.error('Failed to start remediation-gate', error);
  process.exitCode = 1;
});
