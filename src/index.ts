import { serverSettingsFromEnv } from './config.js';
import { ConfigManager } from './configManager.js';
import { createAppContext } from './context.js';
import { createLogger, errorMessage, setLogLevel } from './logger.js';
import { buildServer, SERVICE_NAME, SERVICE_VERSION } from './server.js';

const logger = createLogger('orchestrator');
const settings = serverSettingsFromEnv();

const configManager = new ConfigManager(settings.configPath);
const config = await configManager.load();
setLogLevel(settings.logLevel ?? config.logLevel);

const context = createAppContext(config, { configManager });

const { registered, errors } = context.bootstrap();
for (const error of errors) {
  logger.warn('Endpoint registration failed', { error });
}
logger.info('Endpoints registered', { count: registered });

configManager.onReload((next) => {
  setLogLevel(settings.logLevel ?? next.logLevel);
  const result = context.applyConfig(next);
  logger.info('Registry synchronized after reload', {
    added: result.added.length,
    updated: result.updated.length,
    removed: result.removed.length,
    errors: result.errors.length,
  });
});
configManager.startWatching();
context.healthMonitor.start();

const fastify = await buildServer(context);

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Shutting down', { signal });
  try {
    await fastify.close();
    await context.close();
  } catch (err) {
    logger.error('Error during shutdown', { error: errorMessage(err) });
    process.exitCode = 1;
  }
}

process.once('SIGINT', (signal) => void shutdown(signal));
process.once('SIGTERM', (signal) => void shutdown(signal));

await fastify.listen({ port: settings.port, host: settings.host });
logger.info(`${SERVICE_NAME} ${SERVICE_VERSION} running on port ${settings.port}`);
