import { config } from './config';
import { ConfigValidator } from './config/validator';
import { createDatabaseConfig, DatabaseManager } from './database/manager';
import { StdioPluginHost } from './host/stdio-host';
import { DashboardPlugin } from './services/dashboard-plugin';
import { toError } from './utils/error-handler';
import { Logger, logger } from './utils/logger';

async function main() {
  const startTime = Date.now();
  logger.info('Repository dashboard plugin starting...');

  const appConfig = config.getConfig();
  logger.configure({
    level: Logger.parseLogLevel(appConfig.logging.level),
    toFile: appConfig.logging.toFile,
    directory: appConfig.logging.filePath,
  });

  const validation = ConfigValidator.validate(appConfig);

  if (!validation.isValid) {
    logger.error('Configuration validation failed:', { errors: validation.errors });
    throw new Error(`Configuration validation failed:\n${validation.errors.join('\n')}`);
  }

  if (validation.warnings.length > 0) {
    logger.warn('Configuration warnings:', { warnings: validation.warnings });
  }

  config.logSanitizedConfig();

  logger.info('Initializing plugin storage...');
  const dbStartTime = Date.now();
  const dbManager = new DatabaseManager(createDatabaseConfig(appConfig));

  try {
    await dbManager.initialize();
    logger.logStartup('Database', true, Date.now() - dbStartTime);
  } catch (error) {
    logger.logStartup('Database', false, Date.now() - dbStartTime, toError(error));
    throw error;
  }

  const plugin = new DashboardPlugin({
    config: appConfig,
    store: dbManager.getSettingsRepository(),
    database: dbManager,
  });
  await plugin.start();

  logger.info(`Plugin ready (${Date.now() - startTime}ms)`);

  let isShuttingDown = false;

  const shutdown = async (reason: string) => {
    if (isShuttingDown) {
      logger.warn(`Received ${reason} during shutdown, forcing exit...`);
      process.exit(1);
    }

    isShuttingDown = true;
    logger.info(`Received ${reason}, initiating graceful shutdown...`);

    const forceShutdownTimeout = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, 30000);

    await plugin.stop();

    try {
      await dbManager.close();
      logger.logShutdown('Database', true);
    } catch (error) {
      logger.logShutdown('Database', false, toError(error));
    }

    clearTimeout(forceShutdownTimeout);
    logger.info('Plugin shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.critical('Shutdown failed', {}, toError(error));
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGQUIT', () => onSignal('SIGQUIT'));

  // The host closing stdin ends the session
  const host = new StdioPluginHost();
  await host.listen((type, data) => plugin.handleMessage(type, data));
  await shutdown('end of input');
}

process.on('unhandledRejection', (reason, promise) => {
  logger.critical('Unhandled Promise Rejection', {
    promise: String(promise),
    reason: reason instanceof Error ? reason.message : String(reason)
  }, reason instanceof Error ? reason : undefined);

  setTimeout(() => process.exit(1), 1000);
});

process.on('uncaughtException', (error) => {
  logger.critical('Uncaught Exception', {}, error);

  setTimeout(() => process.exit(1), 1000);
});

main().catch((error) => {
  logger.critical('Failed to start application', {}, toError(error));

  setTimeout(() => process.exit(1), 1000);
});
