import type { Server } from 'http';
import { loadConfig, AppConfig } from './config/environment';
import { createApp } from './app';
import { createLogger, Logger } from './utils/logger';
import { ConfigError } from './utils/errors';

export function startServer(config: AppConfig, logger: Logger = createLogger(config)): Server {
  const app = createApp({ config, logger });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`🚀 Profile API running on http://${config.host}:${config.port}`);
    logger.info(`📊 Environment: ${config.nodeEnv}`);
    logger.info(`🐱 Cat facts from ${config.catFact.apiUrl} (timeout ${config.catFact.timeoutSeconds}s)`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`🛑 ${signal} received, shutting down gracefully`);
    server.close((error) => {
      if (error) {
        logger.error('Failed to close server', { error: error.message });
        process.exit(1);
      }
      logger.info('✅ Server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

if (require.main === module) {
  try {
    startServer(loadConfig());
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('❌ Failed to start server:', error);
    }
    process.exit(1);
  }
}
