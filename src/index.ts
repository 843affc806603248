import { loadConfig } from './config/env';
import { startBot } from './bot/telegram';
import { createHealthServer } from './server';
import { ConfigurationError, toErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

function main() {
    const config = loadConfig();

    const server = createHealthServer().listen(config.port, () => {
        logger.info(`Server is running on port ${config.port}`);
    });

    const bot = startBot(config);

    const shutdown = (signal: string) => {
        logger.info({ signal }, 'Shutting down');
        server.close();
        bot.stopPolling()
            .catch((error: unknown) => logger.error({ error: toErrorMessage(error) }, 'Failed to stop polling'))
            .finally(() => process.exit(0));
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
    main();
} catch (error) {
    if (error instanceof ConfigurationError) {
        logger.fatal({ missing: error.missing }, error.message);
    } else {
        logger.fatal({ error: toErrorMessage(error) }, 'Failed to start');
    }
    process.exitCode = 1;
}
