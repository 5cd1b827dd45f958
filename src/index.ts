import { buildCommandResolvers } from './commands';
import { createApp } from './app';
import { loadConfig } from './config';
import { createTwilioProvider } from './services/twilio';
import { JsonFileCallLogStore } from './store/json-file-store';
import { errorMessage, logger } from './utils/logger';

async function start() {
  try {
    const config = loadConfig();
    const store = await JsonFileCallLogStore.open(config.callLog.path);
    const resolvers = buildCommandResolvers(config.ai);

    const app = createApp({
      store,
      telephony: createTwilioProvider(config.twilio),
      resolvers,
      from: config.twilio.phoneNumber,
      message: {
        text: config.call.message,
        voice: config.call.voice,
        language: config.call.language,
      },
      maxUploadBytes: config.upload.maxFileBytes,
    });

    const server = app.listen(config.port, () => {
      logger.info(`Server running on port ${config.port}`, {
        callLog: config.callLog.path,
        commandResolvers: resolvers.map((r) => r.name),
      });
    });

    const shutdown = (signal: string) => {
      logger.info('Shutting down', { signal });
      server.close(() => {
        store.close().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('Failed to close call log', { error: errorMessage(err) });
            process.exit(1);
          },
        );
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}

void start();
