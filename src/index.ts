import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app, redis, gateway } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  const onSignal = (signal: string) => (): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err, signal }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal('SIGTERM'));
  process.on('SIGINT', onSignal('SIGINT'));

  await app.listen({ port: env.port, host: '0.0.0.0' });
  logger.info(
    {
      port: env.port,
      env: env.nodeEnv,
      provider: gateway.provider,
      tools: gateway.listTools().map((t) => t.name),
    },
    'AI gateway started',
  );
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
