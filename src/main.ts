import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { RealtimeChannelService } from './realtime/realtime-channel.service';
import { TopicRouterService } from './topics/topic-router.service';

/**
 * Standalone runner: connects the real-time channel with the tokens from the
 * environment and logs every topic until SIGINT/SIGTERM.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);
  const logger = new Logger('Runner');

  const router = app.get(TopicRouterService);
  router.connectionStatus$.subscribe((event) =>
    logger.log(`status → ${event.state} (attempt ${event.attempt})`),
  );
  router.orderUpdates$.subscribe((data) => logger.log(`order_update ${JSON.stringify(data)}`));
  router.inventoryUpdates$.subscribe((data) => logger.log(`inventory_update ${JSON.stringify(data)}`));
  router.notifications$.subscribe((data) => logger.log(`notification ${JSON.stringify(data)}`));

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, async () => {
      logger.log(`${sig} received, shutting down…`);
      await app.close();
      process.exit(0);
    });
  }

  await app.get(RealtimeChannelService).connect();
}

bootstrap().catch((err) => {
  new Logger('Runner').error(`Startup failed: ${err instanceof Error ? err.message : err}`);
  process.exit(1);
});
