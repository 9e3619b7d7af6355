import { buildApp } from './app.js';
import { defaultEntryId, env } from './config/env.js';
import { SnapshotPoller } from './modules/scheduler/poller.js';
import { getUpstreamClient } from './modules/upstream/client.js';

async function main() {
  const app = await buildApp();

  let poller: SnapshotPoller | null = null;
  const client = getUpstreamClient();
  if (client) {
    const entryId = defaultEntryId();
    app.metering.registerSource(entryId, client);
    poller = new SnapshotPoller({
      entryId,
      intervalMinutes: env.POLL_INTERVAL_MINUTES,
      service: app.metering,
    });
  } else {
    app.log.warn('UPSTREAM_TOKEN not set; polling disabled');
  }

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`Server running at http://${env.HOST}:${env.PORT}`);
    app.log.info(`API docs at http://${env.HOST}:${env.PORT}/docs`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  poller?.start();

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.on(signal, () => {
      app.log.info(`Received ${signal}, shutting down...`);
      poller?.stop();
      Promise.resolve(poller?.drain())
        .then(() => app.close())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          app.log.error(err);
          process.exit(1);
        });
    });
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
