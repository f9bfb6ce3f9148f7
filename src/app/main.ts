import { loadConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';

import { bootRuntime } from './runtime.js';

export async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const runtime = await bootRuntime({ config, logger });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutdown requested, finishing current tick');
    runtime.scheduler.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await runtime.scheduler.run();
  logger.info(runtime.engine.getDailyStats(), 'final daily summary');
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Failed to run engine', error);
    process.exit(1);
  });
}
