import 'dotenv/config';
import { ConfigError, loadConfig } from './config.js';
import { logger } from './logger.js';
import { buildRuntime } from './runtime.js';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  const running = await buildRuntime(config).start();

  const onSignal = (signal: NodeJS.Signals) => {
    running.shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) logger.fatal({ problems: err.problems }, 'invalid configuration');
  else logger.fatal({ err }, 'startup failed');
  process.exit(1);
});
