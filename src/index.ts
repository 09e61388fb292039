#!/usr/bin/env node
import dotenv from 'dotenv';

import { parseCliOptions } from './cli';
import { type AppConfig, loadConfig, resolveConfigPath } from './config/loader';
import { SmtpDeliveryClient } from './delivery/smtp-client';
import { ConfigError, errorMessage } from './errors';
import { createLogger } from './logging';
import { startService } from './service';

dotenv.config();

const logger = createLogger('contact-dispatch');

function fatal(stage: string, error: unknown): never {
  const label = error instanceof ConfigError ? error.stage : stage;
  logger.error(`@${label}: ${errorMessage(error)}`);
  process.exit(1);
}

async function main(argv: string[]): Promise<void> {
  const options = parseCliOptions(argv);

  const configPath = resolveConfigPath(options.configFile);
  let config: AppConfig;
  try {
    config = await loadConfig(configPath);
  } catch (error) {
    fatal('READING/PARSING CONFIG FILE', error);
  }
  logger.info('Successfully read config file', { path: configPath });

  const client = new SmtpDeliveryClient(config.sender);
  if (options.verify) {
    try {
      await client.verify();
    } catch (error) {
      fatal('VERIFYING SMTP SENDER', error);
    }
    logger.info('SMTP sender verified', { sender: client.senderLabel, endpoint: client.endpoint });
  }

  const service = await startService(config, { client, logger });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    service.close().then(
      () => process.exit(0),
      (error: unknown) => fatal('SHUTDOWN', error),
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main(process.argv).catch((error: unknown) => fatal('STARTUP', error));
