import { once } from 'node:events';
import type { Server } from 'node:http';

import type { AppConfig } from './config/loader';
import { type SendFields, type SendRequest, toTemplateData } from './contracts/send';
import { type DeliveryClient, SmtpDeliveryClient } from './delivery/smtp-client';
import { RequestQueue } from './dispatch/channels';
import { DispatchWorker } from './dispatch/worker';
import { RequestGateway } from './gateway/request-gateway';
import { createApp } from './http/app';
import { createLogger, type Logger } from './logging';
import { referencedFields } from './template/renderer';

export type ServiceClient = DeliveryClient & { close?(): void };

export interface ServiceOptions {
  client?: ServiceClient;
  logger?: Logger;
}

export interface RunningService {
  server: Server;
  worker: DispatchWorker;
  gateway: RequestGateway;
  port: number;
  close(): Promise<void>;
}

const BLANK_FIELDS: SendFields = {
  ipAddress: '',
  firstName: '',
  lastName: '',
  companyName: '',
  emailAddress: '',
  description: '',
};

function warnUnknownFields(config: AppConfig, logger: Logger): void {
  const known = new Set(Object.keys(toTemplateData(BLANK_FIELDS)));
  for (const field of referencedFields(config.template)) {
    const root = field.split('.')[0] ?? field;
    if (!known.has(root)) {
      logger.warn('template references a field requests do not carry; every render will fail', { field });
    }
  }
}

/** Wires queue, worker, gateway and HTTP server, then starts listening. */
export async function startService(config: AppConfig, options: ServiceOptions = {}): Promise<RunningService> {
  const logger = options.logger ?? createLogger('contact-dispatch');
  const client = options.client ?? new SmtpDeliveryClient(config.sender);

  warnUnknownFields(config, logger);

  const queue = new RequestQueue<SendRequest>();
  const worker = new DispatchWorker({
    queue,
    template: config.template,
    header: config.header,
    directory: config.directory,
    client,
    senderAddress: config.sender.address,
    logger: logger.child('worker'),
  });
  const loop = worker.start();

  const gateway = new RequestGateway({
    queue,
    expectedOutcomes: config.directory.size,
    replyPolicy: config.replyPolicy,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child('gateway'),
  });

  const app = createApp({
    gateway,
    basePath: config.basePath,
    health: () => ({ worker: worker.state, recipients: config.directory.size }),
    logger: logger.child('http'),
  });

  const { host, port: listenPort } = config.listen;
  const server = host ? app.listen(listenPort, host) : app.listen(listenPort);
  try {
    await once(server, 'listening');
  } catch (error) {
    await worker.stop();
    throw error;
  }

  const address = server.address();
  const port = address && typeof address !== 'string' ? address.port : listenPort;
  logger.info('Serving', {
    address: `${host ?? '*'}:${port}`,
    basePath: config.basePath,
    recipients: config.directory.size,
    replyPolicy: config.replyPolicy,
  });

  const close = async () => {
    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    server.closeIdleConnections();
    await closed;
    await worker.stop();
    await loop;
    client.close?.();
  };

  return { server, worker, gateway, port, close };
}
