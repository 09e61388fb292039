import { type Outcome, type SendRequest, toTemplateData } from '../contracts/send';
import { buildMessage, type MessageHeader } from '../delivery/header';
import { type DeliveryClient, toDeliveryError } from '../delivery/smtp-client';
import type { Recipient, RecipientDirectory } from '../directory/recipients';
import { errorMessage } from '../errors';
import { type Logger, silentLogger } from '../logging';
import { type CompiledTemplate, renderTemplate } from '../template/renderer';
import type { RequestQueue } from './channels';

export type WorkerState = 'idle' | 'rendering' | 'delivering' | 'stopped';

export interface DispatchWorkerOptions {
  queue: RequestQueue<SendRequest>;
  template: CompiledTemplate;
  header: MessageHeader;
  directory: RecipientDirectory;
  client: DeliveryClient;
  /** SMTP envelope sender (MAIL FROM). */
  senderAddress: string;
  logger?: Logger;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Single consumer of the request queue. One request is rendered and fanned out
 * at a time, so the compiled template and the delivery client are never used
 * concurrently.
 */
export class DispatchWorker {
  private current: WorkerState = 'idle';
  private loop: Promise<void> | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: DispatchWorkerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get state(): WorkerState {
    return this.current;
  }

  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  /** Closes the queue; resolves once the in-flight cycle, if any, has finished. */
  async stop(): Promise<void> {
    this.options.queue.close();
    if (this.loop) {
      await this.loop;
    } else {
      this.current = 'stopped';
    }
  }

  private async run(): Promise<void> {
    for (;;) {
      const request = await this.options.queue.take();
      if (!request) break;
      try {
        await this.process(request);
      } catch (error) {
        this.logger.error('dispatch cycle aborted', { requestId: request.id, error: errorMessage(error) });
      }
    }
    this.current = 'stopped';
  }

  /** Runs one dispatch cycle. Publishes exactly one outcome per recipient. */
  private async process(request: SendRequest): Promise<void> {
    const recipients = this.options.directory.snapshot();
    const startedAt = Date.now();
    let failures = 0;

    this.current = 'rendering';
    try {
      let body: string;
      try {
        body = renderTemplate(this.options.template, toTemplateData(request.fields));
      } catch (error) {
        const cause = asError(error);
        for (const recipient of recipients) {
          request.reply.write({
            requestId: request.id,
            recipientKey: recipient.key,
            recipientAddress: recipient.address,
            ok: false,
            stage: 'render',
            error: cause,
          });
        }
        this.logger.error('render failed', { requestId: request.id, error: cause.message });
        failures = recipients.length;
        return;
      }

      this.current = 'delivering';
      for (const recipient of recipients) {
        const outcome = await this.deliver(request, recipient, body);
        if (!outcome.ok) failures += 1;
        request.reply.write(outcome);
      }
    } finally {
      this.current = 'idle';
      this.logger.info('dispatch cycle finished', {
        requestId: request.id,
        recipients: recipients.length,
        failures,
        durationMs: Date.now() - startedAt,
      });
    }
  }

  private async deliver(request: SendRequest, recipient: Recipient, body: string): Promise<Outcome> {
    const base = { requestId: request.id, recipientKey: recipient.key, recipientAddress: recipient.address };
    try {
      await this.options.client.send({
        from: this.options.senderAddress,
        to: recipient.address,
        raw: buildMessage(this.options.header, recipient.address, body),
      });
      return { ...base, ok: true };
    } catch (error) {
      const cause = toDeliveryError(error, recipient.address);
      this.logger.warn('delivery failed', { ...base, reason: cause.reason, error: cause.message });
      return { ...base, ok: false, stage: 'delivery', error: cause };
    }
  }
}
