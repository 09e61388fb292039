import { randomUUID } from 'node:crypto';

import type {
  FailedOutcome,
  GatewayResult,
  Outcome,
  ReplyPolicy,
  SendFields,
  SendRequest,
} from '../contracts/send';
import { ReplyChannel, type RequestQueue } from '../dispatch/channels';
import { GatewayTimeoutError } from '../errors';
import { type Logger, silentLogger } from '../logging';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface RequestGatewayOptions {
  queue: RequestQueue<SendRequest>;
  /** Outcomes the worker publishes per request (the directory size). */
  expectedOutcomes: number;
  replyPolicy?: ReplyPolicy;
  timeoutMs?: number;
  logger?: Logger;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

/**
 * Turns one inbound call into one queued request plus a bounded wait for its
 * outcomes. With the `first` policy only the first published outcome decides
 * the result; `all` waits for the whole fan-out.
 */
export class RequestGateway {
  private readonly replyPolicy: ReplyPolicy;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: RequestGatewayOptions) {
    this.replyPolicy = options.replyPolicy ?? 'all';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  get policy(): ReplyPolicy {
    return this.replyPolicy;
  }

  private outcomesToRead(): number {
    const expected = this.options.expectedOutcomes;
    return this.replyPolicy === 'first' ? Math.min(1, expected) : expected;
  }

  async submit(fields: SendFields, submitOptions: SubmitOptions = {}): Promise<GatewayResult> {
    const request: SendRequest = {
      id: randomUUID(),
      fields,
      receivedAt: Date.now(),
      reply: new ReplyChannel<Outcome>(),
    };
    const wanted = this.outcomesToRead();
    const outcomes: Outcome[] = [];

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort(new GatewayTimeoutError(request.id, this.timeoutMs, outcomes.length, wanted));
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort(submitOptions.signal?.reason);
    submitOptions.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (submitOptions.signal?.aborted) forwardAbort();

    try {
      await this.options.queue.put(request, controller.signal);
      while (outcomes.length < wanted) {
        outcomes.push(await request.reply.receive(controller.signal));
      }
    } finally {
      clearTimeout(timeout);
      submitOptions.signal?.removeEventListener('abort', forwardAbort);
    }

    const failures = outcomes.filter((outcome): outcome is FailedOutcome => !outcome.ok);
    for (const failure of failures) {
      this.logger.error('Error handling client', {
        requestId: request.id,
        ip: fields.ipAddress,
        name: `${fields.firstName} ${fields.lastName}`,
        company: fields.companyName,
        email: fields.emailAddress,
        recipient: failure.recipientKey,
        stage: failure.stage,
        error: failure.error.message,
      });
    }

    return { requestId: request.id, ok: failures.length === 0, outcomes, failures };
  }
}
