import nodemailer, { type SendMailOptions } from 'nodemailer';

import { DeliveryError, errorMessage } from '../errors';

const SMTPS_PORT = 465;
const AUTH_ERROR_CODE = 'EAUTH';

export interface SenderSettings {
  host: string;
  port: number;
  address: string;
  name: string;
  password: string;
}

export interface OutgoingMessage {
  from: string;
  to: string;
  /** Full RFC 5322 message: header block followed by the rendered body. */
  raw: string;
}

export interface DeliveryClient {
  send(message: OutgoingMessage): Promise<void>;
}

/** The slice of a nodemailer transporter this client relies on. */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
  verify(): Promise<true>;
  close(): void;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toDeliveryError(error: unknown, recipient: string): DeliveryError {
  if (error instanceof DeliveryError) return error;
  if (errorCode(error) === AUTH_ERROR_CODE) {
    return new DeliveryError('auth', recipient, `SMTP authentication failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return new DeliveryError('transport', recipient, `delivery to ${recipient} failed: ${errorMessage(error)}`, {
    cause: error,
  });
}

export function createSmtpTransport(sender: SenderSettings): MailTransport {
  return nodemailer.createTransport({
    host: sender.host,
    port: sender.port,
    secure: sender.port === SMTPS_PORT,
    authMethod: 'PLAIN',
    auth: {
      user: sender.address,
      pass: sender.password,
    },
  });
}

/**
 * Sends one pre-assembled message to one address. The transport and its
 * credentials are built once and reused; only the dispatch worker calls it.
 */
export class SmtpDeliveryClient implements DeliveryClient {
  private readonly transport: MailTransport;

  constructor(
    private readonly sender: SenderSettings,
    transport?: MailTransport,
  ) {
    this.transport = transport ?? createSmtpTransport(sender);
  }

  get senderLabel(): string {
    return `"${this.sender.name}" <${this.sender.address}>`;
  }

  get endpoint(): string {
    return `${this.sender.host}:${this.sender.port}`;
  }

  async send(message: OutgoingMessage): Promise<void> {
    try {
      await this.transport.sendMail({
        envelope: { from: message.from, to: [message.to] },
        raw: message.raw,
      });
    } catch (error) {
      throw toDeliveryError(error, message.to);
    }
  }

  async verify(): Promise<void> {
    try {
      await this.transport.verify();
    } catch (error) {
      throw toDeliveryError(error, this.endpoint);
    }
  }

  close(): void {
    this.transport.close();
  }
}
