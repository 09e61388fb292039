import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import type { ReplyPolicy } from '../contracts/send';
import type { MessageHeader } from '../delivery/header';
import type { SenderSettings } from '../delivery/smtp-client';
import { RecipientDirectory, type RecipientEntry } from '../directory/recipients';
import { ConfigError, errorMessage } from '../errors';
import { type CompiledTemplate, compileTemplate } from '../template/renderer';
import { type RawServerConfig, serverConfigSchema } from './schema';

const LINUX_CONFIG_PATH = '/etc/contact-dispatch/config.yaml';
const LOCAL_CONFIG_PATH = 'config.yaml';

export interface ListenAddress {
  host?: string;
  port: number;
}

export interface AppConfig {
  listen: ListenAddress;
  basePath: string;
  requestTimeoutMs: number;
  replyPolicy: ReplyPolicy;
  sender: SenderSettings;
  header: MessageHeader;
  directory: RecipientDirectory;
  template: CompiledTemplate;
}

type Env = Readonly<Record<string, string | undefined>>;

export function defaultConfigPath(platform: NodeJS.Platform = process.platform): string {
  return platform === 'linux' ? LINUX_CONFIG_PATH : LOCAL_CONFIG_PATH;
}

export function resolveConfigPath(flagValue: string | undefined, env: Env = process.env): string {
  return flagValue || env.CONFIG_FILE || defaultConfigPath();
}

export function parseListenAddress(address: string): ListenAddress {
  const separator = address.lastIndexOf(':');
  const hostPart = separator === -1 ? '' : address.slice(0, separator);
  const portPart = separator === -1 ? address : address.slice(separator + 1);
  const port = Number.parseInt(portPart, 10);
  if (!/^\d+$/.test(portPart) || port > 65535) {
    throw new ConfigError('PARSING CONFIG FILE', `Invalid listen address: ${address}`);
  }
  const host = hostPart.replace(/^\[(.*)\]$/, '$1');
  return host ? { host, port } : { port };
}

function formatIssues(error: ZodError): string {
  return error.errors
    .map((issue) => `  • ${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('\n');
}

function validate(raw: unknown): RawServerConfig {
  try {
    return serverConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError('VALIDATING CONFIG FILE', `Configuration validation failed\n${formatIssues(error)}`, {
        cause: error,
      });
    }
    throw error;
  }
}

/** Parses and validates YAML text, then compiles the template. */
export function parseConfig(text: string, env: Env = process.env): AppConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigError('PARSING CONFIG FILE', errorMessage(error), { cause: error });
  }

  const config = validate(raw);
  const email = config.EmailConfig;

  let template: CompiledTemplate;
  try {
    template = compileTemplate(email.TemplateText, 'Body');
  } catch (error) {
    throw new ConfigError('PARSING EMAIL TEMPLATE', errorMessage(error), { cause: error });
  }

  const directory = RecipientDirectory.fromEntries(
    Object.entries(email.Recipients).map(([key, recipient]): [string, RecipientEntry] => [
      key,
      {
        name: recipient.Name,
        title: recipient.Title,
        address: recipient.Address,
        miscellaneous: recipient.Miscellaneous ?? null,
      },
    ]),
  );

  return {
    listen: parseListenAddress(config.Address),
    basePath: config.BaseURL,
    requestTimeoutMs: config.RequestTimeout,
    replyPolicy: config.ReplyPolicy,
    sender: {
      host: email.Sender.ServerHost,
      port: email.Sender.ServerPort,
      address: email.Sender.SenderAddress,
      name: email.Sender.SenderName,
      password: env.SENDER_PASSWORD || email.Sender.SenderPassword,
    },
    header: {
      from: email.Header.From,
      subject: email.Header.Subject,
      mime: email.Header.MIME,
      miscellaneous: email.Header.Miscellaneous,
    },
    directory,
    template,
  };
}

export async function loadConfig(path: string, env: Env = process.env): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError('READING CONFIG FILE', `${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfig(text, env);
}
