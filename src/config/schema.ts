import { z } from 'zod';

// Key names follow the YAML files already deployed for this service.

const portSchema = z
  .number()
  .int()
  .min(1, 'Port must be at least 1')
  .max(65535, 'Port must be at most 65535');

// An empty YAML value (`Key:`) parses as null.
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const senderSchema = z.object({
  ServerHost: z.string().min(1, 'SMTP host cannot be empty'),
  ServerPort: portSchema,
  SenderAddress: z.string().min(1, 'Sender address cannot be empty'),
  SenderName: optionalText,
  SenderPassword: optionalText,
});

const recipientSchema = z.object({
  Name: optionalText,
  Title: optionalText,
  Address: z.string().min(1, 'Recipient address cannot be empty'),
  Miscellaneous: z.unknown().optional(),
});

const headerSchema = z.object({
  From: z.string().min(1, 'From header cannot be empty'),
  Subject: optionalText,
  MIME: optionalText,
  Miscellaneous: optionalText,
});

const emailConfigSchema = z.object({
  Sender: senderSchema,
  Recipients: z
    .record(recipientSchema)
    .refine((recipients) => Object.keys(recipients).length > 0, 'At least one recipient is required'),
  Header: headerSchema,
  TemplateText: z.string().min(1, 'Template text cannot be empty'),
});

export const serverConfigSchema = z.object({
  Address: z.string().min(1).default('localhost:8082'),
  BaseURL: z.string().startsWith('/', 'BaseURL must start with "/"').default('/'),
  RequestTimeout: z.number().int().positive().default(30_000),
  ReplyPolicy: z.enum(['all', 'first']).default('all'),
  EmailConfig: emailConfigSchema,
});

export type RawServerConfig = z.infer<typeof serverConfigSchema>;
