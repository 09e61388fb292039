import type { ReplyChannel } from '../dispatch/channels';

export type ReplyPolicy = 'all' | 'first';

export type FailureStage = 'render' | 'delivery';

export interface SendFields {
  ipAddress: string;
  firstName: string;
  lastName: string;
  companyName: string;
  emailAddress: string;
  description: string;
}

export interface SendRequest {
  id: string;
  fields: SendFields;
  receivedAt: number;
  reply: ReplyChannel<Outcome>;
}

interface OutcomeBase {
  requestId: string;
  recipientKey: string;
  recipientAddress: string;
}

export type Outcome =
  | (OutcomeBase & { ok: true })
  | (OutcomeBase & { ok: false; stage: FailureStage; error: Error });

export type FailedOutcome = Extract<Outcome, { ok: false }>;

export interface GatewayResult {
  requestId: string;
  ok: boolean;
  outcomes: Outcome[];
  failures: FailedOutcome[];
}

/**
 * Names the template sees. They keep the field names the message
 * templates were written against (`{{.FirstName}}`, `{{.CompanyName}}`...).
 */
export function toTemplateData(fields: SendFields): Record<string, string> {
  return {
    IPAddress: fields.ipAddress,
    FirstName: fields.firstName,
    LastName: fields.lastName,
    CompanyName: fields.companyName,
    EmailAddress: fields.emailAddress,
    Description: fields.description,
  };
}
