export class ConfigError extends Error {
  constructor(
    public readonly stage: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class TemplateSyntaxError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly offset: number,
    detail: string,
  ) {
    super(`template ${templateName}: ${detail} at offset ${offset}`);
    this.name = 'TemplateSyntaxError';
  }
}

export class RenderExecutionError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly field: string,
    detail: string,
  ) {
    super(`template ${templateName}: executing "${field}": ${detail}`);
    this.name = 'RenderExecutionError';
  }
}

export type DeliveryFailureReason = 'auth' | 'transport';

export class DeliveryError extends Error {
  constructor(
    public readonly reason: DeliveryFailureReason,
    public readonly recipient: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}

export class GatewayTimeoutError extends Error {
  constructor(
    public readonly requestId: string,
    public readonly timeoutMs: number,
    public readonly received: number,
    public readonly expected: number,
  ) {
    super(`request ${requestId} timed out after ${timeoutMs}ms (${received}/${expected} outcomes)`);
    this.name = 'GatewayTimeoutError';
  }
}

export class DispatchClosedError extends Error {
  constructor(message = 'dispatch queue is closed') {
    super(message);
    this.name = 'DispatchClosedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
