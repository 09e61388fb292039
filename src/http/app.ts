import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import multer from 'multer';

import type { GatewayResult, SendFields } from '../contracts/send';
import type { WorkerState } from '../dispatch/worker';
import { errorMessage } from '../errors';
import type { SubmitOptions } from '../gateway/request-gateway';
import { type Logger, silentLogger } from '../logging';

const BODY_LIMIT = '64kb';
const BODY_LIMIT_BYTES = 64 * 1024;

export interface SubmissionGateway {
  submit(fields: SendFields, options?: SubmitOptions): Promise<GatewayResult>;
}

export interface HealthStatus {
  worker: WorkerState;
  recipients: number;
}

export interface AppDependencies {
  gateway: SubmissionGateway;
  basePath?: string;
  health?: () => HealthStatus;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function firstString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return firstString(value[0]);
  return null;
}

// Body fields win over query parameters of the same name.
function formValue(req: Request, name: string): string {
  const fromBody = isRecord(req.body) ? firstString(req.body[name]) : null;
  if (fromBody !== null) return fromBody;
  return firstString(req.query[name]) ?? '';
}

export function readSendFields(req: Request): SendFields {
  return {
    ipAddress: req.ip ?? req.socket.remoteAddress ?? '',
    firstName: formValue(req, 'firstName'),
    lastName: formValue(req, 'lastName'),
    companyName: formValue(req, 'company'),
    emailAddress: formValue(req, 'email'),
    description: formValue(req, 'description'),
  };
}

export function createApp({ gateway, basePath = '/', health, logger = silentLogger }: AppDependencies) {
  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', ...health?.(), timestamp: Date.now() });
  });

  // Multipart forms carry text fields only; any file part is rejected.
  const multipart = multer({ limits: { fieldSize: BODY_LIMIT_BYTES, files: 0 } }).none();
  app.use(
    basePath,
    multipart,
    express.urlencoded({ extended: false, limit: BODY_LIMIT }),
    express.json({ limit: BODY_LIMIT }),
  );

  app.post(basePath, async (req: Request, res: Response) => {
    const fields = readSendFields(req);
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort(new Error('client disconnected'));
    });

    try {
      const result = await gateway.submit(fields, { signal: controller.signal });
      if (!result.ok) {
        res.status(500).send('Internal Error');
        return;
      }
      res.send('Success!');
    } catch (error) {
      logger.error('Error handling client', {
        ip: fields.ipAddress,
        name: `${fields.firstName} ${fields.lastName}`,
        company: fields.companyName,
        email: fields.emailAddress,
        error: errorMessage(error),
      });
      if (!res.headersSent) {
        res.status(500).send('Internal Error');
      }
    }
  });

  app.all(basePath, (_req: Request, res: Response) => {
    res.status(501).send('Invalid request');
  });

  const handleBodyError: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    const status = isRecord(error) && typeof error.status === 'number' ? error.status : 500;
    if (error instanceof multer.MulterError || (status >= 400 && status < 500)) {
      res.status(400).send('Invalid Form');
      return;
    }
    next(error);
  };
  app.use(handleBodyError);

  return app;
}
