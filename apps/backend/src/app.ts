import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import cors from 'cors';
import { AssistantController } from '@/controllers/assistantController';
import { setupRoutes } from '@/routes';
import { describeError } from '@/errors';
import type { Logger } from '@/lib/logger';
import type { BookAssistant } from '@/services/bookAssistant';
import type { ApiErrorResponse } from '@/types';

export function createApp(assistant: BookAssistant, logger: Logger): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  const assistantController = new AssistantController(assistant, logger);
  app.use('/api', setupRoutes(assistantController));

  // Four arguments mark this as express' error handler (also catches body-parser failures).
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status === undefined) {
      logger.error('Unhandled error while serving request:', error);
    }
    const body: ApiErrorResponse = {
      error:
        status !== undefined
          ? { code: 'INVALID_REQUEST', message: describeError(error) }
          : { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    };
    res.status(status ?? 500).json(body);
  });

  return app;
}

/**
 * The 4xx status carried by an error (body-parser sets `status` and `statusCode`), if any.
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const status =
    'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) return status;
  return error instanceof SyntaxError ? 400 : undefined;
}

/**
 * Start listening; rejects when the server cannot bind (e.g. EADDRINUSE).
 */
export function startServer(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
