/**
 * CodeRunner HTTP server
 *
 * POST /run_code → validate → execute → JSON result
 * GET  /health   → liveness and the workspace in use
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { Logger } from '@coderunner/shared/Utils/logger.js';
import { createErrorBody, toErrorBody } from '@coderunner/shared/Types/error-body.js';
import { ValidationError } from '@coderunner/shared/Types/errors.js';
import { validateRunRequest } from './validation/request.js';
import { SUPPORTED_LANGUAGES } from './executor/languages.js';
import type { ExecutionEngine } from './executor/engine.js';
import type { ExecutionResult } from './executor/types.js';
import type { Workspace } from './workspace/workspace.js';

export const SERVICE_NAME = 'coderunner';
export const SERVICE_VERSION = '1.0.0';

export interface ServerDeps {
  workspace: Workspace;
  engine: ExecutionEngine;
  /** express.json() body limit, e.g. "1mb" */
  maxBody?: string;
  logger?: Logger;
}

interface HealthResponse {
  status: 'ok';
  service: string;
  version: string;
  uptime: number;
  workspace: string;
  languages: readonly string[];
}

/** HTTP status for an execution result */
export function statusForResult(result: ExecutionResult): number {
  if (result.status === 'success') return 200;
  switch (result.error_code) {
    case 'TIMED_OUT': return 408;
    case 'WRITE_FAILED':
    case 'SPAWN_FAILED': return 500;
  }
}

/** body-parser attaches `type` (and `status`) to the errors it raises */
function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('type' in err)) return undefined;
  return typeof err.type === 'string' ? err.type : undefined;
}

export function createServer(deps: ServerDeps) {
  const logger = deps.logger ?? new Logger('coderunner:http');
  const startTime = Date.now();
  const app = express();

  app.disable('x-powered-by');
  // Parse every body as JSON regardless of Content-Type so plain-text posts get a 400
  app.use(express.json({ limit: deps.maxBody ?? '1mb', type: () => true }));

  app.get('/health', (_req: Request, res: Response) => {
    const response: HealthResponse = {
      status: 'ok',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      workspace: deps.workspace.root,
      languages: SUPPORTED_LANGUAGES,
    };
    res.json(response);
  });

  app.post('/run_code', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const filename = typeof body === 'object' && body !== null && 'filename' in body ? body.filename : undefined;
    logger.info('Received /run_code request', { filename });

    try {
      const request = validateRunRequest(body, deps.workspace);
      const result = await deps.engine.run(request);
      res.status(statusForResult(result)).json(result);
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn(`Rejected /run_code request: ${error.message}`, { error_code: error.code });
        res.status(400).json(toErrorBody(error));
        return;
      }
      logger.error('Unexpected error handling /run_code', error);
      res.status(500).json(toErrorBody(error));
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json(createErrorBody('Not found', 'NOT_FOUND'));
  });

  // Body parsing failures land here; express recognises the 4-argument signature
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const type = bodyParserErrorType(err);
    if (type === 'entity.parse.failed') {
      logger.warn('Rejected request with malformed JSON');
      res.status(400).json(createErrorBody('Invalid JSON payload', 'INVALID_PAYLOAD'));
      return;
    }
    if (type === 'entity.too.large') {
      res.status(413).json(createErrorBody('Request body too large', 'PAYLOAD_TOO_LARGE'));
      return;
    }
    logger.error('Unhandled request error', err);
    res.status(500).json(toErrorBody(err));
  });

  return app;
}
