/**
 * Guard API Routes
 *
 * POST /api/guard/input     - Run the input gate
 * POST /api/guard/output    - Run the output gate
 * POST /api/guard/code      - Advisory review of generated code
 * GET  /api/guard/status    - Gateway status
 * POST /api/guard/self-test - Run the built-in probes
 */

import { Router, type RequestHandler, type Response } from 'express';
import type { AuthenticatedRequest } from '../middleware/jwt-auth.js';
import {
  codeRequestSchema,
  textRequestSchema,
  type ApiError,
  type CheckInputResponse,
  type ProcessOutputResponse,
  type ReviewCodeResponse,
  type SelfTestResponse,
  type StatusResponse,
} from '../schemas.js';
import { runSelfTest, type SafetyGateway } from '../../guardrail/index.js';
import { logger } from '../../utils/logger.js';

function sendValidationError(res: Response, details: unknown): void {
  const error: ApiError = {
    error: 'Invalid request',
    code: 'VALIDATION_ERROR',
    details,
  };
  res.status(400).json(error);
}

export function createGuardRouter(gateway: SafetyGateway, auth: RequestHandler): Router {
  const guardRouter = Router();

  // Apply JWT auth to all routes
  guardRouter.use(auth);

  /**
   * POST /api/guard/input
   *
   * A client that disconnects cancels the backend call.
   */
  guardRouter.post('/input', async (req: AuthenticatedRequest, res: Response) => {
    const parseResult = textRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      sendValidationError(res, parseResult.error.flatten());
      return;
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const verdict = await gateway.checkInput(parseResult.data.text, { signal: controller.signal });

    logger.info({ user: req.user?.sub, safe: verdict.safe }, 'Guard input check completed');

    const response: CheckInputResponse = { safe: verdict.safe, reason: verdict.reason };
    res.json(response);
  });

  /**
   * POST /api/guard/output
   */
  guardRouter.post('/output', async (req: AuthenticatedRequest, res: Response) => {
    const parseResult = textRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      sendValidationError(res, parseResult.error.flatten());
      return;
    }

    const response: ProcessOutputResponse = { text: await gateway.processOutput(parseResult.data.text) };
    res.json(response);
  });

  /**
   * POST /api/guard/code
   */
  guardRouter.post('/code', (req: AuthenticatedRequest, res: Response) => {
    const parseResult = codeRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      sendValidationError(res, parseResult.error.flatten());
      return;
    }

    const risks = gateway.reviewGeneratedCode(parseResult.data.code);
    const response: ReviewCodeResponse = { risky: risks.length > 0, risks };
    res.json(response);
  });

  /**
   * GET /api/guard/status
   */
  guardRouter.get('/status', (_req: AuthenticatedRequest, res: Response) => {
    const response: StatusResponse = gateway.getStatus();
    res.json(response);
  });

  /**
   * POST /api/guard/self-test
   */
  guardRouter.post('/self-test', async (req: AuthenticatedRequest, res: Response) => {
    const response: SelfTestResponse = await runSelfTest(gateway);

    logger.info({ user: req.user?.sub, passed: response.passed }, 'Guard self-test completed');

    res.json(response);
  });

  return guardRouter;
}
