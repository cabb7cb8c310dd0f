/**
 * API Request/Response Schemas
 *
 * Zod schemas for validating API requests and typing responses.
 */

import { z } from 'zod';
import type { CodeRisk, GatewayStatus } from '../guardrail/index.js';
import type { SelfTestReport } from '../guardrail/index.js';

// ============================================
// Requests
// ============================================

export const textRequestSchema = z.object({
  /** Text to check or process. Length limits are the policy's business. */
  text: z.string(),
});

export const codeRequestSchema = z.object({
  /** Generated code to review */
  code: z.string().min(1),
});

export type TextRequest = z.infer<typeof textRequestSchema>;
export type CodeRequest = z.infer<typeof codeRequestSchema>;

// ============================================
// Responses
// ============================================

export interface CheckInputResponse {
  safe: boolean;
  reason: string | null;
}

export interface ProcessOutputResponse {
  text: string;
}

export interface ReviewCodeResponse {
  risky: boolean;
  risks: CodeRisk[];
}

export type StatusResponse = GatewayStatus;
export type SelfTestResponse = SelfTestReport;

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
  hint?: string;
}
