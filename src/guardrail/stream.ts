import type { SafetyGateway } from './gateway.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'stream-guard' });

/**
 * Pass a streamed response through unchanged, then run the output gate on
 * the collected text. Chunks already sent cannot be recalled, so the
 * processed text is the generator's return value for callers that store
 * or resend the response.
 */
export async function* guardResponseStream(
  gateway: SafetyGateway,
  chunks: AsyncIterable<string>
): AsyncGenerator<string, string, undefined> {
  let fullResponse = '';

  for await (const chunk of chunks) {
    fullResponse += chunk;
    yield chunk;
  }

  const processed = await gateway.processOutput(fullResponse);
  if (processed !== fullResponse) {
    log.info({ length: fullResponse.length }, 'Streamed response was sanitized by guardrails');
  }
  return processed;
}
