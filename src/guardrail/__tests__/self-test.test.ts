import { describe, it, expect } from 'vitest';
import { createGateway } from '../gateway.js';
import { createDefaultPolicy } from '../policy.js';
import { runSelfTest, SELF_TEST_PROBES, SELF_TEST_SECRET } from '../self-test.js';

describe('runSelfTest', () => {
  it('passes on the default policy', async () => {
    const report = await runSelfTest(createGateway({ backend: null }));

    expect(report.passed).toBe(true);
    expect(report.probes).toEqual([
      { name: 'Jailbreak', safe: false, passed: true },
      { name: 'Command Injection', safe: false, passed: true },
      { name: 'Path Traversal', safe: false, passed: true },
      { name: 'Safe Input', safe: true, passed: true },
    ]);
    expect(report.redaction).toEqual({
      original: SELF_TEST_SECRET,
      redacted: 'API_KEY=sk-***REDACTED***',
      passed: true,
    });
  });

  it('fails when guardrails are disabled', async () => {
    const report = await runSelfTest(createGateway({ policy: createDefaultPolicy({ enabled: false }) }));

    expect(report.passed).toBe(false);
    expect(report.redaction.redacted).toBe(SELF_TEST_SECRET);
    expect(report.probes.filter((probe) => !probe.passed)).toHaveLength(
      SELF_TEST_PROBES.filter((probe) => !probe.expectSafe).length
    );
  });
});
