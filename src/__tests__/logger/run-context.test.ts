import { describe, expect, it } from 'vitest';
import { createRunContext, generateRunId } from '../../services/logger/run-context.js';

describe('run context', () => {
  it('generates short distinct ids', () => {
    const a = generateRunId();
    const b = generateRunId();
    expect(a).toMatch(/^[0-9a-f]{8}$/);
    expect(a).not.toBe(b);
  });

  it('carries the service and document', () => {
    const ctx = createRunContext('organize-slip', 'slip.pdf');
    expect(ctx).toMatchObject({ service: 'organize-slip', documentId: 'slip.pdf' });
    expect(ctx.runId).toHaveLength(8);
  });
});
