import { describe, it, expect } from 'vitest';
import { createDispatchMeta } from '../meta.js';

describe('createDispatchMeta', () => {
  it('copies the target and stamps the time', () => {
    const meta = createDispatchMeta(
      { gateway: 'query', domain: 'tasks', operation: 'next', source: 'cli', requestId: 'req-1' },
      Date.now(),
    );
    expect(meta).toMatchObject({
      gateway: 'query',
      domain: 'tasks',
      operation: 'next',
      source: 'cli',
      requestId: 'req-1',
    });
    expect(meta.duration_ms).toBeGreaterThanOrEqual(0);
    expect(new Date(meta.timestamp).toISOString()).toBe(meta.timestamp);
  });

  it('defaults to mcp and generates a request id', () => {
    const meta = createDispatchMeta({ gateway: 'mutate', domain: 'tasks', operation: 'add' }, Date.now());
    expect(meta.source).toBe('mcp');
    expect(meta.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('measures from the start time', () => {
    const meta = createDispatchMeta({ gateway: 'query', domain: 'tasks', operation: 'next' }, Date.now() - 50);
    expect(meta.duration_ms).toBeGreaterThanOrEqual(50);
  });
});
