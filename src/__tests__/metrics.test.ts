import { describe, expect, it } from 'vitest';
import { circuitStateValue, createMetrics } from '../metrics.js';

describe('metrics', () => {
  it('encodes circuit states as gauge values', () => {
    expect(circuitStateValue('closed')).toBe(0);
    expect(circuitStateValue('open')).toBe(1);
    expect(circuitStateValue('half_open')).toBe(2);
  });

  it('gives every context its own registry', async () => {
    const first = createMetrics();
    const second = createMetrics();
    first.requestsTotal.inc({ endpoint: 'users', status: '200', method: 'GET' });

    expect((await first.requestsTotal.get()).values).toHaveLength(1);
    expect((await second.requestsTotal.get()).values).toHaveLength(0);
  });
});
