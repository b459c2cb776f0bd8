import { describe, expect, it } from 'vitest';
import { buildHealthReport } from '../../src/health';

const NOW = new Date('2024-05-01T12:00:00Z');

describe('buildHealthReport', () => {
  it('reports healthy when every dependency is up', () => {
    const report = buildHealthReport(true, true, true, NOW);

    expect(report.status).toBe('healthy');
    expect(report.timestamp).toBe('2024-05-01T12:00:00.000Z');
    expect(report.checks).toEqual({ mongodb: 'connected', discord: 'ready', scheduler: 'running' });
    expect(report.uptime).toBeGreaterThanOrEqual(0);
  });

  it('reports degraded when the database is down', () => {
    const report = buildHealthReport(false, true, true, NOW);

    expect(report.status).toBe('degraded');
    expect(report.checks).toEqual({ mongodb: 'disconnected', discord: 'ready', scheduler: 'running' });
  });

  it('reports degraded when the gateway is not ready or the scheduler is stopped', () => {
    expect(buildHealthReport(true, false, true, NOW)).toMatchObject({
      status: 'degraded',
      checks: { discord: 'not ready' },
    });
    expect(buildHealthReport(true, true, false, NOW)).toMatchObject({
      status: 'degraded',
      checks: { scheduler: 'stopped' },
    });
  });
});
