import { describe, it, expect } from 'vitest';
import { Metrics } from './metrics.js';

describe('Metrics', () => {
  it('reads credential readiness at scrape time', async () => {
    const metrics = new Metrics();
    let ready = false;
    metrics.watchCredential(() => ready);
    expect((await metrics.render()).split('\n')).toContain('identity_portal_credential_ready 0');
    ready = true;
    expect((await metrics.render()).split('\n')).toContain('identity_portal_credential_ready 1');
  });

  it('keeps each instance on its own registry', async () => {
    const a = new Metrics();
    const b = new Metrics();
    a.certIssued('developer');
    expect((await a.render()).split('\n')).toContain('identity_portal_ssh_certs_issued_total{role="developer"} 1');
    expect(await b.render()).not.toContain('role="developer"');
  });

  it('observes request latency under the route pattern', async () => {
    const metrics = new Metrics();
    metrics.observeRequest('GET', '/api/v1/users/:id', 200, 0.02);
    const lines = (await metrics.render()).split('\n');
    const bucket = (le: string) =>
      lines.find((l) => l.startsWith('identity_portal_http_request_duration_seconds_bucket{') && l.includes(`le="${le}"`));
    expect(bucket('0.005')?.endsWith(' 0')).toBe(true);
    expect(bucket('0.025')?.endsWith(' 1')).toBe(true);
    expect(lines).toContain('identity_portal_http_request_duration_seconds_count{method="GET",route="/api/v1/users/:id"} 1');
  });
});
