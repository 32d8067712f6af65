import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { IssuanceMetrics } from './services/sshIssuer.js';

const PREFIX = 'identity_portal_';

export interface MetricsOptions {
  /** Process and runtime metrics from prom-client; left off in tests. */
  defaultMetrics?: boolean;
}

/** Prometheus metrics on a registry of their own, served at /metrics. */
export class Metrics implements IssuanceMetrics {
  readonly registry = new Registry();
  private readonly httpRequests: Counter<'method' | 'route' | 'status'>;
  private readonly httpDuration: Histogram<'method' | 'route'>;
  private readonly certsIssued: Counter<'role'>;
  private readonly certErrors: Counter<'role' | 'code'>;
  private readonly kubeconfigs: Counter;

  constructor(opts: MetricsOptions = {}) {
    const registers = [this.registry];
    if (opts.defaultMetrics) collectDefaultMetrics({ register: this.registry, prefix: PREFIX });
    this.httpRequests = new Counter({
      name: `${PREFIX}http_requests_total`,
      help: 'HTTP requests by method, route and status',
      labelNames: ['method', 'route', 'status'],
      registers,
    });
    this.httpDuration = new Histogram({
      name: `${PREFIX}http_request_duration_seconds`,
      help: 'HTTP request latency',
      labelNames: ['method', 'route'],
      buckets: [0.005, 0.025, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers,
    });
    this.certsIssued = new Counter({
      name: `${PREFIX}ssh_certs_issued_total`,
      help: 'SSH certificates issued',
      labelNames: ['role'],
      registers,
    });
    this.certErrors = new Counter({
      name: `${PREFIX}ssh_cert_errors_total`,
      help: 'SSH signing requests that did not produce a certificate',
      labelNames: ['role', 'code'],
      registers,
    });
    this.kubeconfigs = new Counter({
      name: `${PREFIX}kubeconfigs_generated_total`,
      help: 'kubeconfig documents handed out',
      registers,
    });
  }

  /** Exposes 1 while the service credential is usable, 0 otherwise. */
  watchCredential(isReady: () => boolean): void {
    new Gauge({
      name: `${PREFIX}credential_ready`,
      help: 'Whether the PKI backend credential is usable',
      registers: [this.registry],
      collect() {
        this.set(isReady() ? 1 : 0);
      },
    });
  }

  observeRequest(method: string, route: string, status: number, seconds: number): void {
    this.httpRequests.inc({ method, route, status: String(status) });
    this.httpDuration.observe({ method, route }, seconds);
  }

  certIssued(role: string): void {
    this.certsIssued.inc({ role });
  }

  certFailed(role: string, code: string): void {
    this.certErrors.inc({ role, code });
  }

  kubeconfigGenerated(): void {
    this.kubeconfigs.inc();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
