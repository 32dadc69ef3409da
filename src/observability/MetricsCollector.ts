// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // authenticate() outcomes: memory | cache | refresh | full_flow | failed
    this.addCounter('auth_requests', 'authenticate() calls by resolution path', ['outcome']);

    this.addCounter('token_refresh', 'Token refresh attempts', ['status']);
    this.histograms.set(
      'token_refresh_duration',
      new Histogram({
        name: 'token_refresh_duration_seconds',
        help: 'Token refresh duration',
        labelNames: ['status'],
        buckets: [0.1, 0.3, 0.5, 1, 2],
        registers: [this.registry],
      })
    );

    // Interactive flows include the time the user spends in the browser
    this.histograms.set(
      'authorization_flow_duration',
      new Histogram({
        name: 'authorization_flow_duration_seconds',
        help: 'Interactive authorization flow duration',
        labelNames: ['status'],
        buckets: [1, 5, 15, 30, 60, 120, 300],
        registers: [this.registry],
      })
    );

    this.addCounter('callback_requests', 'Requests received by the loopback listener', ['outcome']);
    this.addCounter('cache_writes', 'Token cache writes', ['status']);
    this.addCounter('cache_corrupt', 'Corrupt token cache files discarded', []);
    this.addCounter('api_requests', 'Requests sent through the client handle', ['method', 'status']);
  }

  private addCounter(name: string, help: string, labelNames: string[]): void {
    this.counters.set(
      name,
      new Counter({
        name: `${name}_total`,
        help,
        labelNames,
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Labels): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
