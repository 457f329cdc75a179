// src/observability/MetricsCollector.ts

import { Registry, Counter } from 'prom-client';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // Authorization flow metrics
    this.counters.set(
      'authorization_urls_total',
      new Counter({
        name: 'authorization_urls_total',
        help: 'Authorization URLs built, by redirect target',
        labelNames: ['provider', 'target'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'login_urls_total',
      new Counter({
        name: 'login_urls_total',
        help: 'Login URLs built',
        labelNames: ['provider'],
        registers: [this.registry],
      })
    );

    // OAuth1 client metrics
    this.counters.set(
      'oauth1_requests_total',
      new Counter({
        name: 'oauth1_requests_total',
        help: 'OAuth1 token endpoint requests',
        labelNames: ['step', 'status'],
        registers: [this.registry],
      })
    );

    this.logger?.debug('Metrics initialized', { counters: Array.from(this.counters.keys()) });
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
