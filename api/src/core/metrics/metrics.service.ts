import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';

type CMap = { [k: string]: number };

type LabelledCounter = {
  counter: Counter<string>;
  labelNames: readonly string[];
};

@Injectable()
export class MetricsService implements OnModuleDestroy {
  private readonly logger = new Logger(MetricsService.name);
  private counters: CMap = Object.create(null);
  private sums: CMap = Object.create(null);
  private counts: CMap = Object.create(null);
  private gauges: CMap = Object.create(null);
  private readonly registry = new Registry();
  private readonly known = new Map<string, LabelledCounter>();
  private httpReqCounter?: Counter<string>;
  private httpReqDuration?: Histogram<string>;
  private recalcDuration?: Histogram<string>;
  private stopDefaultMetrics?: () => void;

  constructor() {
    try {
      const enableDefaults =
        process.env.METRICS_DEFAULTS === '1' || process.env.NODE_ENV !== 'test';
      if (enableDefaults) {
        collectDefaultMetrics({ register: this.registry });
        this.stopDefaultMetrics = () => this.registry.clear();
      }
    } catch (err) {
      logIgnoredError(err, 'MetricsService default metrics', this.logger);
    }
    this.register(
      'bonus_ledger_entries_total',
      'Bonus ledger entries appended',
      ['type'],
    );
    this.register(
      'bonus_ledger_amount_total',
      'Absolute bonus amount (minor units) by operation type',
      ['type'],
    );
    this.register(
      'engine_failures_total',
      'Hook failures recorded to the dead-letter table',
      ['engine'],
    );
    this.register(
      'discount_recalculations_total',
      'Transactions whose discount was recomputed',
      ['source'],
    );
    this.recalcDuration = new Histogram({
      name: 'bonus_recalculation_duration_seconds',
      help: 'Bulk bonus recompute duration seconds',
      buckets: [1, 5, 15, 60, 300, 900, 3600],
      registers: [this.registry],
    });
    this.httpReqCounter = new Counter({
      name: 'http_requests_total',
      help: 'HTTP requests total',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });
    this.httpReqDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request duration seconds',
      labelNames: ['method', 'route', 'status'],
      buckets: [0.01, 0.025, 0.05, 0.1, 0.2, 0.5, 1, 2, 5],
      registers: [this.registry],
    });
  }

  onModuleDestroy() {
    this.stopDefaultMetrics?.();
  }

  inc(name: string, labels: Record<string, string> = {}, value = 1) {
    const known = this.known.get(name);
    if (known) {
      const picked: Record<string, string> = {};
      for (const label of known.labelNames) {
        picked[label] = labels[label] ?? 'unknown';
      }
      known.counter.inc(picked, value);
      return;
    }
    const key = this.key(name, labels);
    this.counters[key] = (this.counters[key] || 0) + value;
  }

  observe(name: string, ms: number, labels: Record<string, string> = {}) {
    if (name === 'bonus_recalculation_duration_ms') {
      this.recalcDuration?.observe(ms / 1000);
      return;
    }
    const sumKey = this.key(name + '_sum', labels);
    const cntKey = this.key(name + '_count', labels);
    this.sums[sumKey] = (this.sums[sumKey] || 0) + ms;
    this.counts[cntKey] = (this.counts[cntKey] || 0) + 1;
  }

  setGauge(name: string, v: number, labels: Record<string, string> = {}) {
    this.gauges[this.key(name, labels)] = v;
  }

  /** Current value of a known counter, summed over all label sets. */
  async counterValue(
    name: string,
    labels: Record<string, string> = {},
  ): Promise<number> {
    const known = this.known.get(name);
    if (!known) return this.counters[this.key(name, labels)] ?? 0;
    const snapshot = await known.counter.get();
    return snapshot.values
      .filter((entry) =>
        Object.entries(labels).every(
          ([label, value]) => entry.labels[label] === value,
        ),
      )
      .reduce((sum, entry) => sum + entry.value, 0);
  }

  async exportProm(): Promise<string> {
    const lines: string[] = [];
    for (const [key, v] of Object.entries(this.counters)) {
      lines.push(`${key} ${v}`);
    }
    for (const [key, v] of Object.entries(this.sums)) {
      lines.push(`${key} ${v}`);
    }
    for (const [key, v] of Object.entries(this.counts)) {
      lines.push(`${key} ${v}`);
    }
    for (const [key, v] of Object.entries(this.gauges)) {
      lines.push(`${key} ${v}`);
    }
    try {
      lines.push(await this.registry.metrics());
    } catch (err) {
      logIgnoredError(err, 'MetricsService registry export', this.logger);
    }
    return lines.join('\n') + (lines.length ? '\n' : '');
  }

  recordHttp(method: string, route: string, status: number, seconds: number) {
    const m = String(method || '').toUpperCase();
    const r = route || 'unknown';
    const s = String(status || 0);
    this.httpReqCounter?.inc({ method: m, route: r, status: s });
    this.httpReqDuration?.observe({ method: m, route: r, status: s }, seconds);
  }

  private register(name: string, help: string, labelNames: string[]) {
    const counter = new Counter({
      name,
      help,
      labelNames,
      registers: [this.registry],
    });
    this.known.set(name, { counter, labelNames });
  }

  private key(name: string, labels: Record<string, string>): string {
    const lbls = Object.keys(labels)
      .sort()
      .map((k) => `${k}="${labels[k]}"`)
      .join(',');
    return lbls ? `${name}{${lbls}}` : name;
  }
}
