/**
 * Lightweight Prometheus Metrics
 *
 * Counter / gauge / histogram primitives that render to Prometheus text
 * format, enough for provider latency, fallback outcomes and cache hit
 * rates. No external dependencies.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface Labels {
  [key: string]: string;
}

interface Metric {
  render(): string;
  reset(): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Counter
// ─────────────────────────────────────────────────────────────────────────────

class Counter implements Metric {
  private readonly values = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  inc(labels: Labels = {}, amount = 1): void {
    const key = serializeLabels(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + amount);
  }

  get(labels: Labels = {}): number {
    return this.values.get(serializeLabels(labels)) ?? 0;
  }

  render(): string {
    const lines = header(this.name, this.help, 'counter');
    for (const [key, val] of this.values) {
      lines.push(`${this.name}${key} ${val}`);
    }
    return lines.join('\n');
  }

  reset(): void {
    this.values.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Gauge
// ─────────────────────────────────────────────────────────────────────────────

class Gauge implements Metric {
  private readonly values = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  set(labels: Labels, value: number): void {
    this.values.set(serializeLabels(labels), value);
  }

  get(labels: Labels = {}): number | undefined {
    return this.values.get(serializeLabels(labels));
  }

  render(): string {
    const lines = header(this.name, this.help, 'gauge');
    for (const [key, val] of this.values) {
      lines.push(`${this.name}${key} ${val}`);
    }
    return lines.join('\n');
  }

  reset(): void {
    this.values.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Histogram (count + sum + cumulative buckets)
// ─────────────────────────────────────────────────────────────────────────────

const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

interface HistogramEntry {
  count: number;
  sum: number;
  buckets: number[];
}

class Histogram implements Metric {
  private readonly buckets: number[];
  private readonly data = new Map<string, HistogramEntry>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    buckets?: number[],
  ) {
    this.buckets = buckets ?? DEFAULT_BUCKETS;
  }

  observe(labels: Labels, value: number): void {
    const key = serializeLabels(labels);
    const entry = this.data.get(key) ?? {
      count: 0,
      sum: 0,
      buckets: new Array<number>(this.buckets.length).fill(0),
    };
    this.data.set(key, entry);
    entry.count++;
    entry.sum += value;
    this.buckets.forEach((bound, i) => {
      if (value <= bound) entry.buckets[i]++;
    });
  }

  render(): string {
    const lines = header(this.name, this.help, 'histogram');
    for (const [key, entry] of this.data) {
      this.buckets.forEach((bound, i) => {
        lines.push(`${this.name}_bucket${injectLabel(key, 'le', String(bound))} ${entry.buckets[i]}`);
      });
      lines.push(`${this.name}_bucket${injectLabel(key, 'le', '+Inf')} ${entry.count}`);
      lines.push(`${this.name}_sum${key} ${entry.sum}`);
      lines.push(`${this.name}_count${key} ${entry.count}`);
    }
    return lines.join('\n');
  }

  reset(): void {
    this.data.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function header(name: string, help: string, type: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

function serializeLabels(labels: Labels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return '';
  return `{${entries.map(([k, v]) => `${k}="${v}"`).join(',')}}`;
}

function injectLabel(existingKey: string, name: string, value: string): string {
  const extra = `${name}="${value}"`;
  if (!existingKey) return `{${extra}}`;
  return existingKey.replace(/}$/, `,${extra}}`);
}

// ─────────────────────────────────────────────────────────────────────────────
// Metric Registry
// ─────────────────────────────────────────────────────────────────────────────

const metrics: Metric[] = [];

function register<T extends Metric>(metric: T): T {
  metrics.push(metric);
  return metric;
}

/** Render all registered metrics in Prometheus text exposition format. */
export function renderMetrics(): string {
  return metrics.map((m) => m.render()).join('\n\n') + '\n';
}

/** Zero every registered metric. */
export function resetMetrics(): void {
  for (const metric of metrics) metric.reset();
}

// ─────────────────────────────────────────────────────────────────────────────
// Federation Metrics
// ─────────────────────────────────────────────────────────────────────────────

/** Provider attempts by outcome (ok | empty | error | skipped). */
export const providerCallsTotal = register(
  new Counter('sportsfed_provider_calls_total', 'Provider attempts made by the federation service'),
);

/** Provider method latency in ms, as seen by the federation service. */
export const providerCallDurationMs = register(
  new Histogram('sportsfed_provider_call_duration_ms', 'Provider method latency in milliseconds'),
);

/** Raw upstream HTTP latency in ms (ESPN, TheSportsDB). */
export const externalApiDurationMs = register(
  new Histogram('sportsfed_external_api_duration_ms', 'Upstream HTTP latency in milliseconds'),
);

/** Cache lookups by result (hit | miss | bypass). */
export const cacheLookupsTotal = register(
  new Counter('sportsfed_cache_lookups_total', 'Federation cache lookups by result'),
);

/** Circuit breaker state (0 = CLOSED, 1 = OPEN, 2 = HALF_OPEN). */
export const circuitBreakerState = register(
  new Gauge('sportsfed_circuit_breaker_state', 'Circuit breaker state (0=CLOSED, 1=OPEN, 2=HALF_OPEN)'),
);
