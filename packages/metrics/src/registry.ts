import {z} from 'zod';

const MetricNameSchema = z.string().regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/u);
const LabelNameSchema = z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/u);

export type MetricLabels = Record<string, string>;

const escapeLabelValue = (value: string) => value.replace(/\\/gu, '\\\\').replace(/"/gu, '\\"').replace(/\n/gu, '\\n');

const labelsToKey = (labels: MetricLabels) => {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, value]) => `${LabelNameSchema.parse(name)}="${escapeLabelValue(value)}"`);

  return parts.length > 0 ? `{${parts.join(',')}}` : '';
};

/**
 * Monotonic counter keyed by label set. Increments are plain map updates, which
 * are atomic on the event loop.
 */
export class Counter {
  private readonly series = new Map<string, number>();

  public constructor(
    public readonly name: string,
    public readonly help: string
  ) {}

  public inc(labels: MetricLabels = {}, value = 1): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Counter ${this.name} can only be incremented by a non-negative amount`);
    }

    const key = labelsToKey(labels);
    this.series.set(key, (this.series.get(key) ?? 0) + value);
  }

  public get(labels: MetricLabels = {}): number {
    return this.series.get(labelsToKey(labels)) ?? 0;
  }

  public render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    const sortedSeries = Array.from(this.series.entries()).sort(([a], [b]) => a.localeCompare(b));
    for (const [key, value] of sortedSeries) {
      lines.push(`${this.name}${key} ${value}`);
    }

    return lines;
  }
}

export type MetricsRegistryOptions = {
  prefix: string;
  now?: () => number;
};

/**
 * Process metrics registry. One instance is created at startup and handed to every
 * component that records or exposes metrics; tests build their own.
 */
export class MetricsRegistry {
  public readonly contentType = 'text/plain; version=0.0.4; charset=utf-8';

  private readonly counters = new Map<string, Counter>();
  private readonly prefix: string;
  private readonly now: () => number;
  private readonly startedAt: number;

  public constructor({prefix, now = () => Date.now()}: MetricsRegistryOptions) {
    this.prefix = MetricNameSchema.parse(prefix);
    this.now = now;
    this.startedAt = now();
  }

  public counter({name, help}: {name: string; help: string}): Counter {
    const fullName = MetricNameSchema.parse(`${this.prefix}_${name}`);
    const existing = this.counters.get(fullName);
    if (existing) {
      return existing;
    }

    const counter = new Counter(fullName, help);
    this.counters.set(fullName, counter);
    return counter;
  }

  public render(): string {
    const uptimeName = `${this.prefix}_uptime_seconds`;
    const lines = [
      `# HELP ${uptimeName} Process uptime in seconds`,
      `# TYPE ${uptimeName} gauge`,
      `${uptimeName} ${(this.now() - this.startedAt) / 1000}`
    ];

    const sortedCounters = Array.from(this.counters.values()).sort((a, b) => a.name.localeCompare(b.name));
    for (const counter of sortedCounters) {
      lines.push(...counter.render());
    }

    return `${lines.join('\n')}\n`;
  }
}
