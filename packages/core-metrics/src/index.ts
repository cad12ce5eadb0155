import { Controller, Get, Global, Header, Module } from "@nestjs/common";
import { Counter, Gauge, Histogram, register } from "prom-client";

export interface IMetrics {
  increment(name: string, labels?: Record<string, string>): void;
  observe(name: string, value: number, labels?: Record<string, string>): void;
  gauge(name: string, value: number, labels?: Record<string, string>): void;
}

export const METRICS = Symbol("METRICS");

const LATENCY_BUCKETS_MS = [1, 5, 10, 25, 50, 100, 250, 500, 1000];

export class PrometheusMetricsService implements IMetrics {
  private readonly counters = new Map<string, Counter<string>>();
  private readonly histograms = new Map<string, Histogram<string>>();
  private readonly gauges = new Map<string, Gauge<string>>();

  constructor(service = process.env.SERVICE_NAME ?? "wagerhouse") {
    register.setDefaultLabels({ service });
  }

  increment(name: string, labels: Record<string, string> = {}): void {
    this.counter(name, Object.keys(labels)).inc(labels, 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    this.histogram(name, Object.keys(labels)).observe(labels, value);
  }

  gauge(name: string, value: number, labels: Record<string, string> = {}): void {
    this.gaugeFor(name, Object.keys(labels)).set(labels, value);
  }

  private counter(name: string, labelNames: string[]): Counter<string> {
    const existing = this.counters.get(name);
    if (existing) return existing;
    const created = new Counter({ name, help: `${name}_counter`, labelNames });
    this.counters.set(name, created);
    return created;
  }

  private histogram(name: string, labelNames: string[]): Histogram<string> {
    const existing = this.histograms.get(name);
    if (existing) return existing;
    const created = new Histogram({ name, help: `${name}_histogram`, labelNames, buckets: LATENCY_BUCKETS_MS });
    this.histograms.set(name, created);
    return created;
  }

  private gaugeFor(name: string, labelNames: string[]): Gauge<string> {
    const existing = this.gauges.get(name);
    if (existing) return existing;
    const created = new Gauge({ name, help: `${name}_gauge`, labelNames });
    this.gauges.set(name, created);
    return created;
  }
}

export class NoopMetricsService implements IMetrics {
  increment(): void {}
  observe(): void {}
  gauge(): void {}
}

@Controller()
export class MetricsController {
  @Get("metrics")
  @Header("Content-Type", "text/plain")
  async metrics(): Promise<string> {
    return register.metrics();
  }
}

@Global()
@Module({
  controllers: [MetricsController],
  providers: [
    {
      provide: METRICS,
      useFactory: (): IMetrics => {
        if (process.env.METRICS_DISABLED === "true") {
          return new NoopMetricsService();
        }
        return new PrometheusMetricsService();
      },
    },
  ],
  exports: [METRICS],
})
export class MetricsModule {}
