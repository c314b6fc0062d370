import {Counter as PromCounter, Histogram as PromHistogram, Registry} from "prom-client";
import {
  Counter,
  CounterConfig,
  Histogram,
  HistogramConfig,
  LabelsGeneric,
  MetricsRegister,
  NoLabels,
} from "@warden/utils";

/**
 * prom-client Registry that creates metrics registered to itself
 */
export class RegistryMetricCreator extends Registry implements MetricsRegister {
  counter<Labels extends LabelsGeneric = NoLabels>(config: CounterConfig<Labels>): Counter<Labels> {
    return new CounterMetric<Labels>(
      new PromCounter({name: config.name, help: config.help, labelNames: config.labelNames ?? [], registers: [this]})
    );
  }

  histogram<Labels extends LabelsGeneric = NoLabels>(config: HistogramConfig<Labels>): Histogram<Labels> {
    return new HistogramMetric<Labels>(
      new PromHistogram({
        name: config.name,
        help: config.help,
        labelNames: config.labelNames ?? [],
        buckets: config.buckets,
        registers: [this],
      })
    );
  }
}

class CounterMetric<Labels extends LabelsGeneric> implements Counter<Labels> {
  constructor(private readonly counter: PromCounter<string>) {}

  inc(value?: number): void;
  inc(labels: Labels, value?: number): void;
  inc(arg1?: Labels | number, arg2?: number): void {
    if (typeof arg1 === "object") {
      this.counter.inc(arg1, arg2);
    } else {
      this.counter.inc(arg1);
    }
  }
}

class HistogramMetric<Labels extends LabelsGeneric> implements Histogram<Labels> {
  constructor(private readonly histogram: PromHistogram<string>) {}

  startTimer(): () => number {
    const end = this.histogram.startTimer();
    return () => end();
  }

  observe(value: number): void;
  observe(labels: Labels, value: number): void;
  observe(arg1: Labels | number, arg2?: number): void {
    if (typeof arg1 === "object") {
      this.histogram.observe(arg1, arg2 ?? 0);
    } else {
      this.histogram.observe(arg1);
    }
  }
}
