export type NoLabels = Record<string, never>;
export type LabelsGeneric = Record<string, string | number>;
export type LabelKeys<Labels extends LabelsGeneric> = Extract<keyof Labels, string>;

// Overloads mirror prom-client, labels first when present
export interface Counter<Labels extends LabelsGeneric = NoLabels> {
  inc(value?: number): void;
  inc(labels: Labels, value?: number): void;
}

export interface Histogram<Labels extends LabelsGeneric = NoLabels> {
  /** Returns a function that observes and returns the elapsed seconds */
  startTimer(): () => number;

  observe(value: number): void;
  observe(labels: Labels, value: number): void;
}

export type CounterConfig<Labels extends LabelsGeneric> = {
  name: string;
  help: string;
  labelNames?: LabelKeys<Labels>[];
};

export type HistogramConfig<Labels extends LabelsGeneric> = CounterConfig<Labels> & {
  buckets?: number[];
};

export interface MetricsRegister {
  counter<Labels extends LabelsGeneric = NoLabels>(config: CounterConfig<Labels>): Counter<Labels>;
  histogram<Labels extends LabelsGeneric = NoLabels>(config: HistogramConfig<Labels>): Histogram<Labels>;
}
