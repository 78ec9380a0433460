export type ScalarMetric = {
  readonly kind: "scalar";
  readonly key: string;
  readonly units: string;
  readonly value: number;
};

export type IndexedMetric = {
  readonly kind: "indexed";
  readonly key: string;
  readonly units: string;
  readonly binLabels: readonly string[];
  readonly binUnits: string;
  readonly values: ReadonlyMap<string, number>; // binLabel -> value, in plot order
};

export type MetricValue = ScalarMetric | IndexedMetric;

export type SampleMetrics = ReadonlyMap<string, MetricValue>;

export type SampleData = ReadonlyMap<string, SampleMetrics>; // sampleId -> metricKey -> value

export type FileLabelMapping = Record<string, string>;

export type ScalarAggregate = {
  readonly kind: "scalar";
  readonly values: readonly number[];
};

export type BinnedAggregate = {
  readonly kind: "binned";
  readonly bins: ReadonlyMap<string, readonly number[]>;
  readonly binSamples: ReadonlyMap<string, readonly string[]>;
};

export type Aggregate = ScalarAggregate | BinnedAggregate;

export type Subset = {
  readonly name: string;
  readonly metricKey: string;
  readonly sampleIds: readonly string[];
  readonly aggregate: Aggregate;
};

export type Outlier = {
  label: string;
  score: number;
};

export type CentralTendency = "median" | "mean";

export type ReportLogger = Pick<Console, "info" | "warn">;
