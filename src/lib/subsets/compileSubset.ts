import { ExtractionError, ValidationError } from "../errors";
import type {
  Aggregate,
  BinnedAggregate,
  MetricValue,
  SampleData,
  ScalarAggregate
} from "../../types/qcReport";

export type CompileSource = {
  sampleIds: readonly string[];
  metricKeys: readonly string[];
  data: SampleData;
};

export const assertSubset = (sampleIds: readonly string[], subset: readonly string[]) => {
  if (subset.length === 0) {
    throw new ValidationError("Sample subset is empty");
  }
  const known = new Set(sampleIds);
  const unknown = subset.filter((sampleId) => !known.has(sampleId));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Samples ${unknown.join(", ")} are not a subset of the configured samples ${sampleIds.join(", ")}`
    );
  }
};

export const assertMetricKey = (metricKeys: readonly string[], metricKey: string) => {
  if (!metricKeys.includes(metricKey)) {
    throw new ValidationError(`Missing metric key ${metricKey}`);
  }
};

const getMetric = (data: SampleData, sampleId: string, metricKey: string): MetricValue => {
  const metric = data.get(sampleId)?.get(metricKey);
  if (!metric) {
    throw new ValidationError(`Sample ${sampleId} has no value for ${metricKey}`);
  }
  return metric;
};

type SampleMetric = {
  sampleId: string;
  metric: MetricValue;
};

const mixedKindsError = (metric: MetricValue, sampleId: string, compiledKind: string) =>
  new ExtractionError(
    `For ${metric.key}, sample ${sampleId} holds ${metric.kind} data where ${compiledKind} data was compiled. Aggregation is not implemented for mixed metric kinds`
  );

const compileScalar = (entries: SampleMetric[]): ScalarAggregate => ({
  kind: "scalar",
  values: entries.map(({ sampleId, metric }) => {
    if (metric.kind !== "scalar") {
      throw mixedKindsError(metric, sampleId, "scalar");
    }
    return metric.value;
  })
});

const compileBinned = (entries: SampleMetric[]): BinnedAggregate => {
  const bins = new Map<string, number[]>();
  const binSamples = new Map<string, string[]>();
  entries.forEach(({ sampleId, metric }) => {
    if (metric.kind !== "indexed") {
      throw mixedKindsError(metric, sampleId, "indexed");
    }
    metric.values.forEach((value, binLabel) => {
      const binValues = bins.get(binLabel) ?? [];
      const sampleIds = binSamples.get(binLabel) ?? [];
      binValues.push(value);
      sampleIds.push(sampleId);
      bins.set(binLabel, binValues);
      binSamples.set(binLabel, sampleIds);
    });
  });
  return { kind: "binned", bins, binSamples };
};

/**
 * Gathers one metric across a subset of samples. Scalar metrics give one value
 * per sample in subset order; indexed metrics give, per bin label, the values of
 * the samples whose curve has that bin. Bins a sample lacks are not padded here.
 */
export const compileSubset = (
  source: CompileSource,
  subset: readonly string[],
  metricKey: string
): Aggregate => {
  assertSubset(source.sampleIds, subset);
  assertMetricKey(source.metricKeys, metricKey);

  const entries = subset.map((sampleId) => ({
    sampleId,
    metric: getMetric(source.data, sampleId, metricKey)
  }));
  return entries[0].metric.kind === "scalar" ? compileScalar(entries) : compileBinned(entries);
};
