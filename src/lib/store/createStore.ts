import { ValidationError } from "../errors";
import { detectOutliers as scoreAggregate } from "../outliers/detectOutliers";
import { extractSampleMetrics } from "../report/extract";
import { listFileLabels } from "../report/fileLabels";
import { loadQcReportFile } from "../report/loadReport";
import { parseQcReport } from "../report/schema";
import { assertMetricKey, assertSubset, compileSubset } from "../subsets/compileSubset";
import { resolveStoreConfig, type QcReportStoreOptions } from "./config";
import type {
  Aggregate,
  CentralTendency,
  MetricValue,
  Outlier,
  SampleData,
  Subset
} from "../../types/qcReport";

export type QcReportStore = {
  readonly sampleIds: readonly string[];
  readonly fileLabels: readonly string[];
  readonly centralTendency: CentralTendency;
  readonly data: SampleData;
  readonly metricKeys: readonly string[];
  getMetric: (sampleId: string, metricKey: string) => MetricValue;
  compileSubset: (subset: readonly string[], metricKey: string) => Aggregate;
  compileNamedSubset: (subset: readonly string[], name: string, metricKey: string) => Subset;
  getSubset: (name: string, metricKey: string) => Subset;
  listSubsets: () => Subset[];
  detectOutliers: (metricKey: string, threshold: number, subset?: readonly string[]) => Outlier[];
  detectSubsetOutliers: (name: string, metricKey: string, threshold: number) => Outlier[];
};

const copyMetric = (metric: MetricValue): MetricValue =>
  metric.kind === "scalar"
    ? { ...metric }
    : { ...metric, binLabels: [...metric.binLabels], values: new Map(metric.values) };

const copyBins = <T>(bins: ReadonlyMap<string, readonly T[]>): Map<string, T[]> =>
  new Map([...bins].map(([binLabel, values]): [string, T[]] => [binLabel, [...values]]));

const copyAggregate = (aggregate: Aggregate): Aggregate =>
  aggregate.kind === "scalar"
    ? { kind: "scalar", values: [...aggregate.values] }
    : { kind: "binned", bins: copyBins(aggregate.bins), binSamples: copyBins(aggregate.binSamples) };

const copySubset = (subset: Subset): Subset => ({
  ...subset,
  sampleIds: [...subset.sampleIds],
  aggregate: copyAggregate(subset.aggregate)
});

/**
 * Extracts every sample's metrics from a parsed report once, then serves
 * subset compilation and outlier scoring from that data. Named subsets are
 * cached per store, keyed by subset name and metric key; callers only ever
 * receive copies of stored metrics and subsets.
 */
export const createQcReportStore = (
  report: unknown,
  options: QcReportStoreOptions
): QcReportStore => {
  const config = resolveStoreConfig(options);
  const sampleIds = Object.freeze([...config.sampleIds]);
  const extracted = extractSampleMetrics(parseQcReport(report), sampleIds, config.fileLabels);
  const metricKeys = Object.freeze([...extracted.metricKeys]);
  const { data } = extracted;
  const subsets = new Map<string, Map<string, Subset>>();
  const source = { sampleIds, metricKeys, data };

  config.logger.info("[qc-report] extracted", {
    samples: sampleIds.length,
    metricKeys: metricKeys.length
  });
  if (config.centralTendency !== "median") {
    config.logger.warn("[qc-report] central tendency is not used, outliers are scored against the median", {
      centralTendency: config.centralTendency
    });
  }

  const getMetric = (sampleId: string, metricKey: string): MetricValue => {
    assertSubset(sampleIds, [sampleId]);
    assertMetricKey(metricKeys, metricKey);
    const metric = data.get(sampleId)?.get(metricKey);
    if (!metric) {
      throw new ValidationError(`Sample ${sampleId} has no value for ${metricKey}`);
    }
    return copyMetric(metric);
  };

  const compileNamedSubset = (
    subset: readonly string[],
    name: string,
    metricKey: string
  ): Subset => {
    const compiled: Subset = {
      name,
      metricKey,
      sampleIds: Object.freeze([...subset]),
      aggregate: compileSubset(source, subset, metricKey)
    };
    const byKey = subsets.get(name) ?? new Map<string, Subset>();
    byKey.set(metricKey, compiled);
    subsets.set(name, byKey);
    return copySubset(compiled);
  };

  const findSubset = (name: string, metricKey: string): Subset => {
    const stored = subsets.get(name)?.get(metricKey);
    if (!stored) {
      throw new ValidationError(`Subset ${name} has not been compiled for ${metricKey}`);
    }
    return stored;
  };

  const scoringOptions = (metricKey: string) => ({
    metricKey,
    binFillValue: config.binFillValue,
    logger: config.logger
  });

  return {
    sampleIds,
    fileLabels: Object.freeze(listFileLabels(config.fileLabels)),
    centralTendency: config.centralTendency,
    data,
    metricKeys,
    getMetric,
    compileSubset: (subset, metricKey) => compileSubset(source, subset, metricKey),
    compileNamedSubset,
    getSubset: (name, metricKey) => copySubset(findSubset(name, metricKey)),
    listSubsets: () =>
      [...subsets.values()].flatMap((byKey) => [...byKey.values()].map(copySubset)),
    detectOutliers: (metricKey, threshold, subset = []) => {
      const scored = subset.length > 0 ? subset : sampleIds;
      return scoreAggregate(
        compileSubset(source, scored, metricKey),
        scored,
        threshold,
        scoringOptions(metricKey)
      );
    },
    detectSubsetOutliers: (name, metricKey, threshold) => {
      const stored = findSubset(name, metricKey);
      return scoreAggregate(stored.aggregate, stored.sampleIds, threshold, scoringOptions(metricKey));
    }
  };
};

export const loadQcReportStore = (
  filePath: string,
  options: QcReportStoreOptions
): QcReportStore => createQcReportStore(loadQcReportFile(filePath), options);
