import { ValidationError } from "../errors";
import { scoreDeviations } from "./statistics";
import type {
  Aggregate,
  BinnedAggregate,
  Outlier,
  ReportLogger,
  ScalarAggregate
} from "../../types/qcReport";

export type DetectOutliersOptions = {
  metricKey: string;
  binFillValue: number;
  logger: ReportLogger;
};

/**
 * Lines that do not start at the origin have no entry for early bins, so
 * samples missing from a bin take the fill value at their own position.
 */
export const fillMissingBinValues = (
  subset: readonly string[],
  binValues: readonly number[],
  binSampleIds: readonly string[],
  fillValue: number
): number[] => {
  const valueBySample = new Map(
    binSampleIds.map((sampleId, index): [string, number] => [sampleId, binValues[index]])
  );
  return subset.map((sampleId) => valueBySample.get(sampleId) ?? fillValue);
};

const detectScalarOutliers = (
  aggregate: ScalarAggregate,
  subset: readonly string[],
  threshold: number,
  options: DetectOutliersOptions
): Outlier[] => {
  const { standardDeviation, outliers } = scoreDeviations(aggregate.values, threshold);
  if (standardDeviation === 0) {
    options.logger.info("[qc-outliers] standard deviation is zero, no outliers", {
      metricKey: options.metricKey
    });
  }
  return outliers.map(({ index, score }) => ({ label: subset[index], score }));
};

const detectBinnedOutliers = (
  aggregate: BinnedAggregate,
  subset: readonly string[],
  threshold: number,
  options: DetectOutliersOptions
): Outlier[] => {
  const result: Outlier[] = [];
  aggregate.bins.forEach((binValues, binLabel) => {
    const values = fillMissingBinValues(
      subset,
      binValues,
      aggregate.binSamples.get(binLabel) ?? [],
      options.binFillValue
    );
    const { standardDeviation, outliers } = scoreDeviations(values, threshold);
    if (standardDeviation === 0) {
      options.logger.info("[qc-outliers] standard deviation is zero, bin skipped", {
        metricKey: options.metricKey,
        bin: binLabel
      });
      return;
    }
    outliers.forEach(({ index, score }) => {
      result.push({ label: `${subset[index]}:${binLabel}`, score });
    });
  });
  return result;
};

export const detectOutliers = (
  aggregate: Aggregate,
  subset: readonly string[],
  threshold: number,
  options: DetectOutliersOptions
): Outlier[] => {
  if (Number.isNaN(threshold)) {
    throw new ValidationError("Deviation threshold must be a number");
  }

  const outliers =
    aggregate.kind === "scalar"
      ? detectScalarOutliers(aggregate, subset, threshold, options)
      : detectBinnedOutliers(aggregate, subset, threshold, options);

  options.logger.info(
    outliers.length > 0 ? "[qc-outliers] outliers detected" : "[qc-outliers] no outliers detected",
    { metricKey: options.metricKey, threshold, count: outliers.length }
  );
  return outliers;
};
