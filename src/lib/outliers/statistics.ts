import { median, sampleStandardDeviation } from "simple-statistics";
import { ValidationError } from "../errors";

export type DeviationScore = {
  index: number;
  score: number;
};

export type ScoredSlice = {
  centre: number;
  standardDeviation: number;
  outliers: DeviationScore[];
};

/**
 * Scores each value as |value - median| / sample standard deviation and keeps
 * those strictly above the threshold. A zero deviation yields no outliers.
 */
export const scoreDeviations = (values: readonly number[], threshold: number): ScoredSlice => {
  if (values.length < 2) {
    throw new ValidationError(
      `At least two values are needed to score deviations, got ${values.length}`
    );
  }
  const sample = [...values];
  const standardDeviation = sampleStandardDeviation(sample);
  const centre = median(sample);
  if (standardDeviation === 0) {
    return { centre, standardDeviation, outliers: [] };
  }

  const outliers = sample
    .map((value, index) => ({ index, score: Math.abs(value - centre) / standardDeviation }))
    .filter(({ score }) => score > threshold);
  return { centre, standardDeviation, outliers };
};
