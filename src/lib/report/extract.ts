import { ExtractionError } from "../errors";
import { labelFile } from "./fileLabels";
import {
  barGraphSchema,
  parseWithSchema,
  xyLineSchema,
  type BarGraphDescriptor,
  type PlotDescriptor,
  type QcReport,
  type XyLineDescriptor,
  type XyPoint
} from "./schema";
import type {
  FileLabelMapping,
  IndexedMetric,
  MetricValue,
  SampleData
} from "../../types/qcReport";

type MetricsBySample = Map<string, Map<string, MetricValue>>;

type FileRef = {
  sampleId: string;
  fileLabel: string;
};

export type ExtractionResult = {
  data: SampleData;
  metricKeys: readonly string[];
};

/**
 * Finds the one configured sample id contained in a report file name.
 * Report entries are per file, so forward and reverse reads of a sample
 * both resolve to the same id.
 */
export const matchSample = (fileName: string, sampleIds: readonly string[]): string => {
  const matching = sampleIds.filter((sampleId) => fileName.includes(sampleId));
  if (matching.length === 0) {
    throw new ExtractionError(`File ${fileName} does not contain any configured sample id`);
  }
  if (matching.length > 1) {
    throw new ExtractionError(
      `File ${fileName} matches multiple sample ids: ${matching.join(", ")}`
    );
  }
  return matching[0];
};

const resolveFile = (
  fileName: string,
  sampleIds: readonly string[],
  fileLabels: FileLabelMapping
): FileRef => ({
  sampleId: matchSample(fileName, sampleIds),
  fileLabel: labelFile(fileName, fileLabels)
});

const setMetric = (metrics: MetricsBySample, sampleId: string, metric: MetricValue) => {
  const sampleMetrics = metrics.get(sampleId);
  if (!sampleMetrics) {
    throw new ExtractionError(`Sample ${sampleId} is not configured`);
  }
  sampleMetrics.set(metric.key, metric);
};

const extractGeneralStats = (
  report: QcReport,
  metrics: MetricsBySample,
  sampleIds: readonly string[],
  fileLabels: FileLabelMapping
) => {
  report.report_general_stats_data.forEach((fileStats) => {
    Object.entries(fileStats).forEach(([fileName, fields]) => {
      const { sampleId, fileLabel } = resolveFile(fileName, sampleIds, fileLabels);
      Object.entries(fields).forEach(([field, value]) => {
        setMetric(metrics, sampleId, {
          kind: "scalar",
          key: `${fileLabel}-${field}`,
          units: field,
          value
        });
      });
    });
  });
};

const extractBarGraph = (
  plotName: string,
  plot: BarGraphDescriptor,
  metrics: MetricsBySample,
  sampleIds: readonly string[],
  fileLabels: FileLabelMapping
) => {
  if (plot.samples.length !== 1) {
    throw new ExtractionError(
      `Bar graph ${plotName} has ${plot.samples.length} sample groups, expected exactly one`
    );
  }
  if (plot.datasets.length !== 1) {
    throw new ExtractionError(
      `Bar graph ${plotName} has ${plot.datasets.length} dataset groups, expected exactly one`
    );
  }

  const files = plot.samples[0].map((fileName) => resolveFile(fileName, sampleIds, fileLabels));
  const units = plot.config.ylab;

  plot.datasets[0].forEach((bar) => {
    if (bar.data.length !== files.length) {
      throw new ExtractionError(
        `Bar graph ${plotName} entry ${bar.name} has ${bar.data.length} values for ${files.length} files`
      );
    }
    bar.data.forEach((value, index) => {
      const { sampleId, fileLabel } = files[index];
      setMetric(metrics, sampleId, {
        kind: "scalar",
        key: `${fileLabel}-${plotName}-${bar.name}`,
        units,
        value
      });
    });
  });
};

const pairCategoricalValues = (
  plotName: string,
  fileName: string,
  categories: readonly string[],
  points: XyPoint[]
): Array<[string, number]> => {
  if (points.length !== categories.length) {
    throw new ExtractionError(
      `Plot ${plotName} curve ${fileName} has ${points.length} values for ${categories.length} categories`
    );
  }
  return points.map((point, index): [string, number] => {
    if (typeof point !== "number") {
      throw new ExtractionError(
        `Plot ${plotName} curve ${fileName} is categorical but holds [x, y] pairs`
      );
    }
    return [categories[index], point];
  });
};

const pairIndexedValues = (
  plotName: string,
  fileName: string,
  points: XyPoint[]
): Array<[string, number]> =>
  points.map((point): [string, number] => {
    if (typeof point === "number") {
      throw new ExtractionError(
        `Plot ${plotName} curve ${fileName} has no categories but holds bare values`
      );
    }
    return [String(point[0]), point[1]];
  });

const resolveDataLabelSuffix = (
  plotName: string,
  plot: XyLineDescriptor,
  groupIndex: number
): string => {
  if (plot.datasets.length === 1) {
    return "";
  }
  const dataLabel = plot.config.data_labels?.[groupIndex]?.name;
  if (dataLabel === undefined) {
    throw new ExtractionError(
      `Plot ${plotName} has ${plot.datasets.length} dataset groups but no data label for group ${groupIndex}`
    );
  }
  return `-${dataLabel}`;
};

const extractXyLine = (
  plotName: string,
  plot: XyLineDescriptor,
  metrics: MetricsBySample,
  sampleIds: readonly string[],
  fileLabels: FileLabelMapping
) => {
  const categories = plot.config.categories?.map((category) => String(category));

  plot.datasets.forEach((group, groupIndex) => {
    const suffix = resolveDataLabelSuffix(plotName, plot, groupIndex);

    group.forEach((curve) => {
      const { sampleId, fileLabel } = resolveFile(curve.name, sampleIds, fileLabels);
      const pairs = categories
        ? pairCategoricalValues(plotName, curve.name, categories, curve.data)
        : pairIndexedValues(plotName, curve.name, curve.data);

      const metric: IndexedMetric = {
        kind: "indexed",
        key: `${fileLabel}-${plotName}${suffix}`,
        units: plot.config.ylab,
        binLabels: pairs.map(([binLabel]) => binLabel),
        binUnits: plot.config.xlab,
        values: new Map(pairs)
      };
      setMetric(metrics, sampleId, metric);
    });
  });
};

const extractPlot = (
  plotName: string,
  plot: PlotDescriptor,
  metrics: MetricsBySample,
  sampleIds: readonly string[],
  fileLabels: FileLabelMapping
) => {
  switch (plot.plot_type) {
    case "bar_graph":
      extractBarGraph(
        plotName,
        parseWithSchema(barGraphSchema, plot, `Bar graph ${plotName}`),
        metrics,
        sampleIds,
        fileLabels
      );
      return;
    case "xy_line":
      extractXyLine(
        plotName,
        parseWithSchema(xyLineSchema, plot, `Line graph ${plotName}`),
        metrics,
        sampleIds,
        fileLabels
      );
      return;
    default:
      throw new ExtractionError(
        `Unknown plot type ${plot.plot_type} for ${plotName}. Parsing is only implemented for bar_graph and xy_line plots`
      );
  }
};

const assertUniformKeys = (
  metrics: MetricsBySample,
  metricKeys: readonly string[],
  referenceSampleId: string
) => {
  const expected = new Set(metricKeys);
  metrics.forEach((sampleMetrics, sampleId) => {
    const missing = metricKeys.filter((key) => !sampleMetrics.has(key));
    const extra = [...sampleMetrics.keys()].filter((key) => !expected.has(key));
    if (missing.length > 0 || extra.length > 0) {
      const details = [
        missing.length > 0 ? `missing ${missing.join(", ")}` : null,
        extra.length > 0 ? `unexpected ${extra.join(", ")}` : null
      ]
        .filter((detail): detail is string => Boolean(detail))
        .join("; ");
      throw new ExtractionError(
        `Sample ${sampleId} does not share the metric keys of ${referenceSampleId}: ${details}`
      );
    }
  });
};

export const extractSampleMetrics = (
  report: QcReport,
  sampleIds: readonly string[],
  fileLabels: FileLabelMapping
): ExtractionResult => {
  if (sampleIds.length === 0) {
    throw new ExtractionError("At least one sample id is required for extraction");
  }

  const metrics: MetricsBySample = new Map(
    sampleIds.map((sampleId): [string, Map<string, MetricValue>] => [
      sampleId,
      new Map<string, MetricValue>()
    ])
  );

  extractGeneralStats(report, metrics, sampleIds, fileLabels);
  Object.entries(report.report_plot_data).forEach(([plotName, plot]) => {
    extractPlot(plotName, plot, metrics, sampleIds, fileLabels);
  });

  const firstSampleMetrics = metrics.get(sampleIds[0]);
  const metricKeys = firstSampleMetrics ? [...firstSampleMetrics.keys()] : [];
  if (metricKeys.length === 0) {
    throw new ExtractionError(`No metrics were extracted for sample ${sampleIds[0]}`);
  }
  assertUniformKeys(metrics, metricKeys, sampleIds[0]);

  return { data: metrics, metricKeys };
};
