import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import { ConfigurationError, ExtractionError, ValidationError } from "../lib/errors";
import { loadQcReportFile, parseQcReportText } from "../lib/report/loadReport";
import { createQcReportStore, loadQcReportStore } from "../lib/store/createStore";
import { SAMPLE_IDS, buildReport } from "./reportBuilders";

const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/multiqc_data.json", import.meta.url));

const SAMPLES = [
  "Mmus_LVR_CTL_Rep1_A1",
  "Mmus_LVR_CTL_Rep2_A2",
  "Mmus_LVR_CTL_Rep3_A3",
  "Mmus_LVR_TRT_Rep1_B1",
  "Mmus_LVR_TRT_Rep2_B2",
  "Mmus_LVR_TRT_Rep3_B3",
  "Mmus_LVR_SHM_Rep1_C1",
  "Mmus_LVR_SHM_Rep2_C2",
  "Mmus_LVR_SHM_Rep3_C3",
  "Mmus_KDN_CTL_Rep1_D1",
  "Mmus_KDN_CTL_Rep2_D2",
  "Mmus_KDN_TRT_Rep1_E1",
  "Mmus_KDN_TRT_Rep2_E2"
];

const EXPECTED_METRIC_KEYS = [
  "forward-percent_gc",
  "forward-avg_sequence_length",
  "forward-total_sequences",
  "forward-percent_duplicates",
  "reverse-percent_gc",
  "reverse-avg_sequence_length",
  "reverse-total_sequences",
  "reverse-percent_duplicates",
  "forward-fastqc_sequence_counts_plot-Unique Reads",
  "reverse-fastqc_sequence_counts_plot-Unique Reads",
  "forward-fastqc_sequence_counts_plot-Duplicate Reads",
  "reverse-fastqc_sequence_counts_plot-Duplicate Reads",
  "forward-fastqc_per_sequence_gc_content_plot-Percentages",
  "reverse-fastqc_per_sequence_gc_content_plot-Percentages",
  "forward-fastqc_per_sequence_gc_content_plot-Counts",
  "reverse-fastqc_per_sequence_gc_content_plot-Counts",
  "forward-fastqc_per_base_n_content_plot",
  "reverse-fastqc_per_base_n_content_plot",
  "forward-fastqc_sequence_duplication_levels_plot",
  "reverse-fastqc_sequence_duplication_levels_plot"
];

const buildLogger = () => ({ info: vi.fn(), warn: vi.fn() });

const loadFixtureStore = () =>
  loadQcReportStore(FIXTURE_PATH, { sampleIds: SAMPLES, logger: buildLogger() });

const liverSamples = SAMPLES.filter((sample) => sample.includes("LVR"));

describe("QC report store from a report file", () => {
  it("discovers metric keys from the first sample", () => {
    expect(loadFixtureStore().metricKeys).toEqual(EXPECTED_METRIC_KEYS);
  });

  it("holds the same metric keys for every sample", () => {
    const store = loadFixtureStore();
    SAMPLES.forEach((sample) => {
      expect([...(store.data.get(sample)?.keys() ?? [])]).toEqual(store.metricKeys);
    });
  });

  it("exposes general stats as scalar metrics", () => {
    expect(loadFixtureStore().getMetric("Mmus_LVR_CTL_Rep1_A1", "reverse-percent_gc")).toEqual({
      kind: "scalar",
      key: "reverse-percent_gc",
      units: "percent_gc",
      value: 52
    });
  });

  it("exposes line plot values by bin label", () => {
    const metric = loadFixtureStore().getMetric(
      "Mmus_LVR_CTL_Rep1_A1",
      "forward-fastqc_per_sequence_gc_content_plot-Counts"
    );
    expect(metric.kind === "indexed" ? metric.values.get("40") : null).toBe(4071);
    expect(metric.kind === "indexed" ? metric.binUnits : null).toBe("% GC");
  });

  it("compiles a scalar metric over a subset", () => {
    expect(loadFixtureStore().compileSubset(liverSamples, "reverse-percent_gc")).toEqual({
      kind: "scalar",
      values: [52, 52, 53, 51, 52, 52, 53, 53, 53]
    });
  });

  it("compiles an indexed metric over a subset", () => {
    const aggregate = loadFixtureStore().compileSubset(
      SAMPLES,
      "forward-fastqc_per_base_n_content_plot"
    );
    if (aggregate.kind !== "binned") {
      throw new Error("expected a binned aggregate");
    }
    expect([...aggregate.bins.keys()]).toEqual(["1", "2", "3", "4"]);
    expect(aggregate.bins.get("1")).toHaveLength(9);
    expect(aggregate.bins.get("2")).toHaveLength(13);
  });

  it("finds outliers over all samples at several thresholds", () => {
    const store = loadFixtureStore();
    expect(store.detectOutliers("forward-percent_duplicates", 0.5)).toHaveLength(10);
    expect(store.detectOutliers("forward-percent_duplicates", 1).map(({ label }) => label)).toEqual([
      "Mmus_LVR_CTL_Rep1_A1",
      "Mmus_LVR_TRT_Rep2_B2",
      "Mmus_LVR_TRT_Rep3_B3",
      "Mmus_KDN_CTL_Rep2_D2",
      "Mmus_KDN_TRT_Rep1_E1"
    ]);
    expect(store.detectOutliers("forward-percent_duplicates", 99999)).toEqual([]);
  });

  it("finds fewer outliers as the threshold rises", () => {
    const store = loadFixtureStore();
    const thresholds = [0, 0.25, 0.5, 1, 1.5, 2];
    const labelSets = thresholds.map(
      (threshold) =>
        new Set(
          store
            .detectOutliers("reverse-percent_duplicates", threshold)
            .map(({ label }) => label)
        )
    );
    labelSets.slice(1).forEach((higher, index) => {
      const lower = labelSets[index];
      expect([...higher].every((label) => lower.has(label))).toBe(true);
    });
  });

  it("scores line plot bins with missing curve starts filled", () => {
    const outliers = loadFixtureStore().detectOutliers(
      "forward-fastqc_per_base_n_content_plot",
      1.5
    );
    expect(outliers.map(({ label }) => label)).toEqual([
      "Mmus_LVR_TRT_Rep2_B2:1",
      "Mmus_LVR_SHM_Rep2_C2:1",
      "Mmus_LVR_CTL_Rep1_A1:2",
      "Mmus_KDN_CTL_Rep1_D1:2",
      "Mmus_LVR_SHM_Rep3_C3:3",
      "Mmus_KDN_CTL_Rep2_D2:3",
      "Mmus_LVR_CTL_Rep1_A1:4",
      "Mmus_LVR_TRT_Rep2_B2:4",
      "Mmus_KDN_CTL_Rep2_D2:4"
    ]);
  });

  it("caches named subsets per metric key", () => {
    const store = loadFixtureStore();
    const liver = store.compileNamedSubset(liverSamples, "Liver", "reverse-percent_gc");
    expect(store.getSubset("Liver", "reverse-percent_gc")).toEqual(liver);
    expect(liver.sampleIds).toEqual(liverSamples);
    expect(() => store.getSubset("Liver", "forward-percent_gc")).toThrow(
      "Subset Liver has not been compiled for forward-percent_gc"
    );

    const recompiled = store.compileNamedSubset(
      liverSamples.slice(0, 3),
      "Liver",
      "reverse-percent_gc"
    );
    expect(store.getSubset("Liver", "reverse-percent_gc")).toEqual(recompiled);
    expect(store.listSubsets()).toEqual([recompiled]);
  });

  it("scores a cached subset", () => {
    const store = loadFixtureStore();
    store.compileNamedSubset(liverSamples, "Liver", "forward-percent_duplicates");
    expect(
      store.detectSubsetOutliers("Liver", "forward-percent_duplicates", 1).map(({ label }) => label)
    ).toEqual(["Mmus_LVR_CTL_Rep1_A1", "Mmus_LVR_TRT_Rep2_B2", "Mmus_LVR_TRT_Rep3_B3"]);
    expect(() => store.detectSubsetOutliers("Kidney", "forward-percent_duplicates", 1)).toThrow(
      ValidationError
    );
  });

  it("rejects subsets and keys it does not know", () => {
    const store = loadFixtureStore();
    expect(() => store.compileSubset(["Mmus_LVR_CTL_Rep9_Z9"], "reverse-percent_gc")).toThrow(
      ValidationError
    );
    expect(() => store.compileSubset(liverSamples, "reverse-percent_fails")).toThrow(
      ValidationError
    );
  });

  it("rejects a file label mapping that matches no file", () => {
    expect(() =>
      loadQcReportStore(FIXTURE_PATH, {
        sampleIds: SAMPLES,
        fileLabels: { UNREAL: "File_X" },
        logger: buildLogger()
      })
    ).toThrow(ConfigurationError);
  });
});

describe("QC report store options", () => {
  it("defaults to forward and reverse labels scored by the median", () => {
    const store = createQcReportStore(buildReport(), {
      sampleIds: SAMPLE_IDS,
      logger: buildLogger()
    });
    expect(store.fileLabels).toEqual(["forward", "reverse"]);
    expect(store.centralTendency).toBe("median");
  });

  it("logs a summary once extraction finishes", () => {
    const logger = buildLogger();
    createQcReportStore(buildReport(), { sampleIds: SAMPLE_IDS, logger });
    expect(logger.info).toHaveBeenCalledWith("[qc-report] extracted", {
      samples: 3,
      metricKeys: 16
    });
  });

  it("scores against the median whichever central tendency is configured", () => {
    const byMedian = createQcReportStore(buildReport(), {
      sampleIds: SAMPLE_IDS,
      logger: buildLogger()
    });
    const byMean = createQcReportStore(buildReport(), {
      sampleIds: SAMPLE_IDS,
      centralTendency: "mean",
      logger: buildLogger()
    });
    // forward GC is 50, 48 and 55: ctl_01 sits on the median but not on the mean of 51
    const outliers = byMedian.detectOutliers("forward-percent_gc", 0.2);
    expect(outliers.map(({ label }) => label)).toEqual(["ctl_02", "trt_01"]);
    expect(byMean.detectOutliers("forward-percent_gc", 0.2)).toEqual(outliers);
    expect(byMean.centralTendency).toBe("mean");
  });

  it("warns that a mean central tendency is not used", () => {
    const logger = buildLogger();
    createQcReportStore(buildReport(), {
      sampleIds: SAMPLE_IDS,
      centralTendency: "mean",
      logger
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "[qc-report] central tendency is not used, outliers are scored against the median",
      { centralTendency: "mean" }
    );
  });

  it("scores every sample when the subset is empty", () => {
    const store = createQcReportStore(buildReport(), {
      sampleIds: SAMPLE_IDS,
      logger: buildLogger()
    });
    expect(store.detectOutliers("forward-percent_gc", 0.2, [])).toEqual(
      store.detectOutliers("forward-percent_gc", 0.2)
    );
    expect(
      store.detectOutliers("forward-percent_gc", 0.2, []).map(({ label }) => label)
    ).toEqual(["ctl_02", "trt_01"]);
  });

  it("fills missing bins with the configured value", () => {
    const store = createQcReportStore(buildReport(), {
      sampleIds: SAMPLE_IDS,
      binFillValue: 0.3,
      logger: buildLogger()
    });
    // bin 1 becomes [0.2, 0.4, 0.3] and trt_01 sits on its median
    const outliers = store.detectOutliers("forward-fastqc_per_base_n_content_plot", 0.9);
    expect(outliers.map(({ label }) => label)).toEqual([
      "ctl_01:1",
      "ctl_02:1",
      "ctl_01:2",
      "trt_01:2"
    ]);
  });

  it("rejects an empty sample list", () => {
    expect(() => createQcReportStore(buildReport(), { sampleIds: [] })).toThrow(ConfigurationError);
  });

  it("rejects duplicate sample ids", () => {
    expect(() =>
      createQcReportStore(buildReport(), { sampleIds: ["ctl_01", "ctl_01"] })
    ).toThrow("Sample ids must be unique");
  });

  it("rejects a non-finite fill value", () => {
    expect(() =>
      createQcReportStore(buildReport(), {
        sampleIds: SAMPLE_IDS,
        binFillValue: Number.POSITIVE_INFINITY
      })
    ).toThrow(ConfigurationError);
  });
});

describe("QC report store isolation", () => {
  const buildStore = () =>
    createQcReportStore(buildReport(), { sampleIds: SAMPLE_IDS, logger: buildLogger() });

  it("freezes its sample ids and metric keys", () => {
    const store = buildStore();
    expect(Object.isFrozen(store.sampleIds)).toBe(true);
    expect(Object.isFrozen(store.metricKeys)).toBe(true);
    expect(Object.isFrozen(store.fileLabels)).toBe(true);
  });

  it("hands out copies of stored metrics", () => {
    const store = buildStore();
    const stored = store.data.get("ctl_01")?.get("forward-fastqc_per_base_n_content_plot");
    const metric = store.getMetric("ctl_01", "forward-fastqc_per_base_n_content_plot");
    expect(metric).toEqual(stored);
    expect(metric).not.toBe(stored);
    if (metric.kind !== "indexed" || stored?.kind !== "indexed") {
      throw new Error("expected indexed metrics");
    }
    expect(metric.values).not.toBe(stored.values);
    expect(metric.binLabels).not.toBe(stored.binLabels);
  });

  it("hands out copies of named subsets", () => {
    const store = buildStore();
    const compiled = store.compileNamedSubset(
      ["ctl_01", "trt_01"],
      "Mixed",
      "forward-fastqc_per_base_n_content_plot"
    );
    const first = store.getSubset("Mixed", "forward-fastqc_per_base_n_content_plot");
    const second = store.getSubset("Mixed", "forward-fastqc_per_base_n_content_plot");
    expect(first).toEqual(compiled);
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(second.sampleIds).not.toBe(first.sampleIds);
    expect(second.aggregate).not.toBe(first.aggregate);
    expect(store.listSubsets()[0]).not.toBe(first);
  });
});

describe("report loading", () => {
  it("reads and validates the report file", () => {
    const report = loadQcReportFile(FIXTURE_PATH);
    expect(report.report_general_stats_data).toHaveLength(1);
    expect(Object.keys(report.report_plot_data)).toHaveLength(4);
  });

  it("rejects a missing file", () => {
    const missingPath = fileURLToPath(new URL("./fixtures/absent.json", import.meta.url));
    expect(() => loadQcReportFile(missingPath)).toThrow(ExtractionError);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseQcReportText("{")).toThrow(/QC report is not valid JSON/);
  });

  it("rejects a report without plot data", () => {
    expect(() => parseQcReportText(JSON.stringify({ report_general_stats_data: [] }))).toThrow(
      /report_plot_data/
    );
  });
});
