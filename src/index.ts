export { ConfigurationError, ExtractionError, QcReportError, ValidationError } from "./lib/errors";
export { DEFAULT_FILE_LABELS, labelFile, listFileLabels } from "./lib/report/fileLabels";
export { extractSampleMetrics, matchSample, type ExtractionResult } from "./lib/report/extract";
export { loadQcReportFile, parseQcReportText } from "./lib/report/loadReport";
export { parseQcReport, type QcReport } from "./lib/report/schema";
export { compileSubset, type CompileSource } from "./lib/subsets/compileSubset";
export { detectOutliers, fillMissingBinValues } from "./lib/outliers/detectOutliers";
export { scoreDeviations } from "./lib/outliers/statistics";
export { resolveStoreConfig, type QcReportStoreOptions } from "./lib/store/config";
export { createQcReportStore, loadQcReportStore, type QcReportStore } from "./lib/store/createStore";
export type * from "./types/qcReport";
