import { z } from "zod";
import { ConfigurationError } from "../errors";
import { DEFAULT_FILE_LABELS } from "../report/fileLabels";
import type { CentralTendency, FileLabelMapping, ReportLogger } from "../../types/qcReport";

export type QcReportStoreOptions = {
  sampleIds: readonly string[];
  fileLabels?: FileLabelMapping;
  centralTendency?: CentralTendency;
  binFillValue?: number;
  logger?: ReportLogger;
};

export type QcReportStoreConfig = {
  sampleIds: string[];
  fileLabels: FileLabelMapping;
  centralTendency: CentralTendency;
  binFillValue: number;
  logger: ReportLogger;
};

const optionsSchema = z
  .object({
    sampleIds: z
      .array(z.string().min(1))
      .min(1)
      .refine((sampleIds) => new Set(sampleIds).size === sampleIds.length, {
        message: "Sample ids must be unique"
      }),
    fileLabels: z
      .record(z.string().min(1))
      .refine((mapping) => Object.keys(mapping).length > 0, {
        message: "At least one file substring is required"
      })
      .refine((mapping) => Object.keys(mapping).every((substring) => substring.length > 0), {
        message: "File substrings must not be empty"
      })
      .optional()
      .default(DEFAULT_FILE_LABELS),
    centralTendency: z.enum(["median", "mean"]).optional().default("median"),
    binFillValue: z.number().finite().optional().default(0)
  })
  .strict();

export const resolveStoreConfig = (options: QcReportStoreOptions): QcReportStoreConfig => {
  const { logger, ...rest } = options;
  const parsed = optionsSchema.safeParse(rest);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid QC report store options: ${issues}`);
  }
  return { ...parsed.data, logger: logger ?? console };
};
