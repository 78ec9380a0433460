import { z } from "zod";
import { ExtractionError } from "../errors";

const generalStatsSchema = z.array(z.record(z.record(z.number())));

const plotDescriptorSchema = z
  .object({
    plot_type: z.string()
  })
  .passthrough();

export const qcReportSchema = z
  .object({
    report_general_stats_data: generalStatsSchema,
    report_plot_data: z.record(plotDescriptorSchema)
  })
  .passthrough();

export const barGraphSchema = z
  .object({
    plot_type: z.literal("bar_graph"),
    samples: z.array(z.array(z.string())),
    datasets: z.array(
      z.array(
        z
          .object({
            name: z.string(),
            data: z.array(z.number())
          })
          .passthrough()
      )
    ),
    config: z.object({ ylab: z.string() }).passthrough()
  })
  .passthrough();

const xyPointSchema = z.union([z.number(), z.tuple([z.number(), z.number()])]);

export const xyLineSchema = z
  .object({
    plot_type: z.literal("xy_line"),
    datasets: z
      .array(
        z.array(
          z
            .object({
              name: z.string(),
              data: z.array(xyPointSchema)
            })
            .passthrough()
        )
      )
      .min(1),
    config: z
      .object({
        xlab: z.string(),
        ylab: z.string(),
        categories: z.array(z.union([z.string(), z.number()])).optional(),
        data_labels: z
          .array(z.object({ name: z.string().optional() }).passthrough())
          .optional()
      })
      .passthrough()
  })
  .passthrough();

export type QcReport = z.infer<typeof qcReportSchema>;
export type PlotDescriptor = z.infer<typeof plotDescriptorSchema>;
export type BarGraphDescriptor = z.infer<typeof barGraphSchema>;
export type XyLineDescriptor = z.infer<typeof xyLineSchema>;
export type XyPoint = z.infer<typeof xyPointSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

export const parseWithSchema = <T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  context: string
): z.infer<T> => {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ExtractionError(`${context} has an unexpected shape: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const parseQcReport = (raw: unknown): QcReport =>
  parseWithSchema(qcReportSchema, raw, "QC report");
