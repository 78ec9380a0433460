import fs from "node:fs";
import { ExtractionError } from "../errors";
import { parseQcReport, type QcReport } from "./schema";

const readReportText = (filePath: string): string => {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`Unable to read QC report ${filePath}: ${reason}`);
  }
};

export const parseQcReportText = (text: string, source = "QC report"): QcReport => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(`${source} is not valid JSON: ${reason}`);
  }
  return parseQcReport(raw);
};

export const loadQcReportFile = (filePath: string): QcReport =>
  parseQcReportText(readReportText(filePath), filePath);
