export class QcReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad store options or a file-label mapping that does not fit the report's file names. */
export class ConfigurationError extends QcReportError {}

/** Caller input that does not fit the loaded data: unknown samples, keys or subsets. */
export class ValidationError extends QcReportError {}

/** Report structure the extractor cannot read. */
export class ExtractionError extends QcReportError {}
