import { ConfigurationError } from "../errors";
import type { FileLabelMapping } from "../../types/qcReport";

export const DEFAULT_FILE_LABELS: FileLabelMapping = {
  _R1_: "forward",
  _R2: "reverse"
};

const describeMapping = (fileLabels: FileLabelMapping): string => JSON.stringify(fileLabels);

/**
 * Returns the label of the one configured substring found in `fileName`.
 * Throws when no substring or more than one substring matches.
 */
export const labelFile = (fileName: string, fileLabels: FileLabelMapping): string => {
  const matches = Object.entries(fileLabels).filter(([substring]) =>
    fileName.includes(substring)
  );

  if (matches.length === 0) {
    throw new ConfigurationError(
      `File name ${fileName} did not match any substring in the file label mapping ${describeMapping(fileLabels)}`
    );
  }
  if (matches.length > 1) {
    throw new ConfigurationError(
      `File name ${fileName} matched multiple substrings in the file label mapping ${describeMapping(fileLabels)}`
    );
  }
  return matches[0][1];
};

export const listFileLabels = (fileLabels: FileLabelMapping): string[] =>
  Object.values(fileLabels);
