import fs from "fs";
import path from "path";
import type { DataSet } from "@tubecompare/core-types";
import { ConfigurationError } from "@tubecompare/tube-core";
import { formatCsv } from "./csv";

export interface ReportArtifacts {
  reference: DataSet;
  lower: DataSet;
  upper: DataSet;
  test: DataSet;
  errors: DataSet;
}

export const ARTIFACT_FILES: Record<keyof ReportArtifacts, string> = {
  reference: "reference.csv",
  lower: "lowerBound.csv",
  upper: "upperBound.csv",
  test: "test.csv",
  errors: "errors.csv",
};

export const MAX_DECIMALS = 17;

const ARTIFACT_ORDER: ReadonlyArray<keyof ReportArtifacts> = ["reference", "lower", "upper", "test", "errors"];

/**
 * Writes the five artifacts and returns their paths, in the order above.
 * Every file is formatted before the directory is created.
 */
export function writeReport(outputDirectory: string, artifacts: ReportArtifacts, decimals = 6): string[] {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new ConfigurationError(`decimals must be an integer between 0 and ${MAX_DECIMALS}, got ${decimals}`);
  }

  const contents = ARTIFACT_ORDER.map((key) => ({
    file: path.join(outputDirectory, ARTIFACT_FILES[key]),
    text: formatCsv(artifacts[key], decimals),
  }));

  fs.mkdirSync(outputDirectory, { recursive: true });
  for (const { file, text } of contents) {
    fs.writeFileSync(file, text, "utf-8");
  }
  return contents.map(({ file }) => file);
}
