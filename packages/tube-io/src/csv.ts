import fs from "fs";
import path from "path";
import type { DataSet } from "@tubecompare/core-types";
import { ConfigurationError } from "@tubecompare/tube-core";

export interface CsvOptions {
  skipLines?: number;
}

const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function toNumber(field: string): number | null {
  const s = field.trim();
  return NUMBER.test(s) ? Number(s) : null;
}

/**
 * Two-column text, comma or semicolon separated. Header lines are skipped,
 * blank lines ignored; reading stops at the first line that is not a numeric pair.
 */
export function parseCsv(text: string, { skipLines = 1 }: CsvOptions = {}): DataSet {
  if (!Number.isInteger(skipLines) || skipLines < 0) {
    throw new ConfigurationError(`skipLines must be a non-negative integer, got ${skipLines}`);
  }
  const lines = text.split(/\r?\n/).slice(skipLines);
  const x: number[] = [];
  const y: number[] = [];

  for (const line of lines) {
    if (line.trim() === "") continue;
    const fields = line.split(/[,;]+/);
    if (fields.length < 2) break;
    const a = toNumber(fields[0]);
    const b = toNumber(fields[1]);
    if (a === null || b === null) break;
    x.push(a);
    y.push(b);
  }

  return { x, y };
}

export function readCsvFile(file: string, options: CsvOptions = {}): DataSet {
  const fullPath = path.resolve(file);
  if (!fs.existsSync(fullPath)) {
    throw new ConfigurationError(`CSV file not found: ${file}`);
  }
  return parseCsv(fs.readFileSync(fullPath, "utf-8"), options);
}

export function formatCsv(data: DataSet, decimals = 6): string {
  const rows = data.x.map((x, i) => `${x.toFixed(decimals)},${data.y[i].toFixed(decimals)}`);
  return ["x,y", ...rows].join("\n") + "\n";
}
