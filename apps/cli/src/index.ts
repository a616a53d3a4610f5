/**
 * tubecompare command line: compares a test time series against a tube of
 * user-specified tolerances around a reference time series.
 *
 * Run:
 *   npm run compare -- --reference trended.csv --test simulated.csv \
 *     --atolx 0.002 --atoly 0.002 --output results/
 */

import yargs from "yargs";
import { ConfigurationError, toTubeError } from "@tubecompare/tube-core";
import { compareAndReport, readCsvFile } from "@tubecompare/tube-io";
import { loadConfig, parseConfig } from "./config/configManager";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_OUTLIERS = 2;

async function parseArgs(argv: string[]) {
  return yargs(argv)
    .scriptName("tubecompare")
    .usage("Usage: $0 --reference <csv> --test <csv> [options]\n\nCompares time series within user-specified tolerances.")
    .option("test", { type: "string", demandOption: true, desc: "CSV file to be tested" })
    .option("reference", { type: "string", demandOption: true, desc: "CSV file with reference data" })
    .option("output", { type: "string", desc: "Directory to save outputs" })
    .option("atolx", { type: "number", desc: "Absolute tolerance in x direction" })
    .option("atoly", { type: "number", desc: "Absolute tolerance in y direction" })
    .option("rtolx", { type: "number", desc: "Relative tolerance in x direction" })
    .option("rtoly", { type: "number", desc: "Relative tolerance in y direction" })
    .option("config", { type: "string", desc: "YAML configuration file" })
    .option("skipLines", { type: "number", desc: "Header lines to skip in CSV inputs" })
    .option("decimals", { type: "number", desc: "Decimals written to output CSV files" })
    .option("failOnOutliers", { type: "boolean", default: false, desc: "Exit with 2 when samples leave the tube" })
    .option("verbose", { type: "boolean", default: false })
    .epilog("At least one tolerance must be specified for x and y.")
    .strict()
    .fail((msg, err) => {
      throw err ?? new ConfigurationError(msg);
    })
    .help()
    .parse();
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const args = await parseArgs(argv);
    const config = loadConfig(args.config);

    // flags over file values, validated together before any file is touched
    const settings = parseConfig(
      {
        tolerances: {
          atolx: args.atolx ?? config.tolerances.atolx,
          atoly: args.atoly ?? config.tolerances.atoly,
          rtolx: args.rtolx ?? config.tolerances.rtolx,
          rtoly: args.rtoly ?? config.tolerances.rtoly,
        },
        csv: { skipLines: args.skipLines ?? config.csv.skipLines },
        output: {
          directory: args.output ?? config.output.directory,
          decimals: args.decimals ?? config.output.decimals,
        },
      },
      "command line"
    );
    const { tolerances } = settings;
    const { skipLines } = settings.csv;
    const outputDirectory = settings.output.directory;

    const reference = readCsvFile(args.reference, { skipLines });
    const test = readCsvFile(args.test, { skipLines });
    if (args.verbose) {
      console.log(`[compare] reference: ${reference.x.length} points, test: ${test.x.length} points`);
    }

    const outcome = compareAndReport({
      reference,
      test,
      tolerances,
      outputDirectory,
      decimals: settings.output.decimals,
    });
    if (!outcome.ok) {
      console.error(`[compare] ${outcome.error.name}: ${outcome.error.message}`);
      return EXIT_FAILURE;
    }

    const { result, summary } = outcome;
    if (args.verbose) {
      const { tube, diagnostics: d } = result;
      console.log(`[compare] tube half-width ${tube.halfWidth}, half-height ${tube.halfHeight}`);
      console.log(`[compare] lower: ${d.rawLowerCount} -> ${result.lower.x.length} points (${d.lowerLoops} loops removed)`);
      console.log(`[compare] upper: ${d.rawUpperCount} -> ${result.upper.x.length} points (${d.upperLoops} loops removed)`);
      console.log(`[compare] wrote ${outcome.files.join(", ")}`);
    }
    if (result.diagnostics.truncated) {
      console.warn(
        `[compare] test curve extends beyond the tube; compared ${summary.comparedCount} of ${test.x.length} samples`
      );
    }

    if (summary.passed) {
      console.log(`[compare] PASS: all ${summary.comparedCount} samples within tolerance`);
      return EXIT_OK;
    }
    console.log(
      `[compare] FAIL: ${summary.outlierCount} of ${summary.comparedCount} samples outside the tube, ` +
      `max error ${summary.maxError.toExponential(3)} at x = ${summary.xAtMaxError}`
    );
    return args.failOnOutliers ? EXIT_OUTLIERS : EXIT_OK;
  } catch (err) {
    const error = toTubeError(err);
    console.error(`[compare] ${error.name}: ${error.message}`);
    return EXIT_FAILURE;
  }
}
