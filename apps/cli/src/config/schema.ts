import { z } from "zod";

export const TolerancesSchema = z.object({
  atolx: z.number().nonnegative().default(0),
  atoly: z.number().nonnegative().default(0),
  rtolx: z.number().nonnegative().default(0),
  rtoly: z.number().nonnegative().default(0),
});

export const CsvSchema = z.object({
  skipLines: z.number().int().nonnegative().default(1),
});

export const OutputSchema = z.object({
  directory: z.string().min(1).default("results"),
  // digits after the decimal point in written CSV files
  decimals: z.number().int().min(0).max(17).default(6),
});

export const AppConfigSchema = z.object({
  tolerances: TolerancesSchema.default({}),
  csv: CsvSchema.default({}),
  output: OutputSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
