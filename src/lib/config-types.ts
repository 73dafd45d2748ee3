/**
 * Config schema for `~/.dtcalc.yml`.
 *
 * Zod provides runtime validation; the TypeScript type is derived via
 * z.infer<> so the loader and the shell agree on one shape.
 *
 * Example YAML:
 *   historyFile: ~/.dtcalc_history
 *   historySize: 500
 *   color: false
 */

import { z } from "zod";

export const DtcalcConfigSchema = z
  .object({
    historyFile: z
      .string()
      .min(1)
      .default("~/.dtcalc_history")
      .describe("Where the interactive prompt keeps its history ('~/' expands to the home directory)"),
    historySize: z
      .number()
      .int()
      .min(0)
      .max(100_000)
      .default(1000)
      .describe("Maximum number of history lines kept"),
    color: z
      .boolean()
      .default(true)
      .describe("Use ANSI colors in the interactive prompt"),
  })
  .strict();

export type DtcalcConfig = z.infer<typeof DtcalcConfigSchema>;
