/**
 * Run Configuration Module
 *
 * Resolves CLI options for an analysis run. A CLI argument takes priority
 * over its environment variable; defaults apply when neither is set.
 *
 *   --incidents     ITSM_INCIDENTS_FILE     incident export (.csv / .json), required
 *   --mapping       ITSM_CATEGORY_MAPPING   category mapping JSON
 *   --sla           ITSM_SLA_FILE           SLA table JSON (replaces the defaults)
 *   --top           ITSM_TOP_N              categories to rank (default 5)
 *   --trend-field   ITSM_TREND_FIELD        open_time | detection_time
 *   --out           ITSM_REPORT_FILE        report path (stdout when unset)
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { TrendField } from "./types.js";

export interface AnalysisConfig {
  incidentsPath: string;
  mappingPath?: string;
  slaPath?: string;
  topN: number;
  trendField: TrendField;
  outPath?: string;
}

const AnalysisConfigSchema = z.object({
  incidentsPath: z.string({ required_error: "--incidents is required" }).min(1),
  mappingPath: z.string().min(1).optional(),
  slaPath: z.string().min(1).optional(),
  topN: z.coerce.number().int().positive().default(5),
  trendField: z.enum(["open_time", "detection_time"]).default("open_time"),
  outPath: z.string().min(1).optional(),
});

/**
 * Collect `--name value` pairs. A flag without a value is an error.
 */
export function parseCliArgs(argv: readonly string[]): Map<string, string> {
  const args = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      throw new ConfigError(`Unexpected argument "${arg}"`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`Missing value for ${arg}`);
    }
    args.set(arg.slice(2), value);
    i++;
  }
  return args;
}

export function parseAnalysisConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): AnalysisConfig {
  const args = parseCliArgs(argv);
  const pick = (flag: string, envVar: string): string | undefined => {
    const value = args.get(flag) ?? env[envVar];
    return value === "" ? undefined : value;
  };

  const result = AnalysisConfigSchema.safeParse({
    incidentsPath: pick("incidents", "ITSM_INCIDENTS_FILE"),
    mappingPath: pick("mapping", "ITSM_CATEGORY_MAPPING"),
    slaPath: pick("sla", "ITSM_SLA_FILE"),
    topN: pick("top", "ITSM_TOP_N"),
    trendField: pick("trend-field", "ITSM_TREND_FIELD"),
    outPath: pick("out", "ITSM_REPORT_FILE"),
  });

  if (!result.success) {
    const messages = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid options: ${messages.join("; ")}`);
  }
  return result.data;
}
