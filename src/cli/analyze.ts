#!/usr/bin/env tsx
/**
 * CLI: analyze
 *
 * Usage: npm run analyze -- --incidents <file.csv|file.json> [--mapping <file.json>]
 *          [--sla <file.json>] [--top <n>] [--trend-field open_time|detection_time] [--out <report.json>]
 *
 * With --out, writes the JSON report there and prints a summary; without it
 * the report goes to stdout.
 */

import { AnalysisError } from "../shared/errors.js";
import { parseAnalysisConfig } from "../shared/run_config.js";
import { runAnalysis, serializeReport, summaryLines, writeReport } from "./run.js";

function main() {
  try {
    const config = parseAnalysisConfig(process.argv.slice(2));
    const startTime = Date.now();
    const report = runAnalysis(config);
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

    if (!config.outPath) {
      process.stdout.write(serializeReport(report) + "\n");
      return;
    }

    writeReport(report, config.outPath);

    console.log("╔══════════════════════════════════════════════════════════════╗");
    console.log("║  ITSM Incident Analytics                                     ║");
    console.log("╚══════════════════════════════════════════════════════════════╝");
    console.log();
    console.log(`  Incidents:      ${config.incidentsPath}`);
    for (const line of summaryLines(report)) console.log(line);
    console.log();
    console.log(`  ✓ Report written to ${config.outPath} (${elapsed}s)`);
  } catch (err) {
    if (err instanceof AnalysisError) {
      console.error(`[analyze] ${err.name}: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

main();
