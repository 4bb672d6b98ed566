// Checker - audit run and report export

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { DatabaseSet, Repository } from "@fastener-audit/catalog";
import { CheckEngine, type EngineOptions } from "./engine.js";
import { env } from "./env.js";
import { renderReport } from "./renderer.js";
import type { AuditSummary, CheckName } from "./types.js";

export interface AuditOptions extends EngineOptions {
  /** Where to write the text report; nothing is written when unset */
  reportPath?: string;
}

export async function writeReport(
  outPath: string,
  report: string,
): Promise<void> {
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, report, "utf-8");
}

export function summarize(engine: CheckEngine): AuditSummary {
  const count = (name: CheckName): number => engine.get(name).rows.length;
  const byCheck: Record<CheckName, number> = {
    missingbase: count("missingbase"),
    unknownclass: count("unknownclass"),
    missingcommonparameters: count("missingcommonparameters"),
    missingdrawing: count("missingdrawing"),
    missingsvgsource: count("missingsvgsource"),
    unsupportedlicense: count("unsupportedlicense"),
    unknownfile: count("unknownfile"),
  };

  const scannedAt = new Date().toISOString();
  return {
    date: scannedAt.split("T")[0],
    totalViolations: engine.totalViolations,
    byCheck,
    failed: engine.failures().map((f) => f.name),
    report: renderReport(engine),
    scannedAt,
  };
}

// --- Main entry point ---

export async function runAudit(
  repository: Repository,
  databases: DatabaseSet,
  options: AuditOptions = {},
): Promise<AuditSummary> {
  console.log(
    `[Checker] Auditing ${repository.collections.length} collections against ${databases.all().length} backends...`,
  );

  const engine = new CheckEngine(repository, databases, options);
  const summary = summarize(engine);

  console.log(
    `[Checker] Audit complete: ${summary.totalViolations} violations (${summary.failed.length} failed checks)`,
  );

  const reportPath = options.reportPath ?? env.AUDIT_REPORT_PATH;
  if (reportPath) {
    await writeReport(reportPath, summary.report);
    console.log(`[Checker] Report written to ${reportPath}`);
  }

  return summary;
}
