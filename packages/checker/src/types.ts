// Checker - shared type definitions

import type {
  DatabaseSet,
  LicenseValidator,
  Repository,
} from "@fastener-audit/catalog";

export type Cell = string | boolean;

/** One reported inconsistency, shaped after its check's headers */
export type ViolationRow = readonly Cell[];

export type CheckName =
  | "missingbase"
  | "unknownclass"
  | "missingcommonparameters"
  | "missingdrawing"
  | "missingsvgsource"
  | "unsupportedlicense"
  | "unknownfile";

export interface CheckContext {
  repository: Repository;
  databases: DatabaseSet;
  validateLicense: LicenseValidator;
  /** The two geometry backends MissingBase compares */
  geometryBackends: readonly [string, string];
  /** Extension of metadata sidecar files, never reported as stray */
  sidecarExtension: string;
}

export interface Check {
  name: CheckName;
  title: string;
  description: string;
  headers(ctx: CheckContext): readonly string[];
  /** Returns a frozen row sequence; safe to call repeatedly */
  populate(ctx: CheckContext): readonly ViolationRow[];
}

/** Anything the renderer can print as a table */
export interface TableSource {
  readonly title: string;
  readonly description: string;
  readonly headers: readonly string[];
  readonly rows: readonly ViolationRow[];
}

export interface CheckResult extends TableSource {
  readonly name: CheckName;
}

export interface CheckFailure {
  name: CheckName;
  error: Error;
}

export interface AuditSummary {
  date: string;
  totalViolations: number;
  byCheck: Record<CheckName, number>;
  failed: CheckName[];
  report: string;
  scannedAt: string;
}
