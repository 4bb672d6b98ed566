// Checker - runs every registered check against one catalog snapshot

import {
  checkLicense,
  type DatabaseSet,
  type LicenseValidator,
  type Repository,
} from "@fastener-audit/catalog";
import { CHECKS } from "./checks.js";
import { env } from "./env.js";
import type {
  CheckContext,
  CheckFailure,
  CheckName,
  CheckResult,
  ViolationRow,
} from "./types.js";

export interface EngineOptions {
  validateLicense?: LicenseValidator;
  geometryBackends?: readonly [string, string];
  sidecarExtension?: string;
  /** Record a failing check and keep going instead of aborting */
  isolateFailures?: boolean;
}

export class CheckExecutionError extends Error {
  constructor(
    public readonly checkName: CheckName,
    cause: unknown,
  ) {
    super(
      `Check '${checkName}' failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "CheckExecutionError";
  }
}

/**
 * CheckEngine - runs all checks eagerly on construction
 *
 * Checks run in registry order and never see each other's output.
 * By default the first failing check aborts construction. With
 * `isolateFailures` a failing check is logged and reports no rows.
 */
export class CheckEngine {
  private readonly byName = new Map<CheckName, CheckResult>();
  private readonly failed: CheckFailure[] = [];

  constructor(
    readonly repository: Repository,
    readonly databases: DatabaseSet,
    options: EngineOptions = {},
  ) {
    const ctx: CheckContext = {
      repository,
      databases,
      validateLicense: options.validateLicense ?? checkLicense,
      geometryBackends:
        options.geometryBackends ?? env.AUDIT_GEOMETRY_BACKENDS,
      sidecarExtension:
        options.sidecarExtension ?? env.AUDIT_SIDECAR_EXTENSION,
    };
    const isolateFailures =
      options.isolateFailures ?? env.AUDIT_ISOLATE_FAILURES;

    for (const check of CHECKS) {
      let rows: readonly ViolationRow[] = [];
      try {
        rows = check.populate(ctx);
      } catch (error) {
        if (!isolateFailures) throw error;
        const failure = new CheckExecutionError(check.name, error);
        console.error(`[Checker] ${failure.message}`);
        this.failed.push({ name: check.name, error: failure });
      }

      const result: CheckResult = Object.freeze({
        name: check.name,
        title: check.title,
        description: check.description,
        headers: Object.freeze([...check.headers(ctx)]),
        rows,
      });
      this.byName.set(check.name, result);
    }
  }

  get(name: CheckName): CheckResult {
    const result = this.byName.get(name);
    if (!result) throw new Error(`Unknown check: ${name}`);
    return result;
  }

  results(): CheckResult[] {
    return [...this.byName.values()];
  }

  failures(): CheckFailure[] {
    return [...this.failed];
  }

  get totalViolations(): number {
    let total = 0;
    for (const result of this.byName.values()) total += result.rows.length;
    return total;
  }
}
