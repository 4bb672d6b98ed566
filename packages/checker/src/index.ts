// packages/checker/src/index.ts
// Public API of the repository audit

// Types
export type {
  AuditSummary,
  Cell,
  Check,
  CheckContext,
  CheckFailure,
  CheckName,
  CheckResult,
  TableSource,
  ViolationRow,
} from "./types.js";

// Checks
export {
  CHECKS,
  CHECK_NAMES,
  missingBase,
  unknownClass,
  missingCommonParameters,
  missingDrawing,
  missingSvgSource,
  unsupportedLicense,
  unknownFile,
} from "./checks.js";

// Engine
export {
  CheckEngine,
  CheckExecutionError,
  type EngineOptions,
} from "./engine.js";

// Rendering and export
export { renderTable, renderReport } from "./renderer.js";
export {
  runAudit,
  summarize,
  writeReport,
  type AuditOptions,
} from "./reporter.js";

// Configuration
export { env, envSchema, type Env } from "./env.js";
