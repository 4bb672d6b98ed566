// packages/catalog/src/index.ts
// Public API consumed by the checker

// Types
export {
  DuplicateBackendError,
  MissingBackendError,
  type BaseEntry,
  type Collection,
  type Database,
  type DrawingEntry,
  type LicenseValidator,
  type ParameterSet,
  type PartClass,
  type Repository,
} from "./types.js";

// In-memory model
export {
  PartCollection,
  Drawing,
  DatabaseSet,
  createPartClass,
  createDatabase,
  drawingFilenames,
  type CollectionInit,
  type DrawingInit,
} from "./model.js";

// License registry
export {
  checkLicense,
  createLicenseValidator,
  loadLicenseTable,
  type LicenseTable,
} from "./license.js";
