// Catalog model - the read-only inputs an audit runs against

export interface ParameterSet {
  common: readonly string[];
  specific: readonly string[];
}

export interface PartClass {
  id: string;
  /** Standard designators, joined with ", " when a class has several */
  standard: string;
  parameters: ParameterSet;
}

export interface Collection {
  id: string;
  name: string;
  authors: readonly string[];
  licenseName: string;
  licenseUrl: string;
  classes: readonly PartClass[];
  /** Classes in declaration order, one per id */
  classesByIds(): PartClass[];
}

export interface Repository {
  /** Root directory holding one folder per backend */
  path: string;
  collections: readonly Collection[];
}

export interface BaseEntry {
  filename: string;
  licenseName: string;
  licenseUrl: string;
  authors: readonly string[];
  classIds: readonly string[];
}

export interface DrawingEntry extends BaseEntry {
  getSvg(): string | null;
  getPng(): string | null;
}

export interface Database<E extends BaseEntry = BaseEntry> {
  name: string;
  getBase: ReadonlyMap<string, E>;
}

export type LicenseValidator = (name: string, url: string) => boolean;

export class MissingBackendError extends Error {
  constructor(public readonly backend: string) {
    super(`Backend database '${backend}' is not available`);
    this.name = "MissingBackendError";
  }
}

export class DuplicateBackendError extends Error {
  constructor(public readonly backend: string) {
    super(`Backend database '${backend}' is registered more than once`);
    this.name = "DuplicateBackendError";
  }
}
