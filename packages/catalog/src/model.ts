// In-memory implementations of the catalog model

import { basename } from "node:path";
import {
  DuplicateBackendError,
  MissingBackendError,
  type BaseEntry,
  type Collection,
  type Database,
  type DrawingEntry,
  type ParameterSet,
  type PartClass,
} from "./types.js";

export interface CollectionInit {
  id: string;
  name?: string;
  authors?: readonly string[];
  licenseName: string;
  licenseUrl: string;
  classes?: readonly PartClass[];
}

export class PartCollection implements Collection {
  readonly id: string;
  readonly name: string;
  readonly authors: readonly string[];
  readonly licenseName: string;
  readonly licenseUrl: string;
  readonly classes: readonly PartClass[];

  constructor(init: CollectionInit) {
    this.id = init.id;
    this.name = init.name ?? init.id;
    this.authors = init.authors ?? [];
    this.licenseName = init.licenseName;
    this.licenseUrl = init.licenseUrl;
    this.classes = init.classes ?? [];
  }

  classesByIds(): PartClass[] {
    const seen = new Set<string>();
    const result: PartClass[] = [];
    for (const cl of this.classes) {
      if (seen.has(cl.id)) continue;
      seen.add(cl.id);
      result.push(cl);
    }
    return result;
  }
}

export function createPartClass(
  id: string,
  standard: string | readonly string[],
  parameters: Partial<ParameterSet> = {},
): PartClass {
  return {
    id,
    standard: typeof standard === "string" ? standard : standard.join(", "),
    parameters: {
      common: parameters.common ?? [],
      specific: parameters.specific ?? [],
    },
  };
}

export interface DrawingInit extends BaseEntry {
  svgPath?: string | null;
  pngPath?: string | null;
}

export class Drawing implements DrawingEntry {
  readonly filename: string;
  readonly licenseName: string;
  readonly licenseUrl: string;
  readonly authors: readonly string[];
  readonly classIds: readonly string[];
  private readonly svgPath: string | null;
  private readonly pngPath: string | null;

  constructor(init: DrawingInit) {
    this.filename = init.filename;
    this.licenseName = init.licenseName;
    this.licenseUrl = init.licenseUrl;
    this.authors = init.authors;
    this.classIds = init.classIds;
    this.svgPath = init.svgPath ?? null;
    this.pngPath = init.pngPath ?? null;
  }

  getSvg(): string | null {
    return this.svgPath;
  }

  getPng(): string | null {
    return this.pngPath;
  }
}

/**
 * Build a backend database keyed by class id.
 * An entry covering several classes is registered under each of its ids.
 */
export function createDatabase<E extends BaseEntry>(
  name: string,
  entries: readonly E[],
): Database<E> {
  const getBase = new Map<string, E>();
  for (const entry of entries) {
    for (const id of entry.classIds) {
      getBase.set(id, entry);
    }
  }
  return { name, getBase };
}

/**
 * The backend databases an audit runs against.
 * The drawings database is kept apart because its entries carry artifact paths.
 */
export class DatabaseSet {
  private readonly byName: Map<string, Database>;

  constructor(
    backends: readonly Database[],
    readonly drawings: Database<DrawingEntry> | null = null,
  ) {
    this.byName = new Map();
    for (const db of backends) {
      if (this.byName.has(db.name) || drawings?.name === db.name) {
        throw new DuplicateBackendError(db.name);
      }
      this.byName.set(db.name, db);
    }
  }

  /** Every database, drawings last */
  all(): Database[] {
    const dbs = this.backends();
    if (this.drawings) dbs.push(this.drawings);
    return dbs;
  }

  backends(): Database[] {
    return [...this.byName.values()];
  }

  has(name: string): boolean {
    return this.byName.has(name) || this.drawings?.name === name;
  }

  get(name: string): Database {
    const db = this.byName.get(name);
    if (db) return db;
    if (this.drawings && this.drawings.name === name) return this.drawings;
    throw new MissingBackendError(name);
  }

  requireDrawings(): Database<DrawingEntry> {
    if (!this.drawings) throw new MissingBackendError("drawings");
    return this.drawings;
  }
}

/** File names a drawing occupies on disk */
export function drawingFilenames(drawing: DrawingEntry): string[] {
  const names: string[] = [];
  for (const path of [drawing.getSvg(), drawing.getPng()]) {
    if (path !== null) names.push(basename(path));
  }
  return names;
}
