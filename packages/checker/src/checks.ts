// Checker - the consistency checks
// Each check compares the catalog against one or more backend databases.
// Purely deterministic; the only I/O is listing backend directories.

import { readdirSync } from "node:fs";
import { extname, join } from "node:path";
import {
  drawingFilenames,
  type BaseEntry,
  type Collection,
  type Database,
} from "@fastener-audit/catalog";
import type { Check, CheckContext, CheckName, ViolationRow } from "./types.js";

/** Freeze each row and the sequence holding them */
function freezeRows(rows: ViolationRow[]): readonly ViolationRow[] {
  return Object.freeze(rows.map((row) => Object.freeze([...row])));
}

// --- Check: missing base geometries ---

const BACKEND_LABELS: Readonly<Record<string, string>> = {
  freecad: "FreeCAD",
  openscad: "OpenSCAD",
};

function backendLabel(name: string): string {
  return Object.hasOwn(BACKEND_LABELS, name) ? BACKEND_LABELS[name] : name;
}

export const missingBase: Check = {
  name: "missingbase",
  title: "Missing base geometries",
  description:
    "Some classes can not be used in one or more CAD packages, because no geometry is available.",
  headers: (ctx) => [
    "Class id",
    "Collection",
    "Standards",
    ...ctx.geometryBackends.map(backendLabel),
  ],
  populate(ctx) {
    const [firstName, secondName] = ctx.geometryBackends;
    const first = ctx.databases.get(firstName).getBase;
    const second = ctx.databases.get(secondName).getBase;
    const rows: ViolationRow[] = [];
    for (const coll of ctx.repository.collections) {
      for (const cl of coll.classesByIds()) {
        const inFirst = first.has(cl.id);
        const inSecond = second.has(cl.id);
        if (!inFirst && !inSecond) {
          rows.push([cl.id, coll.id, cl.standard, inFirst, inSecond]);
        }
      }
    }
    return freezeRows(rows);
  },
};

// --- Check: base entries for classes the catalog does not define ---

export const unknownClass: Check = {
  name: "unknownclass",
  title: "Unknown classes",
  description:
    "Some classes are mentioned in base files, but never defined in blt files.",
  headers: () => ["Class id", "Database"],
  populate(ctx) {
    const ids = new Set<string>();
    for (const coll of ctx.repository.collections) {
      for (const cl of coll.classesByIds()) {
        ids.add(cl.id);
      }
    }

    const rows: ViolationRow[] = [];
    for (const db of ctx.databases.all()) {
      const reported = new Set<string>();
      for (const base of new Set(db.getBase.values())) {
        for (const id of base.classIds) {
          if (ids.has(id) || reported.has(id)) continue;
          reported.add(id);
          rows.push([id, db.name]);
        }
      }
    }
    return freezeRows(rows);
  },
};

// --- Check: classes without common parameters ---

export const missingCommonParameters: Check = {
  name: "missingcommonparameters",
  title: "Missing common parameters",
  description: "Some classes have no common parameters defined.",
  headers: () => ["Class ID", "Collection", "Standards"],
  populate(ctx) {
    const rows: ViolationRow[] = [];
    for (const coll of ctx.repository.collections) {
      for (const cl of coll.classesByIds()) {
        if (cl.parameters.common.length === 0) {
          rows.push([cl.id, coll.id, cl.standard]);
        }
      }
    }
    return freezeRows(rows);
  },
};

// --- Check: classes without a drawing ---

export const missingDrawing: Check = {
  name: "missingdrawing",
  title: "Missing drawings",
  description: "Some classes do not have associated drawings.",
  // Rows carry no class id, so neither do the headers
  headers: () => ["Collection", "Standards"],
  populate(ctx) {
    const drawings = ctx.databases.requireDrawings().getBase;
    const rows: ViolationRow[] = [];
    for (const coll of ctx.repository.collections) {
      for (const cl of coll.classesByIds()) {
        if (!drawings.has(cl.id)) rows.push([coll.id, cl.standard]);
      }
    }
    return freezeRows(rows);
  },
};

// --- Check: drawings without an svg version ---

export const missingSvgSource: Check = {
  name: "missingsvgsource",
  title: "Missing svg drawings",
  description: "Some drawings have no svg version.",
  headers: () => ["Filename", "Class ID"],
  populate(ctx) {
    const rows: ViolationRow[] = [];
    for (const [id, drawing] of ctx.databases.requireDrawings().getBase) {
      if (drawing.getSvg() === null) rows.push([drawing.filename, id]);
    }
    return freezeRows(rows);
  },
};

// --- Check: licenses outside the supported set ---

export const unsupportedLicense: Check = {
  name: "unsupportedlicense",
  title: "Incompatible Licenses",
  description: "Some collections or base geometries have unknown licenses.",
  headers: () => [
    "Type",
    "Id/Filename",
    "License name",
    "License url",
    "Authors",
  ],
  populate(ctx) {
    const rows: ViolationRow[] = [];
    for (const coll of ctx.repository.collections) {
      if (!ctx.validateLicense(coll.licenseName, coll.licenseUrl)) {
        rows.push([
          "Collection",
          coll.id,
          coll.licenseName,
          coll.licenseUrl,
          coll.authors.join(","),
        ]);
      }
    }
    for (const db of ctx.databases.all()) {
      for (const [id, base] of db.getBase) {
        if (!ctx.validateLicense(base.licenseName, base.licenseUrl)) {
          rows.push([
            db.name,
            id,
            base.licenseName,
            base.licenseUrl,
            base.authors.join(","),
          ]);
        }
      }
    }
    return freezeRows(rows);
  },
};

// --- Check: stray files in backend directories ---

export const unknownFile: Check = {
  name: "unknownfile",
  title: "Stray files",
  description:
    "Some files are present in the repository, but not mentioned anywhere.",
  headers: () => ["Filename", "Path"],
  populate(ctx) {
    const rows: ViolationRow[] = [];
    for (const db of ctx.databases.backends()) {
      for (const coll of ctx.repository.collections) {
        const known = knownFilenames(coll, db, (base) => [base.filename]);
        rows.push(...strayFiles(ctx, db.name, coll.id, known));
      }
    }

    const drawings = ctx.databases.drawings;
    if (drawings) {
      for (const coll of ctx.repository.collections) {
        const known = knownFilenames(coll, drawings, drawingFilenames);
        rows.push(...strayFiles(ctx, drawings.name, coll.id, known));
      }
    }
    return freezeRows(rows);
  },
};

function knownFilenames<E extends BaseEntry>(
  coll: Collection,
  db: Database<E>,
  filenamesOf: (entry: E) => string[],
): Set<string> {
  const known = new Set<string>();
  for (const cl of coll.classesByIds()) {
    const entry = db.getBase.get(cl.id);
    if (!entry) continue;
    for (const filename of filenamesOf(entry)) known.add(filename);
  }
  return known;
}

function strayFiles(
  ctx: CheckContext,
  backend: string,
  collectionId: string,
  known: Set<string>,
): ViolationRow[] {
  const path = join(ctx.repository.path, backend, collectionId);
  const files = listFiles(path);
  if (!files) return [];

  return files
    .filter(
      (filename) =>
        !known.has(filename) && extname(filename) !== ctx.sidecarExtension,
    )
    .map((filename) => [filename, path]);
}

/**
 * List a directory, or return null when it does not exist.
 * Any other error propagates.
 */
export function listFiles(path: string): string[] | null {
  try {
    return readdirSync(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

// --- Registry ---

export const CHECKS = [
  missingBase,
  unknownClass,
  missingCommonParameters,
  missingDrawing,
  missingSvgSource,
  unsupportedLicense,
  unknownFile,
] as const satisfies readonly Check[];

export const CHECK_NAMES: readonly CheckName[] = CHECKS.map((c) => c.name);
