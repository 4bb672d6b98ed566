// Shared catalog fixtures for checker tests

import {
  DatabaseSet,
  Drawing,
  PartCollection,
  createDatabase,
  createPartClass,
  type BaseEntry,
  type Collection,
  type Repository,
} from "@fastener-audit/catalog";
import type { CheckContext } from "./types.js";

export const MIT = {
  licenseName: "MIT",
  licenseUrl: "http://opensource.org/licenses/MIT",
};

export const acceptMitOnly = (name: string, url: string): boolean =>
  name === MIT.licenseName && url === MIT.licenseUrl;

export function baseEntry(
  filename: string,
  classIds: string[],
  overrides: Partial<BaseEntry> = {},
): BaseEntry {
  return { filename, classIds, authors: ["test-author"], ...MIT, ...overrides };
}

export function drawing(
  classId: string,
  paths: { svg?: string; png?: string } = {},
): Drawing {
  return new Drawing({
    filename: classId,
    classIds: [classId],
    authors: ["test-author"],
    ...MIT,
    svgPath: paths.svg,
    pngPath: paths.png,
  });
}

/**
 * Collection C1 with class A (no common parameters) and class B.
 */
export function sampleCollection(): Collection {
  return new PartCollection({
    id: "C1",
    authors: ["alice", "bob"],
    ...MIT,
    classes: [
      createPartClass("A", "ISO 4014"),
      createPartClass("B", "ISO 4032", { common: ["d", "k"] }),
    ],
  });
}

export function sampleRepository(
  collections: Collection[] = [sampleCollection()],
): Repository {
  return { path: "/repo", collections };
}

export function sampleDatabases(
  overrides: {
    freecad?: BaseEntry[];
    openscad?: BaseEntry[];
    drawings?: Drawing[] | null;
  } = {},
): DatabaseSet {
  const drawings =
    overrides.drawings === null
      ? null
      : createDatabase("drawings", overrides.drawings ?? []);
  return new DatabaseSet(
    [
      createDatabase("freecad", overrides.freecad ?? []),
      createDatabase("openscad", overrides.openscad ?? []),
    ],
    drawings,
  );
}

export function buildContext(
  repository: Repository,
  databases: DatabaseSet,
): CheckContext {
  return {
    repository,
    databases,
    validateLicense: acceptMitOnly,
    geometryBackends: ["freecad", "openscad"],
    sidecarExtension: ".base",
  };
}
