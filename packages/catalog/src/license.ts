// License registry - names and canonical URLs of the licenses parts may ship under

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { LicenseValidator } from "./types.js";

const licenseTableSchema = z.record(z.string().min(1), z.string().url());

export type LicenseTable = z.infer<typeof licenseTableSchema>;

const LICENSE_TABLE_URL = new URL("./licenses.json", import.meta.url);

let cachedTable: LicenseTable | null = null;

/**
 * Load the supported-license table. Read once, on first use.
 */
export function loadLicenseTable(): LicenseTable {
  if (!cachedTable) {
    const raw: unknown = JSON.parse(readFileSync(LICENSE_TABLE_URL, "utf-8"));
    cachedTable = licenseTableSchema.parse(raw);
  }
  return cachedTable;
}

export function createLicenseValidator(table: LicenseTable): LicenseValidator {
  return (name, url) => Object.hasOwn(table, name) && table[name] === url;
}

/**
 * A license passes when its name is known and its URL is the canonical one.
 */
export const checkLicense: LicenseValidator = (name, url) =>
  createLicenseValidator(loadLicenseTable())(name, url);
