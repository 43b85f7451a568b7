/**
 * Application layout validation
 *
 * Checks the source directory against the layout contract and discovers the
 * unit and auxiliary files to deploy. Nothing on the host is touched here.
 */

import { basename, join, resolve } from "node:path";
import * as v from "valibot";
import { dirExists, listDir, walkFiles } from "../utils/fs.js";
import { LayoutError } from "../utils/errors.js";
import type { AuxiliaryArea } from "./preprocessor.js";
import { KIND_SUFFIX, parseUnitFileName, type UnitKind } from "./quadlet.js";

// Single letter, or letter followed by [a-z0-9_-] and ending in a letter or digit
const APP_NAME_REGEX = /^(?:[a-z]|[a-z][a-z0-9_-]*[a-z0-9])$/;

const appNameSchema = v.pipe(
  v.string(),
  v.regex(
    APP_NAME_REGEX,
    "Must start with a letter (a-z), end with a letter or number, and contain only lowercase letters, numbers, hyphens, and underscores",
  ),
);

/** Unit kinds that may own init.d/config.d payloads */
const AUXILIARY_OWNER_KINDS: ReadonlySet<UnitKind> = new Set<UnitKind>(["container", "pod"]);

export const MAIN_UNIT = "main";

export interface UnitSource {
  fileName: string;
  baseName: string;
  kind: UnitKind;
  path: string;
}

export interface AuxiliarySource {
  area: AuxiliaryArea;
  /** Base name of the owning unit */
  unit: string;
  /** POSIX path relative to the unit's subtree */
  relativePath: string;
  path: string;
}

export interface Layout {
  appName: string;
  sourceDir: string;
  units: UnitSource[];
  auxiliary: AuxiliarySource[];
}

/**
 * Lowercase the given name (or the source directory base name) and check it
 * against the application name grammar.
 */
export function resolveAppName(sourceDir: string, name?: string): string {
  const candidate = (name || basename(resolve(sourceDir))).toLowerCase();
  const result = v.safeParse(appNameSchema, candidate);
  if (!result.success) {
    const reason = result.issues.map((issue) => issue.message).join(", ");
    throw new LayoutError(`invalid application name: ${candidate}. ${reason}`);
  }
  return result.output;
}

/**
 * Validate the source directory and discover its files
 */
export async function validateLayout(sourceDir: string, name?: string): Promise<Layout> {
  const root = resolve(sourceDir);

  if (!(await dirExists(root))) {
    throw new LayoutError(`Source directory not found: ${root}`);
  }

  const appName = resolveAppName(root, name);

  const quadletsDir = join(root, "quadlets");
  if (!(await dirExists(quadletsDir))) {
    throw new LayoutError(
      `Required directory not found: ${quadletsDir}. The quadlets/ subdirectory is mandatory.`,
    );
  }

  const units = await discoverUnits(quadletsDir);
  validateMainUnit(units, quadletsDir);

  const auxiliary: AuxiliarySource[] = [];
  for (const area of ["init", "config"] as const) {
    auxiliary.push(...await discoverAuxiliary(root, area, units));
  }

  return { appName, sourceDir: root, units, auxiliary };
}

async function discoverUnits(quadletsDir: string): Promise<UnitSource[]> {
  const units: UnitSource[] = [];
  for (const entry of await listDir(quadletsDir)) {
    if (!entry.isFile) continue;
    const parsed = parseUnitFileName(entry.name);
    if (!parsed) continue;
    units.push({ fileName: entry.name, ...parsed, path: join(quadletsDir, entry.name) });
  }
  return units;
}

function validateMainUnit(units: UnitSource[], quadletsDir: string): void {
  const mains = units.filter((unit) => unit.baseName === MAIN_UNIT);
  const expected = `${MAIN_UNIT}${KIND_SUFFIX.container}`;

  if (mains.length === 0) {
    throw new LayoutError(
      `Required file not found: ${join(quadletsDir, expected)}. The quadlets/${expected} file is mandatory.`,
    );
  }
  if (mains.length > 1) {
    const names = mains.map((unit) => unit.fileName).join(", ");
    throw new LayoutError(`Exactly one unit named "${MAIN_UNIT}" is allowed, found: ${names}`);
  }
  const [main] = mains;
  if (main && main.kind !== "container") {
    throw new LayoutError(`The main unit must be ${expected}, found ${main.fileName}`);
  }
}

async function discoverAuxiliary(root: string, area: AuxiliaryArea, units: UnitSource[]): Promise<AuxiliarySource[]> {
  const dirName = `${area}.d`;
  const areaDir = join(root, dirName);
  if (!(await dirExists(areaDir))) {
    return [];
  }

  const files: AuxiliarySource[] = [];
  for (const entry of await listDir(areaDir)) {
    if (!entry.isDirectory) continue;

    const suffixed = parseUnitFileName(entry.name);
    if (suffixed && AUXILIARY_OWNER_KINDS.has(suffixed.kind)) {
      throw new LayoutError(
        `Invalid ${dirName} subdirectory: ${entry.name}. Use the unit name without suffix (${suffixed.baseName}/ instead of ${entry.name}/)`,
      );
    }

    const owners = units.filter((unit) => unit.baseName === entry.name && AUXILIARY_OWNER_KINDS.has(unit.kind));
    if (owners.length === 0) {
      throw new LayoutError(
        `orphan auxiliary directory: ${dirName}/${entry.name}. Expected quadlets/${entry.name}.container or quadlets/${entry.name}.pod`,
      );
    }
    if (owners.length > 1) {
      const names = owners.map((unit) => unit.fileName).join(", ");
      throw new LayoutError(`Ambiguous ${dirName} subdirectory: ${entry.name}. Matching units: ${names}`);
    }

    const unitDir = join(areaDir, entry.name);
    for (const relativePath of await walkFiles(unitDir)) {
      files.push({ area, unit: entry.name, relativePath, path: join(unitDir, relativePath) });
    }
  }

  return files;
}
