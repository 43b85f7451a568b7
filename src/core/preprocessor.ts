/**
 * Unit preprocessing
 *
 * Three rewrite passes, always in this order:
 * 1. Path substitution: `Volume=init.d[/sub]:…` and `config.d` sources become
 *    absolute deployment paths
 * 2. Resource prefixing: resource and unit references get `{app}--`
 * 3. Naming injection: ContainerName/PodName/VolumeName/NetworkName default
 *    to `{app}--{unit}`
 *
 * Naming injection runs last so it sees mount paths that are already
 * absolute and references that are already prefixed.
 */

import { posix } from "node:path";
import { PreprocessError } from "../utils/errors.js";
import {
  directives,
  getValues,
  insertDirective,
  PREFIX_SEPARATOR,
  prefixName,
  serializeQuadlet,
  setDirectiveValue,
  type UnitDescriptor,
  type UnitKind,
} from "./quadlet.js";

/** Directives whose values may reference application resources */
export const RESOURCE_DIRECTIVES = [
  "Network",
  "Pod",
  "Volume",
  "Wants",
  "Requires",
  "Requisite",
  "BindsTo",
  "PartOf",
  "Upholds",
  "Conflicts",
  "Before",
  "After",
] as const;

export type ResourceDirective = typeof RESOURCE_DIRECTIVES[number];

const RESOURCE_DIRECTIVE_SET = new Set<string>(RESOURCE_DIRECTIVES);

/** These hold a single reference; the unit dependency directives hold lists */
const SINGLE_VALUE_DIRECTIVES = new Set<string>(["Network", "Pod", "Volume"]);

const PREFIXABLE_SUFFIXES = [".network", ".volume", ".service", ".pod", ".kube", ".container"];

const NAME_DIRECTIVES: Partial<Record<UnitKind, { section: string; key: string }>> = {
  container: { section: "Container", key: "ContainerName" },
  pod: { section: "Pod", key: "PodName" },
  volume: { section: "Volume", key: "VolumeName" },
  network: { section: "Network", key: "NetworkName" },
};

const AUX_SOURCE_PATTERN = /^(init|config)\.d(?:\/(.*))?$/;

export type AuxiliaryArea = "init" | "config";

export interface ResourceReference {
  directive: ResourceDirective;
  raw: string;
  resolved: string;
}

export interface MountRule {
  source: string;
  target?: string;
  options: string[];
}

export interface PreprocessContext {
  appName: string;
  basePath: string;
  /** Base names of every unit in the application */
  unitBaseNames: ReadonlySet<string>;
}

export interface PreprocessResult {
  unit: UnitDescriptor;
  /** Final unit file content */
  content: string;
  references: ResourceReference[];
  /** Mount rules whose host source was rewritten to an init/config path */
  mounts: (MountRule & { area: AuxiliaryArea })[];
  /** Naming directive added by the preprocessor, if any */
  injected?: { key: string; value: string };
}

/**
 * Split a `Volume=` value into host source, container target and options
 */
export function parseMountRule(value: string): MountRule {
  const [source = "", target, ...rest] = value.split(":");
  const options = rest.join(":").split(",").filter((option) => option !== "");
  return target === undefined ? { source, options } : { source, target, options };
}

export function formatMountRule(rule: MountRule): string {
  let value = rule.source;
  if (rule.target !== undefined) {
    value += `:${rule.target}`;
    if (rule.options.length > 0) {
      value += `:${rule.options.join(",")}`;
    }
  }
  return value;
}

/**
 * Absolute directory for an application's init or config payloads of one unit
 */
export function auxiliaryRoot(basePath: string, appName: string, area: AuxiliaryArea, unitBaseName: string): string {
  return posix.join(basePath, appName, area, unitBaseName);
}

/**
 * Run all passes on a descriptor. The descriptor's document is rewritten in
 * place.
 */
export function preprocessUnit(unit: UnitDescriptor, context: PreprocessContext): PreprocessResult {
  const mounts = substitutePaths(unit, context);
  const references = prefixResources(unit, context);
  const injected = injectName(unit, context);

  const result: PreprocessResult = {
    unit,
    content: serializeQuadlet(unit.document),
    references,
    mounts,
  };
  if (injected) result.injected = injected;
  return result;
}

function substitutePaths(unit: UnitDescriptor, context: PreprocessContext): PreprocessResult["mounts"] {
  const mounts: PreprocessResult["mounts"] = [];

  for (const { directive } of directives(unit.document)) {
    if (directive.key !== "Volume") continue;

    const rule = parseMountRule(directive.value);
    const match = AUX_SOURCE_PATTERN.exec(rule.source);
    if (!match) continue;

    const area: AuxiliaryArea = match[1] === "init" ? "init" : "config";
    const subpath = (match[2] ?? "").replace(/^\/+|\/+$/g, "");
    if (subpath.split("/").includes("..")) {
      throw new PreprocessError(unit.fileName, `Volume source escapes the ${area} directory: ${rule.source}`, {
        line: directive.line,
      });
    }

    const root = auxiliaryRoot(context.basePath, context.appName, area, unit.baseName);
    rule.source = subpath ? `${root}/${subpath}` : root;

    if (area === "init" && rule.target !== undefined && !rule.options.some((o) => o === "ro" || o === "rw")) {
      rule.options.push("ro");
    }

    setDirectiveValue(directive, formatMountRule(rule));
    mounts.push({ ...rule, area });
  }

  return mounts;
}

function isResourceDirective(key: string): key is ResourceDirective {
  return RESOURCE_DIRECTIVE_SET.has(key);
}

/**
 * Whether a bare name (the part of a token before any `:` or `;`) refers to a
 * resource of this application that still needs the prefix
 */
function needsPrefix(name: string, context: PreprocessContext): boolean {
  // paths and systemd specifiers (%N, %i) are never resource names
  if (name === "" || name.includes("/") || name.includes("%") || name.startsWith(".")) return false;
  if (name.startsWith(`${context.appName}${PREFIX_SEPARATOR}`)) return false;
  if (PREFIXABLE_SUFFIXES.some((suffix) => name.endsWith(suffix) && name.length > suffix.length)) return true;
  return context.unitBaseNames.has(name);
}

function prefixResources(unit: UnitDescriptor, context: PreprocessContext): ResourceReference[] {
  const references: ResourceReference[] = [];

  for (const { directive } of directives(unit.document)) {
    const key = directive.key;
    if (!isResourceDirective(key)) continue;

    const rewriteToken = (token: string): string => {
      const split = /^([^:;]*)(.*)$/s.exec(token);
      const name = split?.[1] ?? token;
      const rest = split?.[2] ?? "";
      if (!needsPrefix(name, context)) {
        if (name.startsWith(`${context.appName}${PREFIX_SEPARATOR}`)) {
          references.push({ directive: key, raw: name, resolved: name });
        }
        return token;
      }
      const resolved = prefixName(context.appName, name);
      references.push({ directive: key, raw: name, resolved });
      return `${resolved}${rest}`;
    };

    const value = SINGLE_VALUE_DIRECTIVES.has(key)
      ? rewriteToken(directive.value)
      : directive.value
        .split(/(\s+)/)
        .map((part) => (part.trim() === "" ? part : rewriteToken(part)))
        .join("");

    setDirectiveValue(directive, value);
  }

  return references;
}

function injectName(unit: UnitDescriptor, context: PreprocessContext): PreprocessResult["injected"] {
  const naming = NAME_DIRECTIVES[unit.kind];
  if (!naming) return undefined;

  if (getValues(unit.document, naming.section, naming.key).length > 0) {
    return undefined;
  }

  const value = prefixName(context.appName, unit.baseName);
  insertDirective(unit.document, naming.section, naming.key, value);
  return { key: naming.key, value };
}
