/**
 * Quadlet unit descriptors
 *
 * A line-preserving model of systemd-style INI files: sections keep their
 * directives in order, keys may repeat, and lines nobody touched serialize
 * back byte-for-byte.
 */

import { PreprocessError } from "../utils/errors.js";

export type UnitKind = "container" | "volume" | "network" | "pod" | "composite-pod";

/** Unit file suffix for each kind */
export const KIND_SUFFIX: Record<UnitKind, string> = {
  container: ".container",
  volume: ".volume",
  network: ".network",
  pod: ".pod",
  "composite-pod": ".kube",
};

export const UNIT_KINDS: readonly UnitKind[] = ["container", "volume", "network", "pod", "composite-pod"];

const SUFFIX_KIND = new Map<string, UnitKind>(UNIT_KINDS.map((kind) => [KIND_SUFFIX[kind], kind]));

/** Separator between the application name and a resource name */
export const PREFIX_SEPARATOR = "--";

export interface TriviaLine {
  type: "blank" | "comment";
  raw: string;
}

export interface Directive {
  type: "directive";
  key: string;
  value: string;
  /** Source text (may span continuation lines); null once the value is rewritten */
  raw: string | null;
  line: number;
}

export type SectionEntry = TriviaLine | Directive;

export interface Section {
  name: string;
  /** Header as written; null for sections created by the preprocessor */
  header: string | null;
  entries: SectionEntry[];
}

export interface QuadletDocument {
  /** Blank lines and comments before the first section */
  preamble: TriviaLine[];
  sections: Section[];
  trailingNewline: boolean;
}

export interface UnitDescriptor {
  kind: UnitKind;
  /** File name without the application prefix, e.g. "main.container" */
  fileName: string;
  /** File name without suffix, e.g. "main" */
  baseName: string;
  /** Rendered text before preprocessing */
  rawText: string;
  document: QuadletDocument;
}

/**
 * Split a unit file name into base name and kind, or null when the suffix is
 * not a Quadlet unit suffix.
 */
export function parseUnitFileName(fileName: string): { baseName: string; kind: UnitKind } | null {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0) return null;
  const kind = SUFFIX_KIND.get(fileName.slice(dot));
  if (!kind) return null;
  return { baseName: fileName.slice(0, dot), kind };
}

/**
 * Prefix a resource name with the application name
 */
export function prefixName(appName: string, name: string): string {
  return `${appName}${PREFIX_SEPARATOR}${name}`;
}

/**
 * Name of the systemd service the Quadlet generator creates for a unit
 */
export function serviceNameFor(appName: string, kind: UnitKind, baseName: string): string {
  const name = prefixName(appName, baseName);
  switch (kind) {
    case "container":
    case "composite-pod":
      return `${name}.service`;
    case "volume":
      return `${name}-volume.service`;
    case "network":
      return `${name}-network.service`;
    case "pod":
      return `${name}-pod.service`;
  }
}

/**
 * Parse rendered unit text
 */
export function parseQuadlet(text: string, fileName: string): QuadletDocument {
  const trailingNewline = text.endsWith("\n");
  const lines = (trailingNewline ? text.slice(0, -1) : text).split("\n");

  const document: QuadletDocument = { preamble: [], sections: [], trailingNewline };
  let current: Section | null = null;

  const push = (entry: TriviaLine): void => {
    if (current) current.entries.push(entry);
    else document.preamble.push(entry);
  };

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? "";
    const lineNumber = i + 1;
    const trimmed = raw.trim();

    if (trimmed === "") {
      push({ type: "blank", raw });
      continue;
    }

    if (trimmed.startsWith("#") || trimmed.startsWith(";")) {
      push({ type: "comment", raw });
      continue;
    }

    if (trimmed.startsWith("[")) {
      if (!trimmed.endsWith("]")) {
        throw new PreprocessError(fileName, `unterminated section header: ${trimmed}`, { line: lineNumber });
      }
      const name = trimmed.slice(1, -1).trim();
      if (name === "") {
        throw new PreprocessError(fileName, "empty section name", { line: lineNumber });
      }
      current = { name, header: raw, entries: [] };
      document.sections.push(current);
      continue;
    }

    const eq = trimmed.indexOf("=");
    if (eq === -1) {
      throw new PreprocessError(fileName, `expected Key=Value, got: ${trimmed}`, { line: lineNumber });
    }

    const key = trimmed.slice(0, eq).trim();
    if (key === "") {
      throw new PreprocessError(fileName, "directive without a key", { line: lineNumber });
    }
    if (!current) {
      throw new PreprocessError(fileName, `directive outside any section: ${key}`, { line: lineNumber });
    }

    // Backslash-newline joins lines; the joined value uses a single space
    const rawLines = [raw];
    const parts = [trimmed.slice(eq + 1)];
    while (parts[parts.length - 1]?.trimEnd().endsWith("\\") && i + 1 < lines.length) {
      const last = parts.pop() ?? "";
      parts.push(last.trimEnd().slice(0, -1));
      i++;
      const next = lines[i] ?? "";
      rawLines.push(next);
      parts.push(next);
    }

    const value = parts.map((part) => part.trim()).filter((part) => part !== "").join(" ");
    current.entries.push({ type: "directive", key, value, raw: rawLines.join("\n"), line: lineNumber });
  }

  return document;
}

/**
 * Serialize a document back to text
 */
export function serializeQuadlet(document: QuadletDocument): string {
  const out: string[] = document.preamble.map((line) => line.raw);

  for (const section of document.sections) {
    out.push(section.header ?? `[${section.name}]`);
    for (const entry of section.entries) {
      if (entry.type === "directive") {
        out.push(entry.raw ?? `${entry.key}=${entry.value}`);
      } else {
        out.push(entry.raw);
      }
    }
  }

  const text = out.join("\n");
  return document.trailingNewline ? `${text}\n` : text;
}

/**
 * Build a descriptor from a unit file name and its rendered text
 */
export function createUnitDescriptor(fileName: string, renderedText: string): UnitDescriptor {
  const parsed = parseUnitFileName(fileName);
  if (!parsed) {
    throw new PreprocessError(fileName, "not a Quadlet unit file");
  }
  return {
    kind: parsed.kind,
    fileName,
    baseName: parsed.baseName,
    rawText: renderedText,
    document: parseQuadlet(renderedText, fileName),
  };
}

/**
 * Iterate every directive in the document, in file order
 */
export function* directives(document: QuadletDocument): Generator<{ section: Section; directive: Directive }> {
  for (const section of document.sections) {
    for (const entry of section.entries) {
      if (entry.type === "directive") {
        yield { section, directive: entry };
      }
    }
  }
}

/**
 * All values of `key` within sections named `sectionName`
 */
export function getValues(document: QuadletDocument, sectionName: string, key: string): string[] {
  const values: string[] = [];
  for (const { section, directive } of directives(document)) {
    if (section.name === sectionName && directive.key === key) {
      values.push(directive.value);
    }
  }
  return values;
}

/**
 * Rewrite a directive's value, dropping its raw text when the value changes
 */
export function setDirectiveValue(directive: Directive, value: string): void {
  if (directive.value === value) return;
  directive.value = value;
  directive.raw = null;
}

/**
 * Insert `key=value` right after the header of the first `sectionName`
 * section, appending the section when the document has none.
 */
export function insertDirective(document: QuadletDocument, sectionName: string, key: string, value: string): void {
  const directive: Directive = { type: "directive", key, value, raw: null, line: 0 };
  const section = document.sections.find((s) => s.name === sectionName);

  if (section) {
    section.entries.unshift(directive);
    return;
  }

  const last = document.sections[document.sections.length - 1];
  const lastEntry = last?.entries[last.entries.length - 1];
  if (last && lastEntry?.type !== "blank") {
    last.entries.push({ type: "blank", raw: "" });
  }
  document.sections.push({ name: sectionName, header: null, entries: [directive] });
}
