// Config document patcher. Each patch replaces exactly one region of the text
// and leaves every other byte as it was. A target that does not match, or
// matches ambiguously, is an error. A patch that would leave the YAML
// unparseable is rejected; documents are immutable, so the input stays valid.
import { parseDocument } from "yaml";
import type { FieldId, FieldPatch } from "./fields.js";
import { FIELD_TARGETS, keyPattern, sectionPattern } from "./fields.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";

/** In-memory config document plus the fields set on it so far. */
export interface ConfigDocument {
  readonly text: string;
  readonly fields: ReadonlySet<FieldId>;
}

export function createDocument(text: string): ConfigDocument {
  return { text, fields: new Set() };
}

interface Region {
  readonly start: number;
  readonly end: number;
}

function isCommented(matchText: string): boolean {
  return /^[ \t]*#/.test(matchText);
}

/**
 * Pick the single region a pattern addresses. With several matches the one
 * that is not commented out wins; anything else is ambiguous.
 */
function uniqueRegion(text: string, pattern: RegExp, field: FieldId, what: string, offset = 0): Region {
  const matches = [...text.matchAll(pattern)].filter((m) => m[0].length > 0);
  let chosen: RegExpMatchArray | undefined;
  if (matches.length === 1) {
    chosen = matches[0];
  } else {
    const active = matches.filter((m) => !isCommented(m[0]));
    if (active.length === 1) chosen = active[0];
  }
  if (!chosen || chosen.index === undefined) {
    throw new InstallerError(
      InstallerErrorCode.PATCH_NOT_APPLIED,
      matches.length === 0
        ? `Config document has no ${what} for field '${field}'`
        : `Config document has ${matches.length} candidate ${what}s for field '${field}'`,
      { field, matches: matches.length },
    );
  }
  return { start: offset + chosen.index, end: offset + chosen.index + chosen[0].length };
}

function locate(text: string, field: FieldId): Region {
  const target = FIELD_TARGETS[field];
  const section = uniqueRegion(text, sectionPattern(target.section), field, `'${target.section}' section`);
  if (!target.key) return section;
  const body = text.slice(section.start, section.end);
  return uniqueRegion(body, keyPattern(target.key), field, `'${target.key}' key in '${target.section}'`, section.start);
}

function assertWellFormed(text: string, field: FieldId): void {
  const parsed = parseDocument(text);
  if (parsed.errors.length > 0) {
    throw new InstallerError(
      InstallerErrorCode.CONFIG_MALFORMED,
      `Patching field '${field}' would leave the config document malformed: ${parsed.errors[0]?.message ?? "parse error"}`,
      { field, errors: parsed.errors.map((e) => e.message) },
    );
  }
}

/** Replace the region of `field` with `lines`. Returns a new document. */
export function applyPatch(document: ConfigDocument, field: FieldId, lines: readonly string[]): ConfigDocument {
  const region = locate(document.text, field);
  const eol = document.text.includes("\r\n") ? "\r\n" : "\n";
  const text = document.text.slice(0, region.start) + lines.join(eol) + document.text.slice(region.end);
  assertWellFormed(text, field);
  return { text, fields: new Set([...document.fields, field]) };
}

export function applyPatches(document: ConfigDocument, patches: readonly FieldPatch[]): ConfigDocument {
  return patches.reduce((doc, p) => applyPatch(doc, p.field, p.lines), document);
}
