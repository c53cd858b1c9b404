/** Logical fields of the runtime config document. */
export type FieldId =
  | "provisioning"
  | "agent"
  | "hostname"
  | "connect"
  | "listen"
  | "homedir"
  | "engine_uri"
  | "engine_network";

/**
 * Where a field lives: a top-level section, optionally narrowed to one key
 * line inside it. Distinct fields never share a region.
 */
export interface FieldTarget {
  readonly section: string;
  readonly key?: string;
}

export const FIELD_TARGETS: Record<FieldId, FieldTarget> = {
  provisioning: { section: "provisioning" },
  agent: { section: "agent" },
  hostname: { section: "hostname" },
  connect: { section: "connect" },
  listen: { section: "listen" },
  homedir: { section: "homedir" },
  engine_uri: { section: "moby_runtime", key: "uri" },
  engine_network: { section: "moby_runtime", key: "network" },
};

/** One field replacement: the lines that replace the field's region. */
export interface FieldPatch {
  readonly field: FieldId;
  readonly lines: readonly string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * A top-level section: its header (set, or commented out with `#`) and every
 * following line that is indented, or commented and still indented. A blank
 * line or an unindented line ends the section.
 */
export function sectionPattern(section: string): RegExp {
  return new RegExp(`^(?:#[ \\t]*)?${escapeRegExp(section)}:[^\\r\\n]*(?:\\r?\\n(?:[ \\t]+|#[ \\t]{2,})[^\\r\\n]*)*`, "gm");
}

/** One key line inside a section body, set or commented out. */
export function keyPattern(key: string): RegExp {
  return new RegExp(`^[ \\t]*(?:#[ \\t]*)?${escapeRegExp(key)}:[^\\r\\n]*`, "gm");
}
