/**
 * Column Membership Matching
 *
 * ColumnSet families are stored as patterns or name lists and matched
 * lazily against literal names found in source text.
 *
 * @module
 */

import type { ColumnDefinition, Membership, SchemaDefinition } from "../../types/index.js";

type RegexMembership = Extract<Membership, { kind: "regex" }>;

/** Start and end of the whole name, whatever the flags */
const NAME_START = "(?<![\\s\\S])";
const NAME_END = "(?![\\s\\S])";

/** Global inline flags and their RegExp equivalents; null has none */
const INLINE_FLAGS: Record<string, string | null> = {
  i: "i",
  m: "m",
  s: "s",
  a: "",
  u: "",
  x: null,
  L: null,
};

/**
 * Compiled patterns per regex membership. Entries live as long as the
 * definitions of the registry that owns them.
 */
const compiledSets = new WeakMap<RegexMembership, Array<RegExp | null>>();

/**
 * Rewrites Python-only regex syntax: `(?P<name>…)`, `(?P=name)` and the
 * `\A`, `\Z`, `\z` anchors. Escapes inside character classes are kept.
 */
function translateSyntax(pattern: string): string {
  let out = "";
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === "\\") {
      const next = pattern.charAt(i + 1);
      i++;
      if (!inClass && next === "A") out += NAME_START;
      else if (!inClass && (next === "Z" || next === "z")) out += NAME_END;
      else out += char + next;
      continue;
    }
    if (inClass) {
      if (char === "]") inClass = false;
      out += char;
      continue;
    }
    if (char === "[") {
      inClass = true;
      out += char;
      // a leading `]` (after an optional `^`) is a literal member
      if (pattern.charAt(i + 1) === "^") out += pattern.charAt(++i);
      if (pattern.charAt(i + 1) === "]") out += "\\" + pattern.charAt(++i);
      continue;
    }
    const named = /^\(\?P=(\w+)\)/.exec(pattern.slice(i));
    if (named) {
      out += `\\k<${named[1] ?? ""}>`;
      i += named[0].length - 1;
    } else if (pattern.startsWith("(?P<", i)) {
      out += "(?<";
      i += 3;
    } else {
      out += char;
    }
  }
  return out;
}

/**
 * Compiles a Python regular expression into an anchored RegExp, or null
 * when it cannot be expressed. Matching anchors at the start of the name
 * only, like Python's `re.match`. Leading global flags such as `(?i)`
 * become RegExp flags.
 */
export function compilePattern(pattern: string): RegExp | null {
  let body = pattern;
  let flags = "";
  const leading = /^\(\?([a-zA-Z]+)\)/.exec(pattern);
  if (leading) {
    for (const letter of leading[1] ?? "") {
      const flag = INLINE_FLAGS[letter];
      if (flag === null || flag === undefined) return null;
      if (!flags.includes(flag)) flags += flag;
    }
    body = pattern.slice(leading[0].length);
  }

  const anchor = flags.includes("m") ? NAME_START : "^";
  try {
    return new RegExp(`${anchor}(?:${translateSyntax(body)})`, flags);
  } catch {
    return null;
  }
}

export function isValidPattern(pattern: string): boolean {
  return compilePattern(pattern) !== null;
}

function compiledPatterns(membership: RegexMembership): Array<RegExp | null> {
  let regexes = compiledSets.get(membership);
  if (!regexes) {
    regexes = membership.patterns.map(compilePattern);
    compiledSets.set(membership, regexes);
  }
  return regexes;
}

/**
 * Whether a literal column name belongs to a column definition.
 */
export function matchesMembership(column: ColumnDefinition, name: string): boolean {
  const membership = column.membership;
  switch (membership.kind) {
    case "exact":
      return membership.name === name;
    case "members":
      return membership.names.includes(name);
    case "regex":
      return compiledPatterns(membership).some((regex) => regex?.test(name) === true);
  }
}

/**
 * Exact column whose lookup key is `name`. Aliased columns are reachable
 * only through their alias.
 */
export function findExactColumn(schema: SchemaDefinition, name: string): ColumnDefinition | undefined {
  return schema.columns.find((column) => column.kind === "column" && column.lookupKey === name);
}

/**
 * Column or column set declared under the public name `name`, as in
 * `Schema.name`.
 */
export function findColumnByName(schema: SchemaDefinition, name: string): ColumnDefinition | undefined {
  return schema.columns.find((column) => column.name === name);
}

/**
 * Column set whose membership admits `name`.
 */
export function findColumnSet(schema: SchemaDefinition, name: string): ColumnDefinition | undefined {
  return schema.columns.find((column) => column.kind === "column-set" && matchesMembership(column, name));
}

/**
 * Whether a literal (physical) column name is justified by a schema:
 * an exact column's lookup key, a column set's membership or its own name,
 * or a group name.
 */
export function schemaAdmits(schema: SchemaDefinition, name: string): boolean {
  if (findExactColumn(schema, name) || findColumnSet(schema, name)) return true;
  if (schema.columns.some((column) => column.kind === "column-set" && column.name === name)) return true;
  return schema.groups.has(name);
}
