/**
 * Schema Composition
 *
 * Pure operations that build new SchemaDefinitions out of existing ones:
 * union with conflict checking (inheritance, `+`, merge/concat), column
 * subsets, drops, renames and single-column extension.
 *
 * @module
 */

import type {
  ColumnDefinition,
  SchemaDefinition,
  SchemaOrigin,
  SourceLocation,
  ValueType,
} from "../../types/index.js";
import { ErrorCode, SchemaConflictError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { ANY_TYPE } from "./declarations.js";
import { findColumnSet, matchesMembership } from "./membership.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Identity of a schema being built
 */
export interface SchemaShape {
  name: string;
  declaredAt: SourceLocation;
  origin: SchemaOrigin;
}

/**
 * A derived schema together with the requested names that matched nothing
 */
export interface SubsetResult {
  schema: SchemaDefinition;
  missing: string[];
}

interface OwnedColumn {
  column: ColumnDefinition;
  owner: string;
}

// =============================================================================
// Columns
// =============================================================================

export function exactColumn(name: string, valueType: ValueType = ANY_TYPE, nullable = false): ColumnDefinition {
  return {
    name,
    lookupKey: name,
    valueType,
    membership: { kind: "exact", name },
    nullable,
    kind: "column",
  };
}

/**
 * First lookup key shared by two columns of different value types, in
 * lexicographic order, or null when the invariant holds.
 */
export function findKeyConflict(columns: readonly ColumnDefinition[]): string | null {
  const seen = new Map<string, ValueType>();
  const conflicts: string[] = [];

  for (const column of columns) {
    const existing = seen.get(column.lookupKey);
    if (!existing) {
      seen.set(column.lookupKey, column.valueType);
    } else if (existing.text !== column.valueType.text) {
      conflicts.push(column.lookupKey);
    }
  }

  return conflicts.sort()[0] ?? null;
}

export function mergeGroups(sources: ReadonlyArray<ReadonlyMap<string, readonly string[]>>): Map<string, string[]> {
  const merged = new Map<string, string[]>();
  for (const groups of sources) {
    for (const [group, members] of groups) {
      const existing = merged.get(group) ?? [];
      for (const member of members) {
        if (!existing.includes(member)) existing.push(member);
      }
      merged.set(group, existing);
    }
  }
  return merged;
}

function filterGroups(
  groups: ReadonlyMap<string, readonly string[]>,
  columns: readonly ColumnDefinition[]
): Map<string, string[]> {
  const names = new Set(columns.map((column) => column.name));
  const filtered = new Map<string, string[]>();
  for (const [group, members] of groups) {
    const surviving = members.filter((member) => names.has(member));
    if (surviving.length > 0) filtered.set(group, surviving);
  }
  return filtered;
}

// =============================================================================
// Union
// =============================================================================

/**
 * Unions the operands' columns. A lookup key declared by two operands with
 * different value types is a conflict; when several keys conflict the
 * lexicographically smallest is reported, so operand order never changes
 * the verdict.
 */
export function composeSchemas(
  operands: readonly SchemaDefinition[],
  shape: SchemaShape
): Result<SchemaDefinition, SchemaConflictError> {
  const byKey = new Map<string, OwnedColumn>();
  const conflicts = new Map<string, [OwnedColumn, OwnedColumn]>();
  const columns: ColumnDefinition[] = [];

  for (const operand of operands) {
    for (const column of operand.columns) {
      const existing = byKey.get(column.lookupKey);
      if (!existing) {
        byKey.set(column.lookupKey, { column, owner: operand.name });
        columns.push(column);
      } else if (existing.column.valueType.text !== column.valueType.text && !conflicts.has(column.lookupKey)) {
        conflicts.set(column.lookupKey, [existing, { column, owner: operand.name }]);
      }
    }
  }

  const conflictKey = [...conflicts.keys()].sort()[0];
  if (conflictKey !== undefined) {
    const pair = conflicts.get(conflictKey);
    const detail = pair
      ? `: ${pair[0].column.valueType.text} (${pair[0].owner}) vs ${pair[1].column.valueType.text} (${pair[1].owner})`
      : "";
    return err(
      new SchemaConflictError(`Column '${conflictKey}' has conflicting types in ${shape.name}${detail}`, ErrorCode.SCHEMA_CONFLICT, {
        schemaName: shape.name,
        columnName: conflictKey,
      })
    );
  }

  return ok({
    name: shape.name,
    declaredAt: shape.declaredAt,
    columns,
    groups: mergeGroups(operands.map((operand) => operand.groups)),
    allowExtraColumns: operands.some((operand) => operand.allowExtraColumns),
    deferred: operands.some((operand) => operand.deferred),
    origin: shape.origin,
  });
}

/**
 * Applies a class's own members on top of its inherited columns: a member
 * with the same public name replaces the inherited one in place, new
 * members are appended.
 */
export function overrideColumns(
  inherited: readonly ColumnDefinition[],
  own: readonly ColumnDefinition[]
): ColumnDefinition[] {
  const columns = [...inherited];
  for (const column of own) {
    const index = columns.findIndex((existing) => existing.name === column.name);
    if (index >= 0) {
      columns[index] = column;
    } else {
      columns.push(column);
    }
  }
  return columns;
}

// =============================================================================
// Subsets
// =============================================================================

function matchesRequest(column: ColumnDefinition, requested: string): boolean {
  return column.name === requested || column.lookupKey === requested;
}

/**
 * Keeps exactly the requested columns, in source order. A requested name
 * that only matches a column set becomes an exact column of the set's type.
 */
export function selectColumns(source: SchemaDefinition, names: readonly string[], shape: SchemaShape): SubsetResult {
  const columns = source.columns.filter((column) => names.some((requested) => matchesRequest(column, requested)));
  const missing: string[] = [];

  for (const requested of names) {
    if (columns.some((column) => matchesRequest(column, requested) || matchesMembership(column, requested))) {
      continue;
    }
    const family = findColumnSet(source, requested);
    if (family) {
      columns.push(exactColumn(requested, family.valueType, family.nullable));
    } else if (!missing.includes(requested)) {
      missing.push(requested);
    }
  }

  return {
    schema: {
      name: shape.name,
      declaredAt: shape.declaredAt,
      columns,
      groups: filterGroups(source.groups, columns),
      allowExtraColumns: source.allowExtraColumns,
      deferred: source.deferred,
      origin: shape.origin,
    },
    missing,
  };
}

/**
 * Removes the requested columns. Names inside a column set family leave the
 * family in place.
 */
export function dropColumns(source: SchemaDefinition, names: readonly string[], shape: SchemaShape): SubsetResult {
  const columns = source.columns.filter((column) => !names.some((requested) => matchesRequest(column, requested)));
  const missing = names.filter(
    (requested, index) =>
      names.indexOf(requested) === index &&
      !source.columns.some((column) => matchesRequest(column, requested) || matchesMembership(column, requested))
  );

  return {
    schema: {
      name: shape.name,
      declaredAt: shape.declaredAt,
      columns,
      groups: filterGroups(source.groups, columns),
      allowExtraColumns: source.allowExtraColumns,
      deferred: source.deferred,
      origin: shape.origin,
    },
    missing,
  };
}

/**
 * Renames exact columns by lookup key. Keys absent from the schema are
 * ignored, as `DataFrame.rename` does.
 */
export function renameColumns(
  source: SchemaDefinition,
  mapping: ReadonlyMap<string, string>,
  shape: SchemaShape
): SchemaDefinition {
  const renamedNames = new Map<string, string>();
  const columns = source.columns.map((column) => {
    const target = column.kind === "column" ? mapping.get(column.lookupKey) : undefined;
    if (target === undefined) return column;
    renamedNames.set(column.name, target);
    return { ...exactColumn(target, column.valueType, column.nullable), description: column.description };
  });

  const groups = new Map<string, string[]>();
  for (const [group, members] of source.groups) {
    groups.set(
      group,
      members.map((member) => renamedNames.get(member) ?? member)
    );
  }

  return {
    name: shape.name,
    declaredAt: shape.declaredAt,
    columns,
    groups,
    allowExtraColumns: source.allowExtraColumns,
    deferred: source.deferred,
    origin: shape.origin,
  };
}

/**
 * Appends a column, keeping everything else from the source.
 */
export function extendSchema(source: SchemaDefinition, column: ColumnDefinition, shape: SchemaShape): SchemaDefinition {
  return {
    name: shape.name,
    declaredAt: shape.declaredAt,
    columns: [...source.columns, column],
    groups: source.groups,
    allowExtraColumns: source.allowExtraColumns,
    deferred: source.deferred,
    origin: shape.origin,
  };
}
