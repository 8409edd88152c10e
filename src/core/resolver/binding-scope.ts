/**
 * Binding Scope
 *
 * Variable → SchemaBinding map for one module, class or function body,
 * with the enclosing scope as fallback. An Unknown binding is stored as a
 * tombstone (`schema: null`) so that it shadows an outer binding.
 *
 * @module
 */

import type { BindingConfidence, SchemaBinding, SchemaDefinition } from "../../types/index.js";

/**
 * Structural identity of two schemas reached on different paths.
 */
export function sameSchema(a: SchemaDefinition, b: SchemaDefinition): boolean {
  if (a === b) return true;
  if (a.name !== b.name || a.allowExtraColumns !== b.allowExtraColumns || a.columns.length !== b.columns.length) {
    return false;
  }
  return a.columns.every((column, index) => {
    const other = b.columns[index];
    return other !== undefined && other.lookupKey === column.lookupKey && other.kind === column.kind;
  });
}

export class BindingScope {
  private bindings = new Map<string, SchemaBinding>();

  constructor(private readonly parent: BindingScope | null = null) {}

  lookup(variable: string): SchemaBinding | undefined {
    return this.bindings.get(variable) ?? this.parent?.lookup(variable);
  }

  bind(variable: string, schema: SchemaDefinition, confidence: BindingConfidence, line: number): void {
    this.bindings.set(variable, { variable, schema, confidence, boundAt: line });
  }

  /**
   * Marks the variable as holding nothing verifiable from this point on.
   */
  unbind(variable: string, line: number): void {
    this.bindings.set(variable, { variable, schema: null, confidence: "inferred", boundAt: line });
  }

  /**
   * Independent copy of this scope's own bindings, sharing the parent.
   */
  clone(): BindingScope {
    const copy = new BindingScope(this.parent);
    copy.bindings = new Map(this.bindings);
    return copy;
  }

  /**
   * Replaces this scope's bindings with the merge of several paths that
   * reach the same program point. A variable keeps its binding only when
   * every path binds it to the same schema; any disagreement leaves it
   * Unknown. An empty path list means the point is unreachable and leaves
   * the scope unchanged.
   */
  mergeFrom(paths: readonly BindingScope[]): void {
    if (paths.length === 0) return;

    const variables = new Set<string>();
    for (const path of paths) {
      for (const variable of path.bindings.keys()) {
        variables.add(variable);
      }
    }

    const merged = new Map<string, SchemaBinding>();
    for (const variable of variables) {
      const candidates = paths.map((path) => path.lookup(variable));
      const first = candidates[0];
      if (candidates.every((candidate) => candidate === undefined)) continue;

      const firstSchema = first?.schema ?? null;
      const agreed =
        firstSchema !== null &&
        candidates.every((candidate) => candidate?.schema != null && sameSchema(firstSchema, candidate.schema));

      if (agreed && first) {
        const confidence = candidates.every((candidate) => candidate?.confidence === "certain") ? "certain" : "inferred";
        merged.set(variable, { ...first, confidence });
      } else {
        const boundAt = Math.max(...candidates.map((candidate) => candidate?.boundAt ?? 0));
        merged.set(variable, { variable, schema: null, confidence: "inferred", boundAt });
      }
    }

    this.bindings = merged;
  }

  /**
   * Whether two scopes hold the same own bindings (used to detect that a
   * loop body has reached a stable state).
   */
  sameBindingsAs(other: BindingScope): boolean {
    if (this.bindings.size !== other.bindings.size) return false;
    for (const [variable, binding] of this.bindings) {
      const theirs = other.bindings.get(variable);
      if (!theirs) return false;
      if (binding.schema === null || theirs.schema === null) {
        if (binding.schema !== theirs.schema) return false;
      } else if (!sameSchema(binding.schema, theirs.schema)) {
        return false;
      }
    }
    return true;
  }
}
