/**
 * Reference Checker
 *
 * Judges one column access against the schema bound to its receiver and
 * turns unjustified accesses into UnknownColumn or
 * UndeclaredColumnMutation diagnostics.
 *
 * @module
 */

import type { AccessKind, AccessSite, Diagnostic, SchemaBinding, SchemaDefinition } from "../../types/index.js";
import { createDiagnostic } from "../diagnostics/diagnostic.js";
import { findColumnByName, schemaAdmits } from "../registry/membership.js";
import { findSuggestion } from "./fuzzy-match.js";

// =============================================================================
// Types
// =============================================================================

export type AccessForm = AccessSite["form"];

export type Judgment =
  | { verdict: "ok" }
  | { verdict: "unknown-column"; suggestion: string | null }
  | { verdict: "undeclared-mutation"; suggestion: string | null };

// =============================================================================
// Checker
// =============================================================================

export class ReferenceChecker {
  /**
   * Judges an access of `name` on data of `schema`.
   *
   * Literal and attribute accesses match physical names (lookup keys,
   * column set membership, group names); `schema-reference` accesses such
   * as `Schema.col` match public member names.
   */
  judge(schema: SchemaDefinition, name: string, kind: AccessKind, form: AccessForm = "subscript"): Judgment {
    if (this.matches(schema, name, form)) {
      return { verdict: "ok" };
    }

    if (kind === "read") {
      if (schema.deferred) return { verdict: "ok" };
      return { verdict: "unknown-column", suggestion: this.suggest(schema, name, form) };
    }

    if (schema.allowExtraColumns) {
      return { verdict: "ok" };
    }
    return { verdict: "undeclared-mutation", suggestion: this.suggest(schema, name, form) };
  }

  /**
   * Diagnostic for an access site, or null when the access is justified or
   * the binding is Unknown.
   */
  check(site: AccessSite, binding: SchemaBinding): Diagnostic | null {
    const schema = binding.schema;
    if (!schema) return null;

    const judgment = this.judge(schema, site.name, site.kind, site.form);
    switch (judgment.verdict) {
      case "ok":
        return null;
      case "unknown-column":
        return createDiagnostic(
          site.location,
          "error",
          "UnknownColumn",
          `Column '${site.name}' does not exist in ${schema.name}`,
          judgment.suggestion
        );
      case "undeclared-mutation":
        return createDiagnostic(
          site.location,
          "error",
          "UndeclaredColumnMutation",
          `Column '${site.name}' is not declared in ${schema.name}; assigning it adds an undeclared column`,
          judgment.suggestion
        );
    }
  }

  private matches(schema: SchemaDefinition, name: string, form: AccessForm): boolean {
    if (form === "schema-reference") {
      return findColumnByName(schema, name) !== undefined || schema.groups.has(name);
    }
    return schemaAdmits(schema, name);
  }

  /**
   * Suggestion candidates: lookup keys (or public names for schema
   * references), explicit column set members, column set names and groups.
   */
  private suggest(schema: SchemaDefinition, name: string, form: AccessForm): string | null {
    const candidates: string[] = [];
    for (const column of schema.columns) {
      candidates.push(form === "schema-reference" ? column.name : column.lookupKey);
      if (column.membership.kind === "members") {
        candidates.push(...column.membership.names);
      }
    }
    candidates.push(...schema.groups.keys());
    return findSuggestion(name, candidates);
  }
}
