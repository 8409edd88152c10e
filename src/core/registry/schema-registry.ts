/**
 * Schema Registry
 *
 * Resolves the raw declarations of every file into immutable
 * SchemaDefinitions and keeps them, by name, for the rest of the run.
 * The registry is built once, frozen, and then read concurrently by the
 * per-file checkers.
 *
 * @module
 */

import type { ColumnDefinition, Diagnostic, SchemaDefinition, SourceLocation } from "../../types/index.js";
import { ErrorCode, InternalFaultError, type SchemaConflictError } from "../errors.js";
import { createDiagnostic, diagnosticFromError } from "../diagnostics/diagnostic.js";
import type {
  AddDeclaration,
  ClassDeclaration,
  FileDeclarations,
  RawDeclaration,
  SubsetDeclaration,
} from "./declarations.js";
import {
  composeSchemas,
  dropColumns,
  findKeyConflict,
  mergeGroups,
  overrideColumns,
  selectColumns,
} from "./composition.js";
import { SCHEMA_ROOT_NAMES } from "./frame-types.js";
import { isValidPattern } from "./membership.js";

// =============================================================================
// Registry
// =============================================================================

/**
 * Name → SchemaDefinition store. Lookups are only allowed once the registry
 * is frozen, registrations only before.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, SchemaDefinition>();
  private readonly factories = new Map<string, string>();
  private frozen = false;

  register(schema: SchemaDefinition): void {
    this.assertOpen(`schema ${schema.name}`);
    this.schemas.set(schema.name, schema);
  }

  /**
   * Records that calling `functionName` returns data of `schemaName`.
   */
  registerFactory(functionName: string, schemaName: string): void {
    this.assertOpen(`factory ${functionName}`);
    this.factories.set(functionName, schemaName);
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): SchemaDefinition | undefined {
    this.assertFrozen(name);
    return this.schemas.get(name);
  }

  has(name: string): boolean {
    this.assertFrozen(name);
    return this.schemas.has(name);
  }

  /**
   * All resolved schemas, ordered by name.
   */
  list(): SchemaDefinition[] {
    this.assertFrozen("list");
    return [...this.schemas.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Schema returned by a registered factory function.
   */
  factoryReturn(functionName: string): SchemaDefinition | undefined {
    this.assertFrozen(functionName);
    const schemaName = this.factories.get(functionName);
    return schemaName === undefined ? undefined : this.schemas.get(schemaName);
  }

  get size(): number {
    return this.schemas.size;
  }

  private assertFrozen(construct: string): void {
    if (!this.frozen) {
      throw new InternalFaultError("Schema registry consulted before it was frozen", ErrorCode.REGISTRY_NOT_FROZEN, {
        construct,
      });
    }
  }

  private assertOpen(construct: string): void {
    if (this.frozen) {
      throw new InternalFaultError("Schema registered after the registry was frozen", ErrorCode.REGISTRY_FROZEN, {
        construct,
      });
    }
  }
}

// =============================================================================
// Builder
// =============================================================================

export interface RegistryBuildOptions {
  /** Names that shadow DataFrame members when used as column names */
  reservedNames?: ReadonlySet<string>;
}

export interface RegistryBuildResult {
  registry: SchemaRegistry;
  diagnostics: Diagnostic[];
}

function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}`;
}

/**
 * Builds and freezes a registry from every file's raw declarations.
 *
 * Declarations are considered in file-path order. A name declared more than
 * once is reported and left unresolved. Each remaining declaration is
 * resolved depth-first; a cycle, a type conflict, or a bad select/drop entry
 * leaves that schema unresolved with one SchemaConflictError, and schemas
 * depending on an unresolved schema are unresolved silently.
 */
export function buildSchemaRegistry(
  files: readonly FileDeclarations[],
  options: RegistryBuildOptions = {}
): RegistryBuildResult {
  const builder = new RegistryBuilder(files, options.reservedNames ?? new Set());
  return builder.build();
}

class RegistryBuilder {
  private readonly registry = new SchemaRegistry();
  private readonly diagnostics: Diagnostic[] = [];
  private readonly sortedFiles: FileDeclarations[];
  private readonly declarationsByName = new Map<string, RawDeclaration[]>();
  private readonly candidates = new Set<string>();
  private readonly selected = new Map<string, RawDeclaration>();
  private readonly resolved = new Map<string, SchemaDefinition | null>();
  private readonly inProgress: string[] = [];
  private readonly cyclic = new Set<string>();

  constructor(
    files: readonly FileDeclarations[],
    private readonly reservedNames: ReadonlySet<string>
  ) {
    this.sortedFiles = [...files].sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));
  }

  build(): RegistryBuildResult {
    for (const file of this.sortedFiles) {
      for (const declaration of file.declarations) {
        const existing = this.declarationsByName.get(declaration.name) ?? [];
        existing.push(declaration);
        this.declarationsByName.set(declaration.name, existing);
      }
    }

    this.findCandidates();
    this.selectDeclarations();

    for (const name of this.selected.keys()) {
      const schema = this.resolve(name);
      if (schema) {
        this.registry.register(schema);
      }
    }

    this.registerFactories();
    this.registry.freeze();

    return { registry: this.registry, diagnostics: this.diagnostics };
  }

  /**
   * Greatest fixed point of "could be a schema": start from every
   * declaration and drop names whose dependencies are neither schema roots
   * nor candidates. Cyclic declarations survive here so that the resolver
   * can report them.
   */
  private findCandidates(): void {
    for (const name of this.declarationsByName.keys()) {
      this.candidates.add(name);
    }

    let changed = true;
    while (changed) {
      changed = false;
      for (const name of [...this.candidates]) {
        const declarations = this.declarationsByName.get(name) ?? [];
        if (!declarations.some((declaration) => this.qualifies(declaration))) {
          this.candidates.delete(name);
          changed = true;
        }
      }
    }
  }

  private qualifies(declaration: RawDeclaration): boolean {
    switch (declaration.kind) {
      case "class":
        return declaration.bases.some((base) => SCHEMA_ROOT_NAMES.has(base) || this.candidates.has(base));
      case "add":
        return declaration.operands.every((operand) => this.candidates.has(operand));
      case "select":
      case "drop":
        return this.candidates.has(declaration.source);
    }
  }

  /**
   * Picks the single qualifying declaration of every candidate name. Names
   * with several are reported and resolve to nothing.
   */
  private selectDeclarations(): void {
    for (const name of this.candidates) {
      const declarations = (this.declarationsByName.get(name) ?? []).filter((declaration) =>
        this.qualifies(declaration)
      );
      const [first, ...rest] = declarations;
      if (!first) continue;

      if (rest.length === 0) {
        this.selected.set(name, first);
        continue;
      }

      this.resolved.set(name, null);
      for (const duplicate of rest) {
        this.diagnostics.push(
          createDiagnostic(
            duplicate.location,
            "warning",
            "DuplicateSchema",
            `Schema '${name}' is declared more than once (first at ${formatLocation(first.location)}); accesses bound to it are not checked`
          )
        );
      }
    }
  }

  private resolve(name: string): SchemaDefinition | null {
    const known = this.resolved.get(name);
    if (known !== undefined) {
      return known;
    }

    const declaration = this.selected.get(name);
    if (!declaration) {
      return null;
    }

    const cycleStart = this.inProgress.indexOf(name);
    if (cycleStart >= 0) {
      const cycle = [...this.inProgress.slice(cycleStart), name];
      for (const member of cycle) {
        this.cyclic.add(member);
      }
      this.diagnostics.push(
        createDiagnostic(
          declaration.location,
          "error",
          "SchemaConflictError",
          `Schema composition is cyclic: ${cycle.join(" -> ")}`
        )
      );
      return null;
    }

    this.inProgress.push(name);
    let schema = this.resolveDeclaration(declaration);
    this.inProgress.pop();

    if (this.cyclic.has(name)) {
      schema = null;
    }
    this.resolved.set(name, schema);
    return schema;
  }

  private resolveDeclaration(declaration: RawDeclaration): SchemaDefinition | null {
    switch (declaration.kind) {
      case "class":
        return this.resolveClass(declaration);
      case "add":
        return this.resolveAdd(declaration);
      case "select":
      case "drop":
        return this.resolveSubset(declaration);
    }
  }

  private reportConflict(error: SchemaConflictError, location: SourceLocation): null {
    this.diagnostics.push(diagnosticFromError(error, "SchemaConflictError", location));
    return null;
  }

  // ---------------------------------------------------------------------------
  // Classes
  // ---------------------------------------------------------------------------

  private resolveClass(declaration: ClassDeclaration): SchemaDefinition | null {
    const bases: SchemaDefinition[] = [];
    for (const baseName of declaration.bases) {
      if (SCHEMA_ROOT_NAMES.has(baseName) || !this.candidates.has(baseName)) continue;
      const base = this.resolve(baseName);
      if (!base) return null;
      bases.push(base);
    }

    const shape = { name: declaration.name, declaredAt: declaration.location, origin: "class" as const };
    const inherited = composeSchemas(bases, shape);
    if (!inherited.ok) {
      return this.reportConflict(inherited.error, declaration.location);
    }

    const ownColumns: ColumnDefinition[] = [];
    const ownGroups = new Map<string, string[]>();
    let deferred = inherited.value.deferred;

    for (const member of declaration.members) {
      switch (member.kind) {
        case "group":
          ownGroups.set(member.name, member.members);
          break;
        case "column": {
          const lookupKey = member.alias ?? member.name;
          deferred = deferred || member.aliasDeferred;
          ownColumns.push({
            name: member.name,
            lookupKey,
            valueType: member.valueType,
            membership: { kind: "exact", name: lookupKey },
            nullable: member.nullable,
            kind: "column",
            description: member.description,
          });
          this.checkReserved(declaration.name, member.name, lookupKey, member.location);
          break;
        }
        case "column-set": {
          const patterns = member.patterns;
          if (member.deferred || (patterns !== null && !patterns.every(isValidPattern))) {
            deferred = true;
          }
          ownColumns.push({
            name: member.name,
            lookupKey: member.name,
            valueType: member.valueType,
            membership:
              patterns !== null ? { kind: "regex", patterns } : { kind: "members", names: member.members },
            nullable: member.nullable,
            kind: "column-set",
            description: member.description,
          });
          break;
        }
      }
    }

    const columns = overrideColumns(inherited.value.columns, ownColumns);
    const conflictKey = findKeyConflict(columns);
    if (conflictKey !== null) {
      this.diagnostics.push(
        createDiagnostic(
          declaration.location,
          "error",
          "SchemaConflictError",
          `Column '${conflictKey}' is declared more than once in ${declaration.name} with different types`
        )
      );
      return null;
    }

    return {
      name: declaration.name,
      declaredAt: declaration.location,
      columns,
      groups: mergeGroups([inherited.value.groups, ownGroups]),
      allowExtraColumns: declaration.allowExtraColumns ?? inherited.value.allowExtraColumns,
      deferred,
      origin: "class",
    };
  }

  private checkReserved(schemaName: string, name: string, lookupKey: string, location: SourceLocation): void {
    if (!this.reservedNames.has(lookupKey)) return;
    this.diagnostics.push(
      createDiagnostic(
        location,
        "warning",
        "ReservedColumnName",
        `Column '${name}' in ${schemaName} shadows the DataFrame member '${lookupKey}'; use subscript access for it`
      )
    );
  }

  // ---------------------------------------------------------------------------
  // Module-level composition
  // ---------------------------------------------------------------------------

  private resolveAdd(declaration: AddDeclaration): SchemaDefinition | null {
    const operands: SchemaDefinition[] = [];
    for (const operandName of declaration.operands) {
      const operand = this.resolve(operandName);
      if (!operand) return null;
      operands.push(operand);
    }

    const composed = composeSchemas(operands, {
      name: declaration.name,
      declaredAt: declaration.location,
      origin: "add",
    });
    return composed.ok ? composed.value : this.reportConflict(composed.error, declaration.location);
  }

  private resolveSubset(declaration: SubsetDeclaration): SchemaDefinition | null {
    const source = this.resolve(declaration.source);
    if (!source) return null;

    const names = declaration.entries.map((entry) => entry.name);
    const shape = { name: declaration.name, declaredAt: declaration.location, origin: declaration.kind };
    const result = declaration.kind === "select" ? selectColumns(source, names, shape) : dropColumns(source, names, shape);

    if (result.missing.length === 0) {
      return result.schema;
    }

    for (const entry of declaration.entries) {
      if (!result.missing.includes(entry.name)) continue;
      this.diagnostics.push(
        createDiagnostic(
          entry.location,
          "error",
          "SchemaConflictError",
          `Column '${entry.name}' is not declared in ${source.name}`
        )
      );
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Factories
  // ---------------------------------------------------------------------------

  /**
   * Registers module-level functions annotated to return a schema. A
   * function name defined in more than one file is ambiguous and skipped.
   */
  private registerFactories(): void {
    const filesByFunction = new Map<string, Set<string>>();
    const schemaByFunction = new Map<string, string>();

    for (const file of this.sortedFiles) {
      for (const factory of file.factories) {
        const files = filesByFunction.get(factory.functionName) ?? new Set<string>();
        files.add(file.file);
        filesByFunction.set(factory.functionName, files);
        schemaByFunction.set(factory.functionName, factory.schemaName);
      }
    }

    for (const [functionName, files] of filesByFunction) {
      const schemaName = schemaByFunction.get(functionName);
      if (files.size === 1 && schemaName !== undefined) {
        this.registry.registerFactory(functionName, schemaName);
      }
    }
  }
}
