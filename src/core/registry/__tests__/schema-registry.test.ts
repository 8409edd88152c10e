/**
 * Schema Registry tests
 *
 * @module
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { ErrorCode, InternalFaultError } from "../../errors.js";
import { ParserManager } from "../../parser/parser-manager.js";
import { SchemaRegistry } from "../schema-registry.js";
import { analyze, brief, py } from "../../__tests__/helpers.js";

describe("SchemaRegistry", () => {
  let parser: ParserManager;

  beforeAll(async () => {
    parser = new ParserManager();
    await parser.initialize();
  });

  afterAll(async () => {
    await parser.close();
  });

  describe("lifecycle", () => {
    it("rejects lookups before freezing", () => {
      const registry = new SchemaRegistry();
      expect(() => registry.get("Users")).toThrow(InternalFaultError);
      try {
        registry.list();
      } catch (error) {
        expect(error).toBeInstanceOf(InternalFaultError);
        if (error instanceof InternalFaultError) expect(error.code).toBe(ErrorCode.REGISTRY_NOT_FROZEN);
      }
    });

    it("rejects registrations after freezing", () => {
      const registry = new SchemaRegistry();
      registry.freeze();
      expect(registry.isFrozen).toBe(true);
      expect(() => registry.registerFactory("load", "Users")).toThrow(InternalFaultError);
      expect(registry.size).toBe(0);
    });
  });

  describe("class declarations", () => {
    it("resolves inheritance and overrides by public name", () => {
      const { registry, diagnostics } = analyze(parser, {
        "schemas.py": py`
          class Base(BaseSchema):
              id: int
              created: str

          class Child(Base):
              name: str

          class Retyped(Base):
              created: int
        `,
      });

      expect(diagnostics).toEqual([]);
      expect(registry.get("Child")?.columns.map((column) => column.lookupKey)).toEqual(["id", "created", "name"]);
      expect(registry.get("Retyped")?.columns.map((column) => `${column.name}:${column.valueType.text}`)).toEqual([
        "id:int",
        "created:int",
      ]);
      expect(registry.list().map((schema) => schema.name)).toEqual(["Base", "Child", "Retyped"]);
    });

    it("ignores classes that do not derive from a schema root", () => {
      const { registry } = analyze(parser, {
        "models.py": py`
          class Config(object):
              debug: bool

          class Users(BaseSchema):
              id: int
        `,
      });

      expect(registry.has("Config")).toBe(false);
      expect(registry.has("Users")).toBe(true);
    });

    it("inherits allow_extra_columns unless overridden", () => {
      const { registry } = analyze(parser, {
        "flags.py": py`
          class Open(BaseSchema):
              allow_extra_columns = True
              id: int

          class StillOpen(Open):
              name: str

          class Closed(Open):
              allow_extra_columns = False
        `,
      });

      expect(registry.get("StillOpen")?.allowExtraColumns).toBe(true);
      expect(registry.get("Closed")?.allowExtraColumns).toBe(false);
    });

    it("warns about columns that shadow DataFrame members", () => {
      const { diagnostics, registry } = analyze(parser, {
        "shadow.py": py`
          class Metrics(BaseSchema):
              shape: int
        `,
      });

      expect(diagnostics.map(brief)).toEqual([
        "2:5 ReservedColumnName: Column 'shape' in Metrics shadows the DataFrame member 'shape'; use subscript access for it",
      ]);
      expect(diagnostics[0]?.severity).toBe("warning");
      expect(registry.has("Metrics")).toBe(true);
    });
  });

  describe("composition", () => {
    it("unions operands with shared columns appearing once", () => {
      const { registry, diagnostics } = analyze(parser, {
        "compose.py": py`
          class SchemaA(BaseSchema):
              id: int
              a: str

          class SchemaB(BaseSchema):
              id: int
              b: float

          Combined = SchemaA + SchemaB
        `,
      });

      expect(diagnostics).toEqual([]);
      const combined = registry.get("Combined");
      expect(combined?.origin).toBe("add");
      expect(combined?.columns.map((column) => column.lookupKey)).toEqual(["id", "a", "b"]);
    });

    it("reports conflicting column types whatever the operand order", () => {
      const sources = (expression: string): Record<string, string> => ({
        "conflict.py": py`
          class SchemaA(BaseSchema):
              id: int

          class SchemaB(BaseSchema):
              id: str

          Combined = ${expression}
        `,
      });

      const forward = analyze(parser, sources("SchemaA + SchemaB"));
      const backward = analyze(parser, sources("SchemaB + SchemaA"));

      expect(forward.diagnostics.map(brief)).toEqual([
        "7:1 SchemaConflictError: Column 'id' has conflicting types in Combined: int (SchemaA) vs str (SchemaB)",
      ]);
      expect(backward.diagnostics.map(brief)).toEqual([
        "7:1 SchemaConflictError: Column 'id' has conflicting types in Combined: str (SchemaB) vs int (SchemaA)",
      ]);
      expect(forward.registry.has("Combined")).toBe(false);
      expect(backward.registry.has("Combined")).toBe(false);
    });

    it("reports a composition cycle once and leaves its members unresolved", () => {
      const { registry, diagnostics } = analyze(parser, {
        "cycle.py": py`
          class Leaf(BaseSchema):
              x: int

          Loop1 = Loop2 + Leaf
          Loop2 = Loop1 + Leaf
        `,
      });

      expect(diagnostics.map(brief)).toEqual([
        "4:1 SchemaConflictError: Schema composition is cyclic: Loop1 -> Loop2 -> Loop1",
      ]);
      expect(registry.has("Loop1")).toBe(false);
      expect(registry.has("Loop2")).toBe(false);
      expect(registry.has("Leaf")).toBe(true);
    });

    it("reports unknown select entries at the entry", () => {
      const { registry, diagnostics } = analyze(parser, {
        "subset.py": py`
          class Users(BaseSchema):
              user_id: int
              email: str

          Slim = Users.select(["user_id", "nope"])
          Lean = Users.drop(["email"])
        `,
      });

      expect(diagnostics.map(brief)).toEqual(["5:33 SchemaConflictError: Column 'nope' is not declared in Users"]);
      expect(registry.has("Slim")).toBe(false);
      expect(registry.get("Lean")?.columns.map((column) => column.lookupKey)).toEqual(["user_id"]);
    });

    it("leaves dependents of an unresolved schema unresolved without more diagnostics", () => {
      const { registry, diagnostics } = analyze(parser, {
        "chain.py": py`
          class SchemaA(BaseSchema):
              id: int

          class SchemaB(BaseSchema):
              id: str

          Broken = SchemaA + SchemaB

          class Extended(Broken):
              extra: int
        `,
      });

      expect(diagnostics).toHaveLength(1);
      expect(registry.has("Extended")).toBe(false);
    });
  });

  describe("across files", () => {
    it("sees declarations from every file", () => {
      const { registry } = analyze(parser, {
        "b.py": "Combined = Users + Orders\n",
        "a.py": py`
          class Users(BaseSchema):
              user_id: int

          class Orders(BaseSchema):
              order_id: int
        `,
      });

      expect(registry.get("Combined")?.columns.map((column) => column.lookupKey)).toEqual(["user_id", "order_id"]);
    });

    it("reports duplicate declarations and resolves neither", () => {
      const { registry, diagnostics } = analyze(parser, {
        "b.py": "class Users(BaseSchema):\n    email: str\n",
        "a.py": "class Users(BaseSchema):\n    user_id: int\n",
      });

      expect(diagnostics.map(brief)).toEqual([
        "1:1 DuplicateSchema: Schema 'Users' is declared more than once (first at a.py:1); accesses bound to it are not checked",
      ]);
      expect(diagnostics[0]?.file).toBe("b.py");
      expect(registry.has("Users")).toBe(false);
    });

    it("registers factories defined in exactly one file", () => {
      const { registry } = analyze(parser, {
        "io.py": py`
          class Users(BaseSchema):
              user_id: int

          def load_users() -> Frame[Users]:
              ...
        `,
        "other.py": "def load_users() -> Frame[Users]:\n    ...\n\ndef load_one() -> Frame[Users]:\n    ...\n",
        "single.py": "def load_single() -> Frame[Users]:\n    ...\n",
      });

      expect(registry.factoryReturn("load_users")).toBeUndefined();
      expect(registry.factoryReturn("load_single")?.name).toBe("Users");
      expect(registry.factoryReturn("load_one")?.name).toBe("Users");
    });
  });
});
