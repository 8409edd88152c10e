/**
 * Composition and membership tests
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import type { ColumnDefinition, SchemaDefinition } from "../../../types/index.js";
import { SchemaConflictError } from "../../errors.js";
import {
  composeSchemas,
  dropColumns,
  exactColumn,
  extendSchema,
  renameColumns,
  selectColumns,
  type SchemaShape,
} from "../composition.js";
import { compilePattern, findExactColumn, matchesMembership, schemaAdmits } from "../membership.js";

const at = { file: "schemas.py", line: 1, column: 1 };
const INT = { tag: "int", text: "int" } as const;
const STR = { tag: "str", text: "str" } as const;
const FLOAT = { tag: "float", text: "float" } as const;

function schema(name: string, columns: ColumnDefinition[], overrides: Partial<SchemaDefinition> = {}): SchemaDefinition {
  return {
    name,
    declaredAt: at,
    columns,
    groups: new Map(),
    allowExtraColumns: false,
    deferred: false,
    origin: "class",
    ...overrides,
  };
}

function shape(name: string): SchemaShape {
  return { name, declaredAt: at, origin: "derived" };
}

const sensors: ColumnDefinition = {
  name: "sensors",
  lookupKey: "sensors",
  valueType: FLOAT,
  membership: { kind: "regex", patterns: ["sensor_\\d+"] },
  nullable: false,
  kind: "column-set",
};

const aliased: ColumnDefinition = {
  name: "signup",
  lookupKey: "signup_ts",
  valueType: STR,
  membership: { kind: "exact", name: "signup_ts" },
  nullable: false,
  kind: "column",
};

describe("composeSchemas", () => {
  const users = schema("Users", [exactColumn("id", INT), exactColumn("email", STR)]);
  const orders = schema("Orders", [exactColumn("id", INT), exactColumn("total", FLOAT)], { allowExtraColumns: true });

  it("keeps a shared column once, in first-operand order", () => {
    const result = composeSchemas([users, orders], shape("Users + Orders"));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.columns.map((column) => column.lookupKey)).toEqual(["id", "email", "total"]);
    expect(result.value.allowExtraColumns).toBe(true);
  });

  it("gives the same column set in either order", () => {
    const forward = composeSchemas([users, orders], shape("X"));
    const backward = composeSchemas([orders, users], shape("X"));

    expect(forward.ok && backward.ok).toBe(true);
    if (!forward.ok || !backward.ok) return;
    const keys = (definition: SchemaDefinition): string[] => definition.columns.map((c) => c.lookupKey).sort();
    expect(keys(forward.value)).toEqual(keys(backward.value));
  });

  it("names the smallest conflicting key", () => {
    const left = schema("Left", [exactColumn("zeta", INT), exactColumn("alpha", INT)]);
    const right = schema("Right", [exactColumn("zeta", STR), exactColumn("alpha", STR)]);

    const result = composeSchemas([left, right], shape("Both"));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaConflictError);
    expect(result.error.columnName).toBe("alpha");
    expect(result.error.message).toBe("Column 'alpha' has conflicting types in Both: int (Left) vs str (Right)");
  });
});

describe("subsets", () => {
  const users = schema("Users", [exactColumn("id", INT), aliased, sensors], {
    groups: new Map([["keys", ["id", "signup"]]]),
  });

  it("selects by public name or lookup key and turns set members into exact columns", () => {
    const { schema: selected, missing } = selectColumns(users, ["signup", "sensor_7", "ghost"], shape("Users"));

    expect(missing).toEqual(["ghost"]);
    expect(selected.columns.map((column) => `${column.lookupKey}:${column.kind}`)).toEqual([
      "signup_ts:column",
      "sensor_7:column",
    ]);
    expect(selected.groups.get("keys")).toEqual(["signup"]);
  });

  it("drops columns and reports names that match nothing", () => {
    const { schema: dropped, missing } = dropColumns(users, ["id", "sensor_3", "nope"], shape("Users"));

    expect(missing).toEqual(["nope"]);
    expect(dropped.columns.map((column) => column.name)).toEqual(["signup", "sensors"]);
  });

  it("renames exact columns by lookup key", () => {
    const renamed = renameColumns(users, new Map([["signup_ts", "joined"], ["absent", "x"]]), shape("Users"));

    expect(renamed.columns.map((column) => column.lookupKey)).toEqual(["id", "joined", "sensors"]);
    expect(renamed.groups.get("keys")).toEqual(["id", "joined"]);
  });

  it("extends a schema with one column", () => {
    const extended = extendSchema(users, exactColumn("score"), shape("Users"));
    expect(extended.columns.map((column) => column.lookupKey)).toEqual(["id", "signup_ts", "sensors", "score"]);
    expect(extended.columns[3]?.valueType).toEqual({ tag: "other", text: "Any" });
  });
});

describe("membership", () => {
  const users = schema("Users", [exactColumn("id", INT), aliased, sensors], {
    groups: new Map([["keys", ["id"]]]),
  });

  it("anchors patterns at the start of the name", () => {
    expect(compilePattern("sensor_\\d+")?.test("sensor_42")).toBe(true);
    expect(compilePattern("sensor_\\d+")?.test("my_sensor_42")).toBe(false);
    expect(compilePattern("(?P<kind>temp|hum)_(?P=kind)")?.test("temp_temp")).toBe(true);
    expect(compilePattern("sensor_(")).toBeNull();
  });

  it("translates Python string anchors", () => {
    expect(compilePattern("sensor_\\d+\\Z")?.test("sensor_1")).toBe(true);
    expect(compilePattern("sensor_\\d+\\Z")?.test("sensor_1x")).toBe(false);
    expect(compilePattern("sensor_\\d+\\Z")?.test("sensor_1\n")).toBe(false);
    expect(compilePattern("\\Atemp_\\w+")?.test("temp_a")).toBe(true);
  });

  it("turns leading inline flags into RegExp flags", () => {
    expect(compilePattern("(?i)sensor_\\d+")?.test("SENSOR_7")).toBe(true);
    expect(compilePattern("(?i)sensor_\\d+")?.flags).toBe("i");
    expect(compilePattern("(?s)a.b")?.test("a\nb")).toBe(true);
    expect(compilePattern("(?m)b$")?.test("b\nc")).toBe(true);
    expect(compilePattern("(?m)b")?.test("a\nb")).toBe(false);
    expect(compilePattern("(?x)a b")).toBeNull();
  });

  it("keeps compiled patterns with their own column set", () => {
    expect(compilePattern("sensor_\\d+")).not.toBe(compilePattern("sensor_\\d+"));

    const upper: ColumnDefinition = { ...sensors, membership: { kind: "regex", patterns: ["(?i)sensor_\\d+"] } };
    expect(matchesMembership(sensors, "SENSOR_1")).toBe(false);
    expect(matchesMembership(upper, "SENSOR_1")).toBe(true);
    expect(matchesMembership(sensors, "SENSOR_1")).toBe(false);
  });

  it("reaches aliased columns only through the alias", () => {
    expect(findExactColumn(users, "signup_ts")?.name).toBe("signup");
    expect(findExactColumn(users, "signup")).toBeUndefined();
    expect(schemaAdmits(users, "signup")).toBe(false);
  });

  it("admits lookup keys, set members, set names and groups", () => {
    expect(["id", "signup_ts", "sensor_1", "sensors", "keys"].map((name) => schemaAdmits(users, name))).toEqual([
      true,
      true,
      true,
      true,
      true,
    ]);
    expect(schemaAdmits(users, "sensor_x")).toBe(false);
  });
});
