/**
 * Declaration collection tests
 *
 * @module
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { ParserManager } from "../../parser/parser-manager.js";
import { declarationsOf, py } from "../../__tests__/helpers.js";

describe("collectDeclarations", () => {
  let parser: ParserManager;

  beforeAll(async () => {
    parser = new ParserManager();
    await parser.initialize();
  });

  afterAll(async () => {
    await parser.close();
  });

  it("reads class members of every declaration shape", () => {
    const { declarations } = declarationsOf(
      parser,
      "users.py",
      py`
        from typing import ClassVar, Optional
        from framecheck import BaseSchema, Column, ColumnSet, ColumnGroup

        class Users(BaseSchema):
            allow_extra_columns = True
            user_id: int
            email: Optional[str]
            signup = Column(datetime, alias="signup_ts")
            sensors = ColumnSet(type=float, regex=r"sensor_\\d+")
            tags = ColumnSet(members=["tag_a", "tag_b"])
            contact = ColumnGroup(members=["email", "phone"])
            _cache: int
            kind: ClassVar[str]
      `
    );

    expect(declarations).toHaveLength(1);
    const [users] = declarations;
    expect(users).toMatchObject({
      kind: "class",
      name: "Users",
      bases: ["BaseSchema"],
      allowExtraColumns: true,
      location: { file: "users.py", line: 4, column: 1 },
    });
    if (users?.kind !== "class") return;

    expect(users.members).toMatchObject([
      { kind: "column", name: "user_id", alias: null, valueType: { tag: "int", text: "int" }, nullable: false },
      { kind: "column", name: "email", alias: null, valueType: { tag: "str", text: "str" }, nullable: true },
      { kind: "column", name: "signup", alias: "signup_ts", valueType: { tag: "other", text: "datetime" } },
      { kind: "column-set", name: "sensors", patterns: ["sensor_\\d+"], valueType: { tag: "float", text: "float" } },
      { kind: "column-set", name: "tags", patterns: null, members: ["tag_a", "tag_b"], deferred: false },
      { kind: "group", name: "contact", members: ["email", "phone"] },
    ]);
  });

  it("marks run-time member lists as deferred", () => {
    const { declarations } = declarationsOf(
      parser,
      "late.py",
      py`
        class Late(BaseSchema):
            extras = ColumnSet(members=DefinedLater)
            computed = ColumnSet(members=build_names())
            key = Column(str, alias=DefinedLater)
      `
    );

    const [late] = declarations;
    if (late?.kind !== "class") throw new Error("expected a class declaration");
    expect(late.members).toMatchObject([
      { kind: "column-set", name: "extras", deferred: true },
      { kind: "column-set", name: "computed", deferred: true },
      { kind: "column", name: "key", alias: null, aliasDeferred: true },
    ]);
  });

  it("takes an untyped column's type from its annotation", () => {
    const { declarations } = declarationsOf(
      parser,
      "accounts.py",
      py`
        class Accounts(BaseSchema):
            email: Optional[str] = Column(alias="e")
            score: float = Column(int)
            note = Column(alias="n")
      `
    );

    const [accounts] = declarations;
    if (accounts?.kind !== "class") throw new Error("expected a class declaration");
    expect(accounts.members).toMatchObject([
      { kind: "column", name: "email", alias: "e", valueType: { tag: "str", text: "str" }, nullable: true },
      { kind: "column", name: "score", valueType: { tag: "int", text: "int" } },
      { kind: "column", name: "note", alias: "n", valueType: { tag: "other", text: "Any" } },
    ]);
  });

  it("reads pandera-style Field options", () => {
    const { declarations } = declarationsOf(
      parser,
      "orders.py",
      py`
        class Orders(pa.DataFrameModel):
            order_id: Series[int] = pa.Field(alias="OrderID", nullable=True, description="primary key")
      `
    );

    const [orders] = declarations;
    if (orders?.kind !== "class") throw new Error("expected a class declaration");
    expect(orders.bases).toEqual(["DataFrameModel"]);
    expect(orders.members).toMatchObject([
      {
        kind: "column",
        name: "order_id",
        alias: "OrderID",
        nullable: true,
        description: "primary key",
        valueType: { tag: "int", text: "int" },
      },
    ]);
  });

  it("skips classes without bases", () => {
    const { declarations } = declarationsOf(parser, "plain.py", "class Helper:\n    x: int\n");
    expect(declarations).toEqual([]);
  });

  it("reads module-level composition and subsets", () => {
    const { declarations } = declarationsOf(
      parser,
      "compose.py",
      py`
        Combined = Users + Orders + Payments
        Merged = combine_schemas(Users, Orders)
        Slim = Users.select(["user_id", Users.email])
        Lean = Users.drop(["email"])
        config = load_config()
      `
    );

    expect(declarations).toMatchObject([
      { kind: "add", name: "Combined", operands: ["Users", "Orders", "Payments"] },
      { kind: "add", name: "Merged", operands: ["Users", "Orders"] },
      {
        kind: "select",
        name: "Slim",
        source: "Users",
        entries: [
          { name: "user_id", location: { line: 3, column: 22 } },
          { name: "email", location: { line: 3, column: 33 } },
        ],
      },
      { kind: "drop", name: "Lean", source: "Users", entries: [{ name: "email" }] },
    ]);
  });

  it("records functions annotated to return a frame", () => {
    const { factories } = declarationsOf(
      parser,
      "io.py",
      py`
        def load_users(path: str) -> Frame[Users]:
            return read(path)

        def load_other(path: str) -> "Annotated[pd.DataFrame, Orders]":
            return read(path)

        def helper() -> int:
            return 1
      `
    );

    expect(factories.map((factory) => [factory.functionName, factory.schemaName])).toEqual([
      ["load_users", "Users"],
      ["load_other", "Orders"],
    ]);
  });
});
