/**
 * Binding Resolver tests
 *
 * Drive both phases over inline modules and assert the diagnostics the
 * checker reports through the resolver.
 *
 * @module
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { ParserManager } from "../../parser/parser-manager.js";
import { analyze, brief, py } from "../../__tests__/helpers.js";

const SCHEMAS = py`
  class UserSchema(BaseSchema):
      user_id: int
      email: str
      signup = Column(str, alias="signup_ts")

  class OrderSchema(BaseSchema):
      user_id: int
      total: float

  class Ledger(BaseSchema):
      user_id: str
      amount: float

  class Readings(BaseSchema):
      device: str
      sensors = ColumnSet(type=float, regex=r"sensor_\\d+")

  class Tagged(BaseSchema):
      tags = ColumnSet(type=str, regex=r"(?i)tag_\\d+\\Z")

  class Loose(BaseSchema):
      allow_extra_columns = True
      id: int
`;

describe("BindingResolver", () => {
  let parser: ParserManager;

  beforeAll(async () => {
    parser = new ParserManager();
    await parser.initialize();
  });

  afterAll(async () => {
    await parser.close();
  });

  function check(source: string): string[] {
    const { diagnostics } = analyze(parser, { "schemas.py": SCHEMAS, "etl.py": source });
    return diagnostics.map(brief);
  }

  describe("reads", () => {
    it("reports a misspelled literal column with a suggestion", () => {
      expect(
        check(py`
          def report(df: Frame[UserSchema]) -> None:
              print(df["emai"])
              print(df["email"])
        `)
      ).toEqual(["2:14 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("counts columns in UTF-16 code units", () => {
      expect(
        check(py`
          def report(df: Frame[UserSchema]) -> None:
              print("héllo😀", df["emai"])
        `)
      ).toEqual(["2:25 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("checks attribute and .loc access but skips DataFrame members", () => {
      expect(
        check(py`
          def report(df: Frame[UserSchema]) -> None:
              df.email
              df.emial
              df.shape
              df._private
              df.loc[:, "emial"]
        `)
      ).toEqual([
        "3:8 UnknownColumn: Column 'emial' does not exist in UserSchema -> email",
        "6:15 UnknownColumn: Column 'emial' does not exist in UserSchema -> email",
      ]);
    });

    it("matches column set families by pattern", () => {
      expect(
        check(py`
          def readings(df: Frame[Readings]) -> None:
              df["sensor_12"]
              df["sensor_x"]
        `)
      ).toEqual(["3:8 UnknownColumn: Column 'sensor_x' does not exist in Readings -> sensors"]);
    });

    it("honours end anchors and inline flags in column set patterns", () => {
      expect(
        check(py`
          def tagged(df: Frame[Tagged]) -> None:
              df["tag_1"]
              df["TAG_2"]
              df["tag_3x"]
        `)
      ).toEqual(["4:8 UnknownColumn: Column 'tag_3x' does not exist in Tagged"]);
    });

    it("resolves aliases and schema attribute references", () => {
      expect(
        check(py`
          def load(df: Frame[UserSchema]) -> None:
              df["signup_ts"]
              df["signup"]
              df[UserSchema.signup]
              df[UserSchema.signupp]
        `)
      ).toEqual([
        "3:8 UnknownColumn: Column 'signup' does not exist in UserSchema",
        "5:8 UnknownColumn: Column 'signupp' does not exist in UserSchema -> signup",
      ]);
    });

    it("ignores receivers with no binding", () => {
      expect(
        check(py`
          def untyped(df) -> None:
              df["anything"]

          other = make_frame()
          other["anything"]
        `)
      ).toEqual([]);
    });
  });

  describe("writes", () => {
    it("reports undeclared column assignment once and accepts later reads", () => {
      expect(
        check(py`
          def enrich(df: Frame[OrderSchema]) -> None:
              df["new_col"] = 1
              print(df["new_col"])

          def loose(df: Frame[Loose]) -> None:
              df["new_col"] = 1
        `)
      ).toEqual([
        "2:8 UndeclaredColumnMutation: Column 'new_col' is not declared in OrderSchema; assigning it adds an undeclared column",
      ]);
    });

    it("tracks select, rename, assign and del", () => {
      expect(
        check(py`
          def reshape(users: Frame[UserSchema]) -> None:
              slim = users[["user_id", "email"]]
              slim["signup_ts"]
              renamed = users.rename(columns={"email": "mail"})
              renamed["mail"]
              renamed["email"]
              extra = users.assign(score=1)
              extra["score"]
              del extra["score"]
              extra["score"]
        `)
      ).toEqual([
        "3:10 UnknownColumn: Column 'signup_ts' does not exist in UserSchema",
        "6:13 UnknownColumn: Column 'email' does not exist in UserSchema -> mail",
        "7:26 UndeclaredColumnMutation: Column 'score' is not declared in UserSchema; assigning it adds an undeclared column",
        "10:11 UnknownColumn: Column 'score' does not exist in UserSchema",
      ]);
    });
  });

  describe("control flow", () => {
    it("drops bindings that disagree across branches", () => {
      expect(
        check(py`
          def pick(flag: bool, users: Frame[UserSchema], orders: Frame[OrderSchema]) -> None:
              if flag:
                  df = users
              else:
                  df = orders
              df["anything"]
              same = users
              if flag:
                  same = users.copy()
              same["emai"]
        `)
      ).toEqual(["10:10 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("ignores branches that leave the function", () => {
      expect(
        check(py`
          def guard(raw, users: Frame[UserSchema]) -> None:
              df = users
              if raw is None:
                  df = raw
                  return
              df["emai"]
        `)
      ).toEqual(["6:8 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("reports loop bodies once against their stable head state", () => {
      expect(
        check(py`
          def stable(users: Frame[UserSchema], items) -> None:
              for item in items:
                  users["emai"]
        `)
      ).toEqual(["3:15 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("treats a variable rebound inside a loop as unknown", () => {
      expect(
        check(py`
          def rebind(users: Frame[UserSchema], batches) -> None:
              df = users
              for batch in batches:
                  df["emai"]
                  df = batch
        `)
      ).toEqual([]);
    });

    it("merges the state left at a break into the code after the loop", () => {
      expect(
        check(py`
          def first_order(users: Frame[UserSchema], orders: Frame[OrderSchema], xs) -> None:
              df = users
              for x in xs:
                  if x:
                      df = orders
                      break
              df["total"]
              users["emai"]
        `)
      ).toEqual(["8:11 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("merges the state left at a continue into the loop head", () => {
      expect(
        check(py`
          def skip(users: Frame[UserSchema], orders: Frame[OrderSchema], xs) -> None:
              df = users
              for x in xs:
                  df["total"]
                  if x:
                      df = orders
                      continue
                  users["emai"]
        `)
      ).toEqual(["8:15 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("runs a for-else block only on the path where the loop ran out", () => {
      expect(
        check(py`
          def fallback(users: Frame[UserSchema], orders: Frame[OrderSchema], xs) -> None:
              df = users
              for x in xs:
                  if x:
                      df = orders
                      break
              else:
                  df["emai"]
              df["emai"]
        `)
      ).toEqual(["8:12 UnknownColumn: Column 'emai' does not exist in UserSchema -> email"]);
    });

    it("keeps a binding that the while-else block and every break agree on", () => {
      expect(
        check(py`
          def drain(users: Frame[UserSchema], orders: Frame[OrderSchema], queue) -> None:
              df = users
              while queue:
                  if queue.pop():
                      df = orders
                      break
              else:
                  df = orders
              df["totl"]
        `)
      ).toEqual(["9:8 UnknownColumn: Column 'totl' does not exist in OrderSchema -> total"]);
    });
  });

  describe("composition", () => {
    it("unions merged schemas and reports type conflicts at the call", () => {
      expect(
        check(py`
          def combine(users: Frame[UserSchema], orders: Frame[OrderSchema], ledger: Frame[Ledger]) -> None:
              merged = users.merge(orders, on="user_id")
              merged["total"]
              merged["totl"]
              bad = users.merge(ledger, on="user_id")
              bad["whatever"]
        `)
      ).toEqual([
        "4:12 UnknownColumn: Column 'totl' does not exist in UserSchema + OrderSchema -> total",
        "5:11 SchemaConflictError: Column 'user_id' has conflicting types in UserSchema + Ledger: int (UserSchema) vs str (Ledger)",
      ]);
    });
  });

  describe("factories", () => {
    it("binds the results of factory functions and schema readers", () => {
      expect(
        check(py`
          def load_users(path: str) -> Frame[UserSchema]:
              ...

          df = load_users("users.csv")
          df["emai"]
          raw = UserSchema.read_csv("users.csv")
          raw["user_idd"]
        `)
      ).toEqual([
        "5:4 UnknownColumn: Column 'emai' does not exist in UserSchema -> email",
        "7:5 UnknownColumn: Column 'user_idd' does not exist in UserSchema -> user_id",
      ]);
    });
  });

  it("produces the same diagnostics on every run", () => {
    const source = py`
      def report(df: Frame[UserSchema]) -> None:
          df["emai"]
          df["new_col"] = 0
    `;
    expect(check(source)).toEqual(check(source));
    expect(check(source)).toHaveLength(2);
  });
});
