/**
 * Frame Type Annotations
 *
 * Recognizes DataFrame annotations that name a schema:
 * `PandasFrame[S]`, `DataFrame[S]`, `Annotated[pd.DataFrame, S]`,
 * optionally wrapped in `Optional[...]` or `| None`.
 *
 * @module
 */

import type { TypeExpr } from "../parser/syntax.js";

/**
 * Generic frame types whose single type argument is the schema
 */
export const FRAME_TYPE_NAMES: ReadonlySet<string> = new Set([
  "PandasFrame",
  "PolarsFrame",
  "DataFrame",
  "LazyFrame",
  "Frame",
]);

/**
 * Base classes that make a class a schema declaration
 */
export const SCHEMA_ROOT_NAMES: ReadonlySet<string> = new Set([
  "BaseSchema",
  "DataFrameModel",
  "SchemaModel",
  "TypedDict",
  "BaseFrame",
]);

/**
 * Removes `None` members from a union, returning the single remaining
 * member and whether `None` was present.
 */
export function unwrapOptional(type: TypeExpr): { type: TypeExpr; nullable: boolean } {
  if (type.kind === "generic" && type.name === "Optional" && type.args.length === 1 && type.args[0]) {
    return { type: type.args[0], nullable: true };
  }

  if (type.kind === "union") {
    const rest = type.members.filter((member) => member.kind !== "none");
    const nullable = rest.length !== type.members.length;
    if (rest.length === 1 && rest[0]) {
      return { type: rest[0], nullable };
    }
    return { type, nullable };
  }

  return { type, nullable: false };
}

/**
 * Schema name carried by a frame annotation, or null.
 */
export function schemaNameFromAnnotation(annotation: TypeExpr): string | null {
  const { type } = unwrapOptional(annotation);
  if (type.kind !== "generic") return null;

  if (FRAME_TYPE_NAMES.has(type.name) && type.args.length === 1) {
    const arg = type.args[0];
    return arg?.kind === "name" ? arg.name : null;
  }

  if (type.name === "Annotated" && type.args.length >= 2) {
    const [base, schema] = type.args;
    const isFrame =
      (base?.kind === "name" && FRAME_TYPE_NAMES.has(base.name)) ||
      (base?.kind === "generic" && FRAME_TYPE_NAMES.has(base.name));
    return isFrame && schema?.kind === "name" ? schema.name : null;
  }

  return null;
}
