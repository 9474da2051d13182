import { Type, type SchemaOptions } from "@sinclair/typebox";

/**
 * String enum as a union of literals, so `Value.Check` validates it and
 * `Static` narrows to the literal union.
 */
export function stringEnum<T extends string>(values: readonly T[], options?: SchemaOptions) {
  return Type.Union(
    values.map((value) => Type.Literal(value)),
    options,
  );
}

export function optionalStringEnum<T extends string>(values: readonly T[], options?: SchemaOptions) {
  return Type.Optional(stringEnum(values, options));
}
