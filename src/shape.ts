import { positionalSegment } from "./responsePath.js";
import type {
  CompositeValidator,
  EnumShape,
  FieldDecl,
  FieldMap,
  FieldType,
  FieldValidator,
  ListType,
  Shape,
  StructShape,
  VariantDecl,
  VariantMap,
} from "./surveyTypes.js";

export type StructOptions = {
  prelude?: string;
  epilogue?: string;
  /** Applied to every numeric field of the struct, after the field's own validator. */
  validateFields?: FieldValidator;
  /** Cross-field check run once every field is valid. */
  validate?: CompositeValidator;
};

/**
 * Declare a struct shape.
 *
 * ```ts
 * const Person = struct("Person", {
 *   name: { type: "string", ask: "Name:" },
 *   age: { type: "int", ask: "Age:", min: 18, max: 120 },
 * });
 * type Person = Infer<typeof Person>; // { name: string; age: number }
 * ```
 */
export function struct<const F extends FieldMap>(
  name: string,
  fields: F,
  options: StructOptions = {},
): StructShape<F> {
  return { kind: "struct", name, fields, ...options };
}

/**
 * Declare an enum shape. Variant order is declaration order and fixes the
 * variant indices.
 */
export function enumeration<const V extends VariantMap>(name: string, variants: V): EnumShape<V> {
  return { kind: "enum", name, variants };
}

export function list<const E extends FieldType>(element: E): ListType<E> {
  return { kind: "list", element };
}

export function isShape(type: FieldType): type is Shape {
  return typeof type === "object" && (type.kind === "struct" || type.kind === "enum");
}

export function isList(type: FieldType): type is ListType {
  return typeof type === "object" && type.kind === "list";
}

/** Variant declarations in index order. */
export function variantEntries(shape: EnumShape): [string, VariantDecl][] {
  return Object.entries(shape.variants);
}

/** Fields of a variant as `[segment, decl]` pairs; positional fields become `field_N`. */
export function variantFieldEntries(variant: VariantDecl): [string, FieldDecl][] {
  const fields = variant.fields;
  if (fields === undefined) return [];
  if (isPositional(fields)) return fields.map((decl, i) => [positionalSegment(i), decl]);
  return Object.entries(fields);
}

export function isPositional(fields: VariantDecl["fields"]): fields is readonly FieldDecl[] {
  return Array.isArray(fields);
}

export function describeType(type: FieldType): string {
  if (typeof type === "string") return type;
  if (type.kind === "list") return `list<${describeType(type.element)}>`;
  return `${type.kind} ${type.name}`;
}
