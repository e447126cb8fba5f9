import { AnswerStore } from "./answerStore.js";
import { assertWellFormed } from "./deriveSchema.js";
import { InvalidValueError } from "./errors.js";
import { ALTERNATIVES, positionalSegment, ResponsePath, SELECTED_ALTERNATIVE } from "./responsePath.js";
import { type ResponseValue, values } from "./responseValue.js";
import { describeType, isList, isPositional, variantEntries } from "./shape.js";
import type { EnumShape, FieldDecl, FieldMap, FieldType, Infer, Shape } from "./surveyTypes.js";

/**
 * Inverse of `reconstruct`: read an existing value of `shape` into answers.
 * `reconstruct(shape, deconstruct(shape, v))` gives back `v`.
 */
export function deconstruct<S extends Shape>(shape: S, value: Infer<S>): AnswerStore {
  assertWellFormed(shape);
  const responses = new AnswerStore();
  encodeType(shape, value, ResponsePath.root, responses);
  return responses;
}

/** Encode a value of one field declaration rooted at `path`. */
export function encodeField(decl: FieldDecl, value: unknown, path: ResponsePath, into: AnswerStore): void {
  if (value === undefined) {
    if (decl.optional) return;
    throw new InvalidValueError(`Missing value for '${path.toString()}'`, { path: path.toString() });
  }
  const type = decl.type;
  if (isList(type) && decl.multiselect && typeof type.element === "object" && type.element.kind === "enum") {
    encodeMultiselect(type.element, value, path, into);
    return;
  }
  encodeType(type, value, path, into);
}

function encodeType(type: FieldType, value: unknown, path: ResponsePath, into: AnswerStore): void {
  const fail = (): never => {
    throw new InvalidValueError(
      `Value at '${path.toString()}' does not match ${describeType(type)}: ${JSON.stringify(value)}`,
      { path: path.toString() },
    );
  };

  switch (type) {
    case "string":
      if (typeof value !== "string") return fail();
      into.set(path, values.string(value));
      return;
    case "int":
      if (typeof value !== "number" || !Number.isSafeInteger(value)) return fail();
      into.set(path, values.int(value));
      return;
    case "float":
      if (typeof value !== "number") return fail();
      into.set(path, values.float(value));
      return;
    case "bool":
      if (typeof value !== "boolean") return fail();
      into.set(path, values.bool(value));
      return;
  }

  if (isList(type)) {
    if (!Array.isArray(value)) return fail();
    into.set(path, encodeList(type.element, value, fail));
    return;
  }

  if (type.kind === "struct") {
    if (!isRecord(value)) return fail();
    encodeFields(type.fields, value, path, into);
    return;
  }
  encodeEnum(type, value, path, into);
}

function encodeList(element: FieldType, items: unknown[], fail: () => never): ResponseValue {
  switch (element) {
    case "string":
      return values.stringList(items.map((item) => (typeof item === "string" ? item : fail())));
    case "int":
      return values.intList(
        items.map((item) => (typeof item === "number" && Number.isSafeInteger(item) ? item : fail())),
      );
    case "float":
      return values.floatList(items.map((item) => (typeof item === "number" ? item : fail())));
    default:
      return fail();
  }
}

function encodeFields(fields: FieldMap, value: Record<string, unknown>, base: ResponsePath, into: AnswerStore): void {
  for (const [name, decl] of Object.entries(fields)) {
    encodeField(decl, value[name], base.child(name), into);
  }
}

function encodeEnum(shape: EnumShape, value: unknown, path: ResponsePath, into: AnswerStore): void {
  const index = variantIndex(shape, value, path);
  into.set(path.child(SELECTED_ALTERNATIVE), values.chosenVariant(index));
  encodeVariantFields(shape, index, value, path, into);
}

function encodeMultiselect(shape: EnumShape, value: unknown, path: ResponsePath, into: AnswerStore): void {
  if (!Array.isArray(value)) {
    throw new InvalidValueError(`Expected a list of ${shape.name} at '${path.toString()}'`, {
      path: path.toString(),
    });
  }
  const indices = value.map((item) => variantIndex(shape, item, path));
  into.set(path, values.chosenVariants(indices));
  value.forEach((item, i) => encodeVariantFields(shape, indices[i] ?? 0, item, path, into));
}

function encodeVariantFields(
  shape: EnumShape,
  index: number,
  value: unknown,
  path: ResponsePath,
  into: AnswerStore,
): void {
  const entry = variantEntries(shape)[index];
  const fields = entry?.[1].fields;
  if (fields === undefined || !isRecord(value)) return;
  const base = path.child(ALTERNATIVES).child(String(index));
  const payload = value.fields;
  if (isPositional(fields)) {
    if (fields.length === 0) return;
    if (!Array.isArray(payload)) {
      throw new InvalidValueError(`Variant at '${path.toString()}' needs positional fields`, {
        path: path.toString(),
      });
    }
    fields.forEach((decl, i) => encodeField(decl, payload[i], base.child(positionalSegment(i)), into));
    return;
  }
  if (Object.keys(fields).length === 0) return;
  if (!isRecord(payload)) {
    throw new InvalidValueError(`Variant at '${path.toString()}' needs named fields`, {
      path: path.toString(),
    });
  }
  encodeFields(fields, payload, base, into);
}

function variantIndex(shape: EnumShape, value: unknown, path: ResponsePath): number {
  const name = isRecord(value) ? value.variant : undefined;
  const index = variantEntries(shape).findIndex(([variant]) => variant === name);
  if (index < 0) {
    throw new InvalidValueError(
      `Unknown ${shape.name} variant ${JSON.stringify(name)} at '${path.toString()}'`,
      { path: path.toString() },
    );
  }
  return index;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
