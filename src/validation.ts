import type { AnswerStore } from "./answerStore.js";
import { assertWellFormed, deriveSchema } from "./deriveSchema.js";
import { resolvePath } from "./questions.js";
import { ALTERNATIVES, type PathLike, ResponsePath, SELECTED_ALTERNATIVE, toPath } from "./responsePath.js";
import type { ResponseValue, ResponseValueType } from "./responseValue.js";
import { isList, variantEntries, variantFieldEntries } from "./shape.js";
import type {
  EnumShape,
  FieldDecl,
  FieldValidator,
  Shape,
  StructShape,
  ValidationResult,
} from "./surveyTypes.js";

export const REQUIRED_MESSAGE = "This field is required";

/** Validators of one field in the order they run. */
type FieldContext = {
  decl: FieldDecl;
  /** Struct-level validator propagated onto numeric fields. */
  propagated?: FieldValidator;
};

/**
 * Validate one candidate value before it is stored. A dotted `path` is
 * resolved against the derived questions, so a field named `a.b` is reachable.
 *
 * Descends through nested structs and enum variants by stripping the leading
 * segment and re-dispatching to the nested shape. Kind, bounds, the field's own
 * validator and any propagated validator run in that order; the first failure
 * wins.
 */
export function validateField(
  shape: Shape,
  path: PathLike,
  value: ResponseValue,
  responses: AnswerStore,
): ValidationResult {
  assertWellFormed(shape);
  const full = typeof path === "string" ? (resolvePath(deriveSchema(shape), path) ?? toPath(path)) : path;
  return dispatch(shape, full, full, value, responses);
}

function dispatch(
  shape: Shape,
  rest: ResponsePath,
  full: ResponsePath,
  value: ResponseValue,
  responses: AnswerStore,
): ValidationResult {
  return shape.kind === "struct"
    ? dispatchStruct(shape, rest, full, value, responses)
    : dispatchEnum(shape, rest, full, value, responses);
}

function dispatchStruct(
  shape: StructShape,
  rest: ResponsePath,
  full: ResponsePath,
  value: ResponseValue,
  responses: AnswerStore,
): ValidationResult {
  const [name, ...tail] = rest.segments;
  const decl = name !== undefined && Object.hasOwn(shape.fields, name) ? shape.fields[name] : undefined;
  if (name === undefined || !decl) return `Unknown question '${full.toString()}'`;
  const propagated = isNumeric(decl) ? shape.validateFields : undefined;
  return dispatchDecl({ decl, propagated }, ResponsePath.fromSegments(tail), full, value, responses);
}

function dispatchEnum(
  shape: EnumShape,
  rest: ResponsePath,
  full: ResponsePath,
  value: ResponseValue,
  responses: AnswerStore,
): ValidationResult {
  const [head, index, segment, ...tail] = rest.segments;
  const variants = variantEntries(shape);
  if (head === SELECTED_ALTERNATIVE && index === undefined) {
    if (value.type !== "chosenVariant") return mismatch("chosenVariant", value);
    return value.value < variants.length ? true : `Unknown option ${value.value}`;
  }
  if (head === ALTERNATIVES && index !== undefined && segment !== undefined) {
    const variant = variants[Number(index)];
    const field = variant ? variantFieldEntries(variant[1]).find(([name]) => name === segment) : undefined;
    if (field) return dispatchDecl({ decl: field[1] }, ResponsePath.fromSegments(tail), full, value, responses);
  }
  return `Unknown question '${full.toString()}'`;
}

function dispatchDecl(
  context: FieldContext,
  rest: ResponsePath,
  full: ResponsePath,
  value: ResponseValue,
  responses: AnswerStore,
): ValidationResult {
  const { type } = context.decl;
  if (rest.isRoot) return validateLeaf(context, full, value, responses);
  if (typeof type === "object") {
    if (type.kind === "list") {
      // Follow-up questions of a multi-selected variant: `alternatives.<i>.<field>`
      const element = type.element;
      if (typeof element === "object" && element.kind === "enum") {
        return dispatchEnum(element, rest, full, value, responses);
      }
    } else {
      return dispatch(type, rest, full, value, responses);
    }
  }
  return `Unknown question '${full.toString()}'`;
}

function validateLeaf(
  { decl, propagated }: FieldContext,
  path: ResponsePath,
  value: ResponseValue,
  responses: AnswerStore,
): ValidationResult {
  const expected = expectedValueType(decl);
  if (!expected) return `'${path.toString()}' is a group and takes no value of its own`;
  if (value.type !== expected) return mismatch(expected, value);

  const implicit = checkImplicit(decl, value);
  if (implicit !== true) return implicit;
  if (decl.validate) {
    const result = decl.validate(value, responses, path);
    if (result !== true) return result;
  }
  if (propagated) return propagated(value, responses, path);
  return true;
}

/** Bounds and variant ranges, checked ahead of declared validators. */
function checkImplicit(decl: FieldDecl, value: ResponseValue): ValidationResult {
  switch (value.type) {
    case "int":
    case "float":
      return checkBounds(value.value, decl, "Value");
    case "intList":
    case "floatList":
      for (const item of value.value) {
        const result = checkBounds(item, decl, "Each item");
        if (result !== true) return result;
      }
      return true;
    case "chosenVariants": {
      const element = isList(decl.type) ? decl.type.element : undefined;
      const count = typeof element === "object" && element.kind === "enum" ? variantEntries(element).length : 0;
      const unknown = value.value.find((index) => index >= count);
      return unknown === undefined ? true : `Unknown option ${unknown}`;
    }
    default:
      return true;
  }
}

function checkBounds(value: number, decl: FieldDecl, subject: string): ValidationResult {
  if (!Number.isFinite(value)) return `${subject} must be a finite number`;
  if (decl.min !== undefined && value < decl.min) return `${subject} must be at least ${decl.min}`;
  if (decl.max !== undefined && value > decl.max) return `${subject} must be at most ${decl.max}`;
  return true;
}

function mismatch(expected: ResponseValueType, value: ResponseValue): string {
  return `Expected ${expected} but got ${value.type}`;
}

/** Value tag a field's answer must carry, or undefined for groups. */
export function expectedValueType(decl: FieldDecl): ResponseValueType | undefined {
  const { type } = decl;
  if (typeof type === "string") return type;
  if (type.kind !== "list") return undefined;
  const element = type.element;
  if (decl.multiselect) return "chosenVariants";
  switch (element) {
    case "string":
      return "stringList";
    case "int":
      return "intList";
    case "float":
      return "floatList";
    default:
      return undefined;
  }
}

function isNumeric(decl: FieldDecl): boolean {
  return decl.type === "int" || decl.type === "float";
}

/**
 * Validate a complete store: every answered question of the active branch,
 * then missing required answers, then (only when nothing failed) the
 * composite validators. Messages are keyed by dotted path, one per path.
 */
export function validateAll(shape: Shape, responses: AnswerStore): Record<string, string> {
  assertWellFormed(shape);
  const errors: Record<string, string> = {};
  const report = (path: ResponsePath, message: string): void => {
    const key = path.toString();
    if (!(key in errors)) errors[key] = message;
  };
  const composites: { base: ResponsePath; shape: StructShape }[] = [];

  const visitShape = (node: Shape, base: ResponsePath): void => {
    if (node.kind === "struct") {
      if (node.validate) composites.push({ base, shape: node });
      for (const [name, decl] of Object.entries(node.fields)) visitField(decl, base.child(name));
    } else {
      visitEnum(node, base);
    }
  };

  const visitEnum = (node: EnumShape, base: ResponsePath): void => {
    const selectionPath = base.child(SELECTED_ALTERNATIVE);
    const selection = responses.get(selectionPath);
    if (!selection) {
      report(selectionPath, REQUIRED_MESSAGE);
      return;
    }
    const result = validateField(shape, selectionPath, selection, responses);
    if (result !== true) {
      report(selectionPath, result);
      return;
    }
    if (selection.type === "chosenVariant") visitVariant(node, selection.value, base);
  };

  const visitVariant = (node: EnumShape, index: number, base: ResponsePath): void => {
    const variant = variantEntries(node)[index];
    if (!variant) return;
    const variantBase = base.child(ALTERNATIVES).child(String(index));
    for (const [segment, decl] of variantFieldEntries(variant[1])) visitField(decl, variantBase.child(segment));
  };

  const visitField = (decl: FieldDecl, path: ResponsePath): void => {
    const { type } = decl;
    if (typeof type === "object" && type.kind !== "list") {
      if (decl.optional && !responses.paths().some((key) => path.isPrefixOf(key))) return;
      if (type.kind === "struct") visitShape(type, path);
      else visitEnum(type, path);
      return;
    }
    const value = responses.get(path);
    if (!value) {
      if (!decl.optional) report(path, REQUIRED_MESSAGE);
      return;
    }
    const result = validateField(shape, path, value, responses);
    if (result !== true) {
      report(path, result);
      return;
    }
    if (value.type === "chosenVariants" && isList(type) && typeof type.element === "object" && type.element.kind === "enum") {
      for (const index of value.value) visitVariant(type.element, index, path);
    }
  };

  visitShape(shape, ResponsePath.root);
  if (Object.keys(errors).length > 0) return errors;

  for (const { base, shape: node } of composites) {
    const messages = node.validate?.(responses.filterPrefix(base)) ?? {};
    for (const [relative, message] of Object.entries(messages)) {
      report(base.concat(ResponsePath.parse(relative)), message);
    }
  }
  return errors;
}
