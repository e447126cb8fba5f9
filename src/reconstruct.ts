import { AnswerStore } from "./answerStore.js";
import { assertWellFormed } from "./deriveSchema.js";
import { ReconstructionError, UnknownVariantError } from "./errors.js";
import { childLogger, logger } from "./logger.js";
import { ALTERNATIVES, positionalSegment, ResponsePath, SELECTED_ALTERNATIVE } from "./responsePath.js";
import { values } from "./responseValue.js";
import { isList, isPositional, variantEntries } from "./shape.js";
import type { EnumShape, FieldDecl, FieldMap, Infer, Shape, StructShape } from "./surveyTypes.js";

const log = childLogger(logger, { component: "reconstruct" });

export type ReconstructResult<T> =
  | { success: true; data: T }
  | { success: false; error: ReconstructionError };

/**
 * Build a value of `shape` from `responses`.
 *
 * Read-only: the store is never modified, so repeated calls give equal results.
 * Throws a `ReconstructionError` naming the first path that could not be read.
 */
export function reconstruct<S extends Shape>(shape: S, responses: AnswerStore): Infer<S>;
export function reconstruct(shape: Shape, responses: AnswerStore): unknown {
  assertWellFormed(shape);
  return shape.kind === "struct"
    ? reconstructStruct(shape, responses)
    : reconstructEnum(shape, responses);
}

export function safeReconstruct<S extends Shape>(
  shape: S,
  responses: AnswerStore,
): ReconstructResult<Infer<S>> {
  try {
    return { success: true, data: reconstruct(shape, responses) };
  } catch (err) {
    if (err instanceof ReconstructionError) {
      log.debug({ shape: shape.name, path: err.path.toString(), code: err.code }, "Reconstruction failed");
      return { success: false, error: err };
    }
    throw err;
  }
}

function reconstructStruct(shape: StructShape, responses: AnswerStore): Record<string, unknown> {
  return reconstructFields(shape.fields, responses);
}

function reconstructFields(fields: FieldMap, responses: AnswerStore): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [name, decl] of Object.entries(fields)) {
    const value = reconstructField(decl, responses, ResponsePath.of(name));
    if (value !== undefined) result[name] = value;
  }
  return result;
}

function reconstructField(decl: FieldDecl, responses: AnswerStore, path: ResponsePath): unknown {
  if (decl.optional && !hasAnswersAt(responses, path)) return undefined;

  const { type } = decl;
  switch (type) {
    case "string":
      return responses.getString(path);
    case "int":
      return responses.getInt(path);
    case "float":
      return responses.getFloat(path);
    case "bool":
      return responses.getBool(path);
  }

  if (isList(type)) {
    const element = type.element;
    if (typeof element !== "string") {
      // Only enum lists pass derivation, and only with multiselect
      return element.kind === "enum" ? reconstructMultiselect(element, responses, path) : undefined;
    }
    switch (element) {
      case "string":
        return [...responses.getStringList(path)];
      case "int":
        return [...responses.getIntList(path)];
      default:
        return [...responses.getFloatList(path)];
    }
  }

  const scoped = responses.filterPrefix(path);
  return type.kind === "struct" ? reconstructStruct(type, scoped) : reconstructEnum(type, scoped);
}

function reconstructEnum(shape: EnumShape, responses: AnswerStore): Record<string, unknown> {
  const variants = variantEntries(shape);
  const index = responses.getChosenVariant(SELECTED_ALTERNATIVE);
  const chosen = variants[index];
  if (!chosen) {
    throw new UnknownVariantError(responses.absolute(SELECTED_ALTERNATIVE), index, variants.length);
  }
  const [variant, decl] = chosen;
  const fields = decl.fields;
  if (fields === undefined) return { variant };

  const scoped = responses.filterPrefix(ResponsePath.of(ALTERNATIVES, String(index)));
  if (isPositional(fields)) {
    if (fields.length === 0) return { variant };
    return {
      variant,
      fields: fields.map((field, i) => reconstructField(field, scoped, ResponsePath.of(positionalSegment(i)))),
    };
  }
  if (Object.keys(fields).length === 0) return { variant };
  return { variant, fields: reconstructFields(fields, scoped) };
}

/**
 * Each selected index becomes one element, assembled by the enum's own
 * single-choice reconstruction over a store holding just that selection and
 * the variant's follow-up answers.
 */
function reconstructMultiselect(shape: EnumShape, responses: AnswerStore, path: ResponsePath): unknown[] {
  const indices = [...new Set(responses.getChosenVariants(path))].sort((a, b) => a - b);
  const variantCount = variantEntries(shape).length;
  const scoped = responses.filterPrefix(path);
  return indices.map((index) => {
    if (index >= variantCount) {
      throw new UnknownVariantError(responses.absolute(path), index, variantCount);
    }
    const followUps = ResponsePath.of(ALTERNATIVES, String(index));
    const selection = new AnswerStore([[SELECTED_ALTERNATIVE, values.chosenVariant(index)]], scoped.origin);
    for (const [key, value] of scoped.entries()) {
      if (followUps.isPrefixOf(key)) selection.set(key, value);
    }
    return reconstructEnum(shape, selection);
  });
}

function hasAnswersAt(responses: AnswerStore, path: ResponsePath): boolean {
  return responses.paths().some((key) => path.isPrefixOf(key));
}
