import { SELECTED_ALTERNATIVE } from "./responsePath.js";
import type { ResponseValue } from "./responseValue.js";
import type { JsonSchema } from "./sessionTypes.js";
import type { ListElementType, Question, Schema } from "./surveyTypes.js";

const DRAFT_07 = "http://json-schema.org/draft-07/schema#";

/**
 * Render a question schema as a JSON Schema document describing the nested
 * object the answers make up. Read-only view; nothing is derived from it.
 */
export function toJsonSchema(schema: Schema, options: { id?: string } = {}): JsonSchema {
  const [first] = schema.questions;
  const rootEnum = schema.questions.length === 1 && first?.path.isRoot ? first : undefined;
  const body = rootEnum ? questionSchema(rootEnum) : objectSchema(schema.questions);

  const document: JsonSchema = { $schema: DRAFT_07, ...body };
  if (options.id !== undefined) document.$id = options.id;
  if (schema.prelude !== undefined) document.description = schema.prelude;
  if (schema.epilogue !== undefined) document.$comment = schema.epilogue;
  return document;
}

function objectSchema(questions: Question[]): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];
  for (const question of questions) {
    const name = question.path.last;
    if (name === undefined) continue;
    properties[name] = questionSchema(question);
    if (!question.optional) required.push(name);
  }
  const object: JsonSchema = { type: "object", properties, additionalProperties: false };
  if (required.length > 0) object.required = required;
  return object;
}

function questionSchema(question: Question): JsonSchema {
  const node: JsonSchema = { title: question.prompt, ...kindSchema(question) };
  const preset = question.default;
  if (preset.type === "suggested") node.default = jsonValue(question, preset.value);
  if (preset.type === "assumed") node.const = jsonValue(question, preset.value);
  return node;
}

function kindSchema(question: Question): JsonSchema {
  const kind = question.kind;
  switch (kind.type) {
    case "unit":
      return { type: "object", properties: {}, additionalProperties: false };
    case "input":
      return { type: "string" };
    case "multiline":
      return { type: "string", contentMediaType: "text/plain" };
    case "masked":
      return { type: "string", writeOnly: true };
    case "int":
      return withBounds({ type: "integer" }, kind);
    case "float":
      return withBounds({ type: "number" }, kind);
    case "confirm":
      return { type: "boolean" };
    case "list":
      return { type: "array", items: withBounds({ type: elementType(kind.element) }, kind) };
    case "allOf":
      return objectSchema(kind.questions);
    case "anyOf":
      return {
        type: "array",
        uniqueItems: true,
        items: { type: "string", enum: kind.options.map((option) => option.prompt) },
      };
    case "oneOf":
      return { oneOf: kind.variants.map((variant, index) => variantSchema(variant, index)) };
  }
}

/** Variant object: the selection index plus the variant's own fields. */
function variantSchema(variant: Question, index: number): JsonSchema {
  const fields = variant.kind.type === "allOf" ? objectSchema(variant.kind.questions) : objectSchema([]);
  const properties = { [SELECTED_ALTERNATIVE]: { const: index }, ...fields.properties };
  return {
    ...fields,
    title: variant.prompt,
    properties,
    required: [SELECTED_ALTERNATIVE, ...(fields.required ?? [])],
  };
}

function withBounds(node: JsonSchema, bounds: { min?: number; max?: number }): JsonSchema {
  if (bounds.min !== undefined) node.minimum = bounds.min;
  if (bounds.max !== undefined) node.maximum = bounds.max;
  return node;
}

function elementType(element: ListElementType): string {
  switch (element) {
    case "string":
      return "string";
    case "int":
      return "integer";
    case "float":
      return "number";
  }
}

/** A default as it appears in the rendered document. */
function jsonValue(question: Question, value: ResponseValue): unknown {
  const kind = question.kind;
  if (kind.type === "anyOf" && value.type === "chosenVariants") {
    return value.value.flatMap((index) => kind.options[index]?.prompt ?? []);
  }
  if (kind.type === "oneOf" && value.type === "chosenVariant") {
    return { [SELECTED_ALTERNATIVE]: value.value };
  }
  return Array.isArray(value.value) ? [...value.value] : value.value;
}
