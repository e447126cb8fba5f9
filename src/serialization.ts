import AjvModule, { type ErrorObject, type SchemaObject } from "ajv";
import { AnswerStore } from "./answerStore.js";
import { SerializationError } from "./errors.js";
import { ResponsePath } from "./responsePath.js";
import { isResponseValue, RESPONSE_VALUE_TYPES, values } from "./responseValue.js";

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });

export const ANSWERS_FORMAT_VERSION = 1;

type SerializedEntry = {
  path: string[];
  value: { type: string; value: unknown };
};

export type SerializedAnswers = {
  version: number;
  answers: SerializedEntry[];
};

const serializedAnswersSchema: SchemaObject = {
  type: "object",
  properties: {
    version: { type: "integer", const: ANSWERS_FORMAT_VERSION },
    answers: {
      type: "array",
      items: {
        type: "object",
        properties: {
          path: { type: "array", items: { type: "string" } },
          value: {
            type: "object",
            properties: {
              type: { type: "string", enum: [...RESPONSE_VALUE_TYPES] },
              value: {},
            },
            required: ["type", "value"],
            additionalProperties: false,
          },
        },
        required: ["path", "value"],
        additionalProperties: false,
      },
    },
  },
  required: ["version", "answers"],
  additionalProperties: false,
};

const validateDocument = ajv.compile<SerializedAnswers>(serializedAnswersSchema);

/**
 * Answer store as a versioned JSON document. Entries keep their insertion order.
 * Throws `SerializationError` for a value JSON cannot carry, such as a NaN float.
 */
export function serializeAnswers(responses: AnswerStore): string {
  const document: SerializedAnswers = {
    version: ANSWERS_FORMAT_VERSION,
    answers: [...responses.entries()].map(([path, value]) => {
      const entry: SerializedEntry = { path: [...path.segments], value: { type: value.type, value: value.value } };
      // JSON has no NaN or Infinity; such a value would come back as null
      if (!isResponseValue(entry.value)) {
        throw new SerializationError(`Answer for '${path.toString()}' does not hold a ${entry.value.type} value`);
      }
      return entry;
    }),
  };
  return JSON.stringify(document);
}

export function deserializeAnswers(json: string): AnswerStore {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new SerializationError(`Answers are not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!validateDocument(parsed)) {
    throw new SerializationError(`Answers document is malformed: ${describeErrors(validateDocument.errors)}`, {
      errors: validateDocument.errors ?? [],
    });
  }

  const responses = new AnswerStore();
  parsed.answers.forEach((entry, index) => {
    const path = ResponsePath.fromSegments(entry.path);
    if (responses.has(path)) {
      throw new SerializationError(`Duplicate answer for '${path.toString()}'`, { index });
    }
    if (!isResponseValue(entry.value)) {
      throw new SerializationError(
        `Answer for '${path.toString()}' does not hold a ${entry.value.type} value`,
        { index },
      );
    }
    const value = entry.value;
    responses.set(path, value.type === "chosenVariants" ? values.chosenVariants(value.value) : value);
  });
  return responses;
}

function describeErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors?.length) return "unknown error";
  return errors.map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`).join("; ");
}
