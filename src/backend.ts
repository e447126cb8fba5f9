import type { AnswerStore } from "./answerStore.js";
import type { ResponsePath } from "./responsePath.js";
import type { ResponseValue } from "./responseValue.js";
import type { Schema, ValidationResult } from "./surveyTypes.js";

/** Field check a backend runs on each answer before storing it. */
export type AnswerValidator = (
  path: ResponsePath,
  value: ResponseValue,
  responses: AnswerStore,
) => ValidationResult;

/**
 * Presentation collaborator: puts a schema's questions to someone and returns
 * the completed answers.
 *
 * `initial` holds the assumed answers; a backend must not ask those questions
 * again and must return them in its result. An aborted collection rejects;
 * a partial store is never returned.
 */
export interface SurveyBackend {
  collect(schema: Schema, initial: AnswerStore, validate: AnswerValidator): Promise<AnswerStore>;
}
