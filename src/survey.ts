import type { AnswerStore } from "./answerStore.js";
import { SurveyBuilder } from "./builder.js";
import { deconstruct } from "./deconstruct.js";
import { deriveSchema } from "./deriveSchema.js";
import { resolvePath } from "./questions.js";
import { reconstruct, type ReconstructResult, safeReconstruct } from "./reconstruct.js";
import type { PathLike, ResponsePath } from "./responsePath.js";
import type { ResponseValue } from "./responseValue.js";
import type { Infer, Schema, Shape, ValidationResult } from "./surveyTypes.js";
import { validateAll, validateField } from "./validation.js";

/** A shape bound to the operations over it. */
export class Survey<S extends Shape> {
  constructor(readonly shape: S) {
    deriveSchema(shape);
  }

  get name(): string {
    return this.shape.name;
  }

  schema(): Schema {
    return deriveSchema(this.shape);
  }

  reconstruct(responses: AnswerStore): Infer<S> {
    return reconstruct(this.shape, responses);
  }

  safeReconstruct(responses: AnswerStore): ReconstructResult<Infer<S>> {
    return safeReconstruct(this.shape, responses);
  }

  deconstruct(value: Infer<S>): AnswerStore {
    return deconstruct(this.shape, value);
  }

  validateField(path: PathLike, value: ResponseValue, responses: AnswerStore): ValidationResult {
    return validateField(this.shape, path, value, responses);
  }

  validateAll(responses: AnswerStore): Record<string, string> {
    return validateAll(this.shape, responses);
  }

  resolvePath(dotted: string): ResponsePath | undefined {
    return resolvePath(deriveSchema(this.shape), dotted);
  }

  builder(): SurveyBuilder<S> {
    return new SurveyBuilder(this.shape);
  }
}

/** Bind a shape; throws `AuthoringError` right away if it is malformed. */
export function defineSurvey<S extends Shape>(shape: S): Survey<S> {
  return new Survey(shape);
}
