import { AnswerStore } from "./answerStore.js";
import type { AnswerValidator, SurveyBackend } from "./backend.js";
import { ValidationFailedError } from "./errors.js";
import { activeQuestions, valuePathOf, walkQuestions } from "./questions.js";
import type { ResponsePath } from "./responsePath.js";
import type { ResponseValue } from "./responseValue.js";
import type { Question, Schema } from "./surveyTypes.js";
import { REQUIRED_MESSAGE } from "./validation.js";

/**
 * Backend that answers from a prepared store instead of asking anyone.
 *
 * Questions are taken in presentation order; a scripted answer wins over a
 * suggested default. The first rejected or missing required answer throws
 * `ValidationFailedError`, since a script cannot be asked again.
 */
export class ScriptedBackend implements SurveyBackend {
  private readonly script: AnswerStore;

  constructor(script: AnswerStore | Record<string, ResponseValue> = {}) {
    this.script = script instanceof AnswerStore ? script : AnswerStore.fromRecord(script);
  }

  async collect(schema: Schema, initial: AnswerStore, validate: AnswerValidator): Promise<AnswerStore> {
    const responses = initial.clone();
    const skipped = this.skippedGroups(schema, responses);
    const asked = new Set<string>();

    // A selection can bring new questions into view, so walk again until one
    // pass asks nothing new.
    let pending = true;
    while (pending) {
      pending = false;
      for (const question of activeQuestions(schema, responses)) {
        const path = valuePathOf(question);
        if (!path || asked.has(path.key())) continue;
        if (skipped.some((group) => group.isPrefixOf(question.path))) continue;
        asked.add(path.key());
        pending = true;
        this.answer(question, path, responses, validate);
        if (question.kind.type === "oneOf" || question.kind.type === "anyOf") break;
      }
    }
    return responses;
  }

  private answer(
    question: Question,
    path: ResponsePath,
    responses: AnswerStore,
    validate: AnswerValidator,
  ): void {
    const value =
      this.script.get(path) ?? (question.default.type === "suggested" ? question.default.value : undefined);
    if (!value) {
      if (question.optional) return;
      throw new ValidationFailedError({ [path.toString()]: REQUIRED_MESSAGE });
    }
    const result = validate(path, value, responses);
    if (result !== true) throw new ValidationFailedError({ [path.toString()]: result });
    responses.set(path, value);
  }

  /** Optional groups with no scripted, pre-filled or default answer are skipped whole. */
  private skippedGroups(schema: Schema, responses: AnswerStore): ResponsePath[] {
    const known = [...this.script.paths(), ...responses.paths()];
    const optionalGroups: ResponsePath[] = [];
    walkQuestions(schema.questions, (question) => {
      if (question.default.type !== "none") known.push(question.path);
      const type = question.kind.type;
      if (question.optional && (type === "allOf" || type === "oneOf")) optionalGroups.push(question.path);
    });
    return optionalGroups.filter((group) => !known.some((path) => group.isPrefixOf(path)));
  }
}
