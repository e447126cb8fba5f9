import type { AnswerStore } from "./answerStore.js";
import { type PathLike, ResponsePath, SELECTED_ALTERNATIVE, toPath } from "./responsePath.js";
import type { Question, Schema } from "./surveyTypes.js";

/** Depth-first, parents before children, in declaration order. */
export function walkQuestions(questions: Question[], visit: (question: Question) => void): void {
  for (const question of questions) {
    visit(question);
    const kind = question.kind;
    if (kind.type === "allOf") walkQuestions(kind.questions, visit);
    else if (kind.type === "oneOf") walkQuestions(kind.variants, visit);
    else if (kind.type === "anyOf") walkQuestions(kind.options, visit);
  }
}

export function findQuestion(schema: Schema, path: PathLike): Question | undefined {
  const target = toPath(path);
  let found: Question | undefined;
  walkQuestions(schema.questions, (question) => {
    if (!found && question.path.equals(target)) found = question;
  });
  return found;
}

/**
 * Resolve a dotted name against the question tree. Derivation rejects schemas
 * where two paths share a spelling, so at most one question matches.
 */
export function resolvePath(schema: Schema, dotted: string): ResponsePath | undefined {
  let found: ResponsePath | undefined;
  walkQuestions(schema.questions, (question) => {
    if (found) return;
    if (question.path.toString() === dotted) found = question.path;
    else if (question.kind.type === "oneOf") {
      const selection = question.path.child(SELECTED_ALTERNATIVE);
      if (selection.toString() === dotted) found = selection;
    }
  });
  return found;
}

/**
 * The question holding the value stored at `path`: the question itself, or for
 * a `selected_alternative` key, the enum question that owns it.
 */
export function questionForValuePath(schema: Schema, path: ResponsePath): Question | undefined {
  if (path.last === SELECTED_ALTERNATIVE) {
    const owner = findQuestion(schema, path.parent());
    if (owner?.kind.type === "oneOf") return owner;
  }
  const question = findQuestion(schema, path);
  return question?.kind.type === "oneOf" ? undefined : question;
}

/** Store path of a question's own answer. Groups (`allOf`, `unit`) have none. */
export function valuePathOf(question: Question): ResponsePath | undefined {
  switch (question.kind.type) {
    case "oneOf":
      return question.path.child(SELECTED_ALTERNATIVE);
    case "allOf":
    case "unit":
      return undefined;
    default:
      return question.path;
  }
}

/**
 * Questions the presentation still has to put to the user, in order: leaves,
 * enum selections and multi-selects. Follows the variants chosen so far in
 * `responses`; assumed questions are left out.
 */
export function activeQuestions(schema: Schema, responses: AnswerStore): Question[] {
  const active: Question[] = [];
  const visit = (questions: Question[]): void => {
    for (const question of questions) {
      const kind = question.kind;
      const assumed = question.default.type === "assumed";
      switch (kind.type) {
        case "allOf":
          visit(kind.questions);
          break;
        case "unit":
          break;
        case "oneOf": {
          if (!assumed) active.push(question);
          const chosen = responses.get(question.path.child(SELECTED_ALTERNATIVE));
          if (chosen?.type === "chosenVariant") {
            const variant = kind.variants[chosen.value];
            if (variant) visit([variant]);
          }
          break;
        }
        case "anyOf": {
          if (!assumed) active.push(question);
          const chosen = responses.get(question.path);
          const options = kind.options;
          if (chosen?.type === "chosenVariants") {
            visit(chosen.value.flatMap((index) => options[index] ?? []));
          }
          break;
        }
        default:
          if (!assumed) active.push(question);
      }
    }
  };
  visit(schema.questions);
  return active;
}
