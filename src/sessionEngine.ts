import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { AnswerStore } from "./answerStore.js";
import { deriveSchema } from "./deriveSchema.js";
import { SessionError, ValidationFailedError } from "./errors.js";
import { activeQuestions, findQuestion, questionForValuePath, resolvePath, valuePathOf } from "./questions.js";
import { reconstruct } from "./reconstruct.js";
import type { ResponsePath } from "./responsePath.js";
import { type ResponseValue, values } from "./responseValue.js";
import type { AnswerFieldState, SurveyDefinition, SurveySession } from "./sessionTypes.js";
import type { Question, QuestionKind, Schema } from "./surveyTypes.js";
import { validateAll, validateField } from "./validation.js";

export class InMemorySessionStore {
  private surveys = new Map<string, SurveyDefinition>();
  private sessions = new Map<string, SurveySession>();

  registerSurvey(def: SurveyDefinition): void {
    deriveSchema(def.shape);
    this.surveys.set(def.id, def);
  }

  listSurveys(): SurveyDefinition[] {
    return [...this.surveys.values()];
  }

  getSurvey(id: string): SurveyDefinition | undefined {
    return this.surveys.get(id);
  }

  createSession(surveyId: string, userId?: string): SurveySession {
    const definition = this.surveys.get(surveyId);
    if (!definition) throw new SessionError(`Survey not found: ${surveyId}`, { surveyId });

    const schema = deriveSchema(definition.shape);
    const responses = new AnswerStore();
    const session: SurveySession = {
      sessionId: uuidv4(),
      surveyId,
      definition,
      schema,
      responses,
      fields: {},
      status: "not-started",
      overallValidity: "unknown",
      questionOrder: deriveQuestionOrder(schema, responses),
      currentQuestionIndex: 0,
    };
    if (userId !== undefined) session.userId = userId;

    this.sessions.set(session.sessionId, session);
    return session;
  }

  getSession(sessionId: string): SurveySession | undefined {
    return this.sessions.get(sessionId);
  }

  /** Like `getSession`, but a missing session is an error. */
  requireSession(sessionId: string): SurveySession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionError(`Session not found: ${sessionId}`, { sessionId });
    return session;
  }

  listSessions(filter?: { userId?: string }): SurveySession[] {
    const all = [...this.sessions.values()];
    if (!filter?.userId) return all;
    return all.filter((s) => s.userId === filter.userId);
  }
}

/** Dotted value paths of the questions to present, given the answers so far. */
export function deriveQuestionOrder(schema: Schema, responses: AnswerStore): string[] {
  const paths: string[] = [];
  for (const question of activeQuestions(schema, responses)) {
    const path = valuePathOf(question);
    if (path) paths.push(path.toString());
  }
  return paths;
}

/**
 * Offer a JSON value for the question at `path`. The value is coerced by the
 * question kind and checked by the field validators; only an accepted value
 * reaches the session's answers. The field state records either outcome.
 */
export function setAnswer(session: SurveySession, path: string, raw: unknown): AnswerFieldState {
  assertOpen(session);
  const { question, valuePath } = locateQuestion(session, path);
  const key = valuePath.toString();
  const existing = session.fields[key];

  const coerced = coerceAnswer(question.kind, raw);
  const result = coerced.success
    ? validateField(session.definition.shape, valuePath, coerced.value, session.responses)
    : coerced.error;
  const updated: AnswerFieldState = {
    path: key,
    value: coerced.success ? coerced.value : existing?.value,
    valid: result === true,
    messages: result === true ? [] : [result],
    touched: true,
  };
  session.fields[key] = updated;
  if (coerced.success && result === true) session.responses.set(valuePath, coerced.value);
  if (session.status === "not-started") session.status = "in-progress";

  refreshQuestionOrder(session);
  return updated;
}

export function moveToNextQuestion(session: SurveySession): void {
  if (session.currentQuestionIndex < session.questionOrder.length - 1) {
    session.currentQuestionIndex += 1;
  }
}

export function moveToPreviousQuestion(session: SurveySession): void {
  if (session.currentQuestionIndex > 0) {
    session.currentQuestionIndex -= 1;
  }
}

export function getCurrentQuestionPath(session: SurveySession): string | null {
  return session.questionOrder[session.currentQuestionIndex] ?? null;
}

/** The question a dotted value path belongs to, for presenting it. */
export function describeQuestion(session: SurveySession, path: string): Question | undefined {
  const resolved = resolvePath(session.schema, path);
  if (!resolved) return undefined;
  return questionForValuePath(session.schema, resolved) ?? findQuestion(session.schema, resolved);
}

/** Check every answer of the active branch and refresh the field states. */
export function runValidation(session: SurveySession): Record<string, string> {
  const errors = validateAll(session.definition.shape, session.responses);

  for (const path of new Set([...session.questionOrder, ...Object.keys(errors)])) {
    const resolved = resolvePath(session.schema, path);
    const existing = session.fields[path] ?? {
      path,
      value: resolved ? session.responses.get(resolved) : undefined,
      valid: true,
      messages: [],
      touched: false,
    };
    const message = errors[path];
    session.fields[path] = {
      ...existing,
      valid: message === undefined,
      messages: message === undefined ? [] : [message],
    };
  }

  const valid = Object.keys(errors).length === 0;
  session.overallValidity = valid ? "valid" : "invalid";
  if (session.status !== "submitted") session.status = valid ? "complete" : "in-progress";
  return errors;
}

/** Validate, then build the survey's value. The session is closed afterwards. */
export function submitSession(session: SurveySession): unknown {
  assertOpen(session);
  const errors = runValidation(session);
  if (Object.keys(errors).length > 0) throw new ValidationFailedError(errors);
  session.result = reconstruct(session.definition.shape, session.responses);
  session.status = "submitted";
  return session.result;
}

function assertOpen(session: SurveySession): void {
  if (session.status === "submitted") {
    throw new SessionError(`Session ${session.sessionId} has already been submitted`, {
      sessionId: session.sessionId,
    });
  }
}

/** An enum question may be addressed by its own path or by its selection path. */
function locateQuestion(session: SurveySession, path: string): { question: Question; valuePath: ResponsePath } {
  const resolved = resolvePath(session.schema, path);
  const question = resolved
    ? (questionForValuePath(session.schema, resolved) ?? findQuestion(session.schema, resolved))
    : undefined;
  const valuePath = question ? valuePathOf(question) : undefined;
  if (!question || !valuePath) {
    throw new SessionError(`No question takes an answer at '${path}'`, { path });
  }
  return { question, valuePath };
}

/** Keeps the cursor on the same question when branches open or close. */
function refreshQuestionOrder(session: SurveySession): void {
  const current = getCurrentQuestionPath(session);
  session.questionOrder = deriveQuestionOrder(session.schema, session.responses);
  const index = current === null ? -1 : session.questionOrder.indexOf(current);
  session.currentQuestionIndex = Math.max(0, Math.min(index, session.questionOrder.length - 1));
}

// ---------------------------------------------------------------------------
// JSON → response value coercion
// ---------------------------------------------------------------------------

type Coerced = { success: true; value: ResponseValue } | { success: false; error: string };

const variantChoice = z.union([z.number().int().nonnegative(), z.string().min(1)]);

/** Accepts a variant index or a variant label. */
function variantIndex(options: Question[], choice: z.infer<typeof variantChoice>): number | undefined {
  if (typeof choice === "number") return choice < options.length ? choice : undefined;
  const index = options.findIndex((option) => option.prompt === choice);
  return index < 0 ? undefined : index;
}

export function coerceAnswer(kind: QuestionKind, raw: unknown): Coerced {
  const parse = <T>(schema: z.ZodType<T>, build: (value: T) => ResponseValue): Coerced => {
    const result = schema.safeParse(raw);
    if (!result.success) {
      return { success: false, error: result.error.issues.map((issue) => issue.message).join("; ") };
    }
    return { success: true, value: build(result.data) };
  };

  switch (kind.type) {
    case "input":
    case "multiline":
    case "masked":
      return parse(z.string(), values.string);
    case "int":
      return parse(z.number().int().safe(), values.int);
    case "float":
      return parse(z.number().finite(), values.float);
    case "confirm":
      return parse(z.boolean(), values.bool);
    case "list":
      switch (kind.element) {
        case "string":
          return parse(z.array(z.string()), values.stringList);
        case "int":
          return parse(z.array(z.number().int().safe()), values.intList);
        case "float":
          return parse(z.array(z.number().finite()), values.floatList);
      }
      break;
    case "oneOf": {
      const variants = kind.variants;
      const result = variantChoice.safeParse(raw);
      const index = result.success ? variantIndex(variants, result.data) : undefined;
      if (index === undefined) return { success: false, error: `Expected one of: ${labels(variants)}` };
      return { success: true, value: values.chosenVariant(index) };
    }
    case "anyOf": {
      const options = kind.options;
      const result = z.array(variantChoice).safeParse(raw);
      const indices = result.success ? result.data.map((choice) => variantIndex(options, choice)) : [undefined];
      const chosen = indices.filter((index): index is number => index !== undefined);
      if (chosen.length !== indices.length) return { success: false, error: `Expected a list of: ${labels(options)}` };
      return { success: true, value: values.chosenVariants(chosen) };
    }
  }
  return { success: false, error: `Question of kind ${kind.type} takes no answer` };
}

function labels(options: Question[]): string {
  return options.map((option) => option.prompt).join(", ");
}
