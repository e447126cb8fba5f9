import type { AnswerStore } from "./answerStore.js";
import type { ResponseValue } from "./responseValue.js";
import type { Schema, Shape } from "./surveyTypes.js";

export type JsonSchema = {
  $id?: string;
  $schema?: string;
  $comment?: string;
  title?: string;
  description?: string;
  type?: string | string[];
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema | JsonSchema[];
  required?: string[];
  enum?: unknown[];
  oneOf?: JsonSchema[];
  [key: string]: unknown;
};

export type AnswerFieldState = {
  path: string; // dotted question path
  /** Last value offered for the path, accepted or not */
  value: ResponseValue | undefined;
  /** Whether the value passed field validation */
  valid: boolean;
  /** Feedback from coercion and validators */
  messages: string[];
  /** Whether the field has ever been touched/edited */
  touched: boolean;
};

export type SessionStatus = "not-started" | "in-progress" | "complete" | "submitted";

export type SessionValidity = "unknown" | "valid" | "invalid";

export type SurveyDefinition = {
  id: string;
  name: string;
  description?: string;
  shape: Shape;
};

export type SurveySession = {
  sessionId: string;
  userId?: string;
  surveyId: string;
  definition: SurveyDefinition;
  schema: Schema;
  responses: AnswerStore;
  fields: Record<string, AnswerFieldState>;
  status: SessionStatus;
  overallValidity: SessionValidity;
  /**
   * Dotted value paths of the questions still to present, following the
   * variants chosen so far.
   */
  questionOrder: string[];
  currentQuestionIndex: number;
  /** Value built by a successful submit */
  result?: unknown;
};
