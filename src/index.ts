export { AnswerStore } from "./answerStore.js";
export type { AnswerValidator, SurveyBackend } from "./backend.js";
export { SurveyBuilder } from "./builder.js";
export { type ServerConfig, loadConfig } from "./config.js";
export { deconstruct } from "./deconstruct.js";
export { deriveSchema } from "./deriveSchema.js";
export {
  AnswerTypeMismatchError,
  AuthoringError,
  ConfigError,
  InvalidValueError,
  MissingAnswerError,
  ReconstructionError,
  SerializationError,
  SessionError,
  SurveyError,
  UnknownVariantError,
  ValidationFailedError,
} from "./errors.js";
export { toJsonSchema } from "./jsonSchema.js";
export { childLogger, createLogger, logger } from "./logger.js";
export { createServer, run, type SurveyServerOptions } from "./mcpServer.js";
export { activeQuestions, findQuestion, resolvePath, walkQuestions } from "./questions.js";
export { reconstruct, type ReconstructResult, safeReconstruct } from "./reconstruct.js";
export { ResponsePath, type PathLike } from "./responsePath.js";
export { type ResponseValue, type ResponseValueType, values, valuesEqual } from "./responseValue.js";
export { ScriptedBackend } from "./scriptedBackend.js";
export { deserializeAnswers, serializeAnswers } from "./serialization.js";
export { InMemorySessionStore } from "./sessionEngine.js";
export type { JsonSchema, SurveyDefinition, SurveySession } from "./sessionTypes.js";
export { enumeration, list, struct } from "./shape.js";
export { defineSurvey, Survey } from "./survey.js";
export type * from "./surveyTypes.js";
export { validateAll, validateField } from "./validation.js";
