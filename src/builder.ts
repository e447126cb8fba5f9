import { AnswerStore } from "./answerStore.js";
import type { SurveyBackend } from "./backend.js";
import { deconstruct, encodeField } from "./deconstruct.js";
import { deriveSchema } from "./deriveSchema.js";
import { InvalidValueError, ValidationFailedError } from "./errors.js";
import { childLogger, logger } from "./logger.js";
import { questionForValuePath, resolvePath } from "./questions.js";
import { reconstruct } from "./reconstruct.js";
import { ALTERNATIVES, type PathLike, ResponsePath, SELECTED_ALTERNATIVE } from "./responsePath.js";
import { isResponseValue, type ResponseValue, values } from "./responseValue.js";
import { isList, variantEntries, variantFieldEntries } from "./shape.js";
import type { DefaultValue, EnumShape, FieldDecl, Infer, Question, Schema, Shape } from "./surveyTypes.js";
import { expectedValueType, validateAll, validateField } from "./validation.js";

const log = childLogger(logger, { component: "builder" });

/** What a path of a shape points at. */
type Target =
  | { type: "shape"; shape: Shape }
  | { type: "field"; decl: FieldDecl }
  | { type: "selection"; shape: EnumShape };

/**
 * Collects suggested and assumed answers for one shape before handing its
 * schema to a backend.
 *
 * ```ts
 * const person = await new SurveyBuilder(Person)
 *   .suggest("name", "Ada")
 *   .assume("address.country", "NZ")
 *   .run(backend);
 * ```
 */
export class SurveyBuilder<S extends Shape> {
  private readonly suggestions = new AnswerStore();
  private readonly assumptions = new AnswerStore();

  constructor(private readonly shape: S) {
    deriveSchema(shape);
  }

  /**
   * Pre-fill a question; it is still presented. `value` is a value of the
   * field's own type, or a `ResponseValue` for a single question.
   */
  suggest(path: PathLike, value: unknown): this {
    this.suggestions.merge(this.encode(path, value));
    return this;
  }

  /** Answer a question up front; it is never presented. */
  assume(path: PathLike, value: unknown): this {
    this.assumptions.merge(this.encode(path, value));
    return this;
  }

  /** Suggest every answer of an existing value. */
  withExisting(value: Infer<S>): this {
    this.suggestions.merge(deconstruct(this.shape, value));
    return this;
  }

  withSuggestions(responses: AnswerStore): this {
    this.checkKnown(responses);
    this.suggestions.merge(responses);
    return this;
  }

  withAssumptions(responses: AnswerStore): this {
    this.checkKnown(responses);
    this.assumptions.merge(responses);
    return this;
  }

  /** The derived schema with every default rewritten. Assumptions win over suggestions. */
  schema(): Schema {
    const schema = deriveSchema(this.shape);
    const defaults = new Map<string, DefaultValue>();
    for (const [path, value] of this.suggestions.entries()) {
      defaults.set(this.ownerOf(schema, path).key(), { type: "suggested", value });
    }
    for (const [path, value] of this.assumptions.entries()) {
      defaults.set(this.ownerOf(schema, path).key(), { type: "assumed", value });
    }
    return { ...schema, questions: schema.questions.map((q) => withDefaults(q, defaults)) };
  }

  /**
   * Collect answers through `backend`, check them and build the value.
   * A `ValidationFailedError` here means the backend stored answers it should
   * have rejected.
   */
  async run(backend: SurveyBackend): Promise<Infer<S>> {
    const schema = this.schema();
    const collected = await backend.collect(schema, this.assumptions.clone(), (path, value, responses) =>
      validateField(this.shape, path, value, responses),
    );
    const responses = collected.clone().merge(this.assumptions);
    const errors = validateAll(this.shape, responses);
    if (Object.keys(errors).length > 0) {
      log.debug({ shape: this.shape.name, errors }, "Backend returned invalid answers");
      throw new ValidationFailedError(errors);
    }
    log.debug({ shape: this.shape.name, answers: responses.size }, "Survey collected");
    return reconstruct(this.shape, responses);
  }

  private encode(path: PathLike, value: unknown): AnswerStore {
    const resolved = this.resolve(path);
    const target = locate(this.shape, resolved);
    if (!target) {
      throw new InvalidValueError(`Unknown question '${resolved.toString()}'`, { path: resolved.toString() });
    }
    const encoded = new AnswerStore();
    switch (target.type) {
      case "shape":
        encodeField({ type: target.shape }, value, resolved, encoded);
        break;
      case "selection":
        encoded.set(resolved, selectionValue(target.shape, value, resolved));
        break;
      case "field": {
        const expected = expectedValueType(target.decl);
        if (expected && isResponseValue(value)) {
          if (value.type !== expected) {
            throw new InvalidValueError(
              `Expected ${expected} at '${resolved.toString()}' but got ${value.type}`,
              { path: resolved.toString() },
            );
          }
          encoded.set(resolved, value);
        } else {
          encodeField(target.decl, value, resolved, encoded);
        }
        break;
      }
    }
    return encoded;
  }

  private resolve(path: PathLike): ResponsePath {
    if (typeof path !== "string") return path;
    if (path === "") return ResponsePath.root;
    const resolved = resolvePath(deriveSchema(this.shape), path);
    if (!resolved) throw new InvalidValueError(`Unknown question '${path}'`, { path });
    return resolved;
  }

  private ownerOf(schema: Schema, path: ResponsePath): ResponsePath {
    const question = questionForValuePath(schema, path);
    if (!question) {
      throw new InvalidValueError(`No question answers '${path.toString()}'`, { path: path.toString() });
    }
    return question.path;
  }

  private checkKnown(responses: AnswerStore): void {
    const schema = deriveSchema(this.shape);
    for (const path of responses.paths()) this.ownerOf(schema, path);
  }
}

function withDefaults(question: Question, defaults: Map<string, DefaultValue>): Question {
  const own = defaults.get(question.path.key());
  const kind = question.kind;
  const rewritten: Question = { ...question, default: own ?? question.default };
  switch (kind.type) {
    case "allOf":
      rewritten.kind = { type: "allOf", questions: kind.questions.map((q) => withDefaults(q, defaults)) };
      break;
    case "oneOf":
      rewritten.kind = { type: "oneOf", variants: kind.variants.map((q) => withDefaults(q, defaults)) };
      break;
    case "anyOf":
      rewritten.kind = { type: "anyOf", options: kind.options.map((q) => withDefaults(q, defaults)) };
      break;
  }
  return rewritten;
}

/** Walk `path` down the shape declarations, as derivation laid the questions out. */
function locate(shape: Shape, path: ResponsePath): Target | undefined {
  if (path.isRoot) return { type: "shape", shape };
  const [head, ...rest] = path.segments;
  if (shape.kind === "struct") {
    if (head === undefined || !Object.hasOwn(shape.fields, head)) return undefined;
    const decl = shape.fields[head];
    return decl ? locateIn(decl, ResponsePath.fromSegments(rest)) : undefined;
  }
  return locateVariant(shape, path);
}

function locateIn(decl: FieldDecl, rest: ResponsePath): Target | undefined {
  if (rest.isRoot) return { type: "field", decl };
  const type = decl.type;
  if (typeof type !== "object") return undefined;
  if (isList(type)) {
    const element = type.element;
    return decl.multiselect && typeof element === "object" && element.kind === "enum"
      ? locateVariant(element, rest)
      : undefined;
  }
  return locate(type, rest);
}

function locateVariant(shape: EnumShape, path: ResponsePath): Target | undefined {
  const [head, index, segment, ...rest] = path.segments;
  if (head === SELECTED_ALTERNATIVE && index === undefined) return { type: "selection", shape };
  if (head !== ALTERNATIVES || index === undefined || segment === undefined) return undefined;
  const variant = variantEntries(shape)[Number(index)];
  const field = variant ? variantFieldEntries(variant[1]).find(([name]) => name === segment) : undefined;
  return field ? locateIn(field[1], ResponsePath.fromSegments(rest)) : undefined;
}

/** A variant index, a variant name, or a `chosenVariant` value. */
function selectionValue(shape: EnumShape, value: unknown, path: ResponsePath): ResponseValue {
  const variants = variantEntries(shape);
  if (isResponseValue(value) && value.type === "chosenVariant" && value.value < variants.length) return value;
  if (typeof value === "number" && value < variants.length) return values.chosenVariant(value);
  const index = variants.findIndex(([name]) => name === value);
  if (index >= 0) return values.chosenVariant(index);
  throw new InvalidValueError(`Unknown ${shape.name} variant ${JSON.stringify(value)} at '${path.toString()}'`, {
    path: path.toString(),
  });
}
