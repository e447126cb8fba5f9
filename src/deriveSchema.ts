import { AuthoringError } from "./errors.js";
import { childLogger, logger } from "./logger.js";
import { ALTERNATIVES, ResponsePath, SELECTED_ALTERNATIVE } from "./responsePath.js";
import { walkQuestions } from "./questions.js";
import { describeType, isList, isShape, variantEntries, variantFieldEntries } from "./shape.js";
import type {
  EnumShape,
  FieldDecl,
  FieldMap,
  Question,
  QuestionKind,
  Schema,
  Shape,
  StructShape,
} from "./surveyTypes.js";

const log = childLogger(logger, { component: "derive-schema" });

const RESERVED_SEGMENTS = new Set([SELECTED_ALTERNATIVE, ALTERNATIVES]);

const derived = new WeakMap<Shape, Schema>();

/**
 * Turn a shape declaration into its question schema.
 *
 * Pure and deterministic; a malformed declaration throws `AuthoringError`
 * before anything is returned. Every call returns a fresh tree.
 */
export function deriveSchema(shape: Shape): Schema {
  const cached = derived.get(shape);
  if (cached) return cloneSchema(cached);

  const questions =
    shape.kind === "struct"
      ? deriveStruct(shape, [])
      : [enumQuestion(shape, ResponsePath.root, shape.name, [])];
  assertDistinctPaths(questions);

  const schema: Schema = { questions };
  if (shape.kind === "struct") {
    if (shape.prelude !== undefined) schema.prelude = shape.prelude;
    if (shape.epilogue !== undefined) schema.epilogue = shape.epilogue;
  }
  derived.set(shape, schema);
  log.debug({ shape: shape.name, questions: questions.length }, "Derived schema");
  return cloneSchema(schema);
}

/** Throw the authoring error of a shape, if it has one. */
export function assertWellFormed(shape: Shape): void {
  if (!derived.has(shape)) deriveSchema(shape);
}

/** Copy of `question` and its descendants with `prefix` prepended to every path. */
export function rerootQuestion(question: Question, prefix: ResponsePath): Question {
  return { ...question, path: prefix.concat(question.path), kind: rerootKind(question.kind, prefix) };
}

function rerootKind(kind: QuestionKind, prefix: ResponsePath): QuestionKind {
  switch (kind.type) {
    case "allOf":
      return { type: "allOf", questions: kind.questions.map((q) => rerootQuestion(q, prefix)) };
    case "oneOf":
      return { type: "oneOf", variants: kind.variants.map((q) => rerootQuestion(q, prefix)) };
    case "anyOf":
      return { type: "anyOf", options: kind.options.map((q) => rerootQuestion(q, prefix)) };
    default:
      return { ...kind };
  }
}

function cloneSchema(schema: Schema): Schema {
  return { ...schema, questions: schema.questions.map((q) => rerootQuestion(q, ResponsePath.root)) };
}

function deriveStruct(shape: StructShape, stack: Shape[]): Question[] {
  enter(shape, stack);
  const questions = deriveFieldMap(shape.name, shape.fields, [...stack, shape]);
  return questions;
}

function deriveFieldMap(owner: string, fields: FieldMap, stack: Shape[]): Question[] {
  return Object.entries(fields).map(([name, decl]) => deriveField(owner, name, decl, stack));
}

/** Variant groups of an enum, rooted at `alternatives.<index>`. */
function deriveVariants(shape: EnumShape, stack: Shape[]): Question[] {
  enter(shape, stack);
  const entries = variantEntries(shape);
  if (entries.length === 0) {
    throw new AuthoringError(`Enum '${shape.name}' has no variants`, { shape: shape.name });
  }
  const inner = [...stack, shape];
  return entries.map(([name, variant], index) => {
    checkName(shape.name, name, "variant");
    const path = ResponsePath.of(ALTERNATIVES, String(index));
    const fields = variantFieldEntries(variant);
    const kind: QuestionKind =
      fields.length === 0
        ? { type: "unit" }
        : {
            type: "allOf",
            questions: fields.map(([segment, decl]) =>
              rerootQuestion(deriveField(`${shape.name}::${name}`, segment, decl, inner), path),
            ),
          };
    return { path, prompt: variant.ask ?? name, kind, default: { type: "none" }, optional: false };
  });
}

function enumQuestion(shape: EnumShape, path: ResponsePath, prompt: string, stack: Shape[]): Question {
  const variants = deriveVariants(shape, stack).map((q) => rerootQuestion(q, path));
  return { path, prompt, kind: { type: "oneOf", variants }, default: { type: "none" }, optional: false };
}

/** One field as a question rooted at its own name. */
function deriveField(owner: string, name: string, decl: FieldDecl, stack: Shape[]): Question {
  checkName(owner, name, "field");
  const context = { shape: owner, field: name, type: describeType(decl.type) };
  const fail = (message: string): never => {
    throw new AuthoringError(`${owner}.${name}: ${message}`, context);
  };

  const prompt = decl.ask;
  if (prompt === undefined || prompt.trim() === "") {
    return fail("missing prompt text (ask)");
  }
  const path = ResponsePath.of(name);
  const question = (kind: QuestionKind): Question => ({
    path,
    prompt,
    kind,
    default: { type: "none" },
    optional: decl.optional === true,
  });

  const { type } = decl;
  const hasBounds = decl.min !== undefined || decl.max !== undefined;
  if (decl.min !== undefined && decl.max !== undefined && decl.min > decl.max) {
    fail(`min (${decl.min}) is greater than max (${decl.max})`);
  }
  if (decl.multiselect && !isList(type)) fail("multiselect requires a list of an enum");

  if (decl.mask !== undefined && decl.mask !== false) {
    if (type !== "string") fail("mask applies to string fields only");
    if (hasBounds) fail("bounds apply to numeric fields only");
    return question(typeof decl.mask === "string" ? { type: "masked", mask: decl.mask } : { type: "masked" });
  }
  if (decl.multiline) {
    if (type !== "string") fail("multiline applies to string fields only");
    if (hasBounds) fail("bounds apply to numeric fields only");
    return question({ type: "multiline" });
  }

  switch (type) {
    case "bool":
      if (hasBounds) fail("bounds apply to numeric fields only");
      return question({ type: "confirm" });
    case "int":
      if ([decl.min, decl.max].some((bound) => bound !== undefined && !Number.isSafeInteger(bound))) {
        fail("integer bounds must be integers");
      }
      return question({ type: "int", ...bounds(decl) });
    case "float":
      return question({ type: "float", ...bounds(decl) });
    case "string":
      if (hasBounds) fail("bounds apply to numeric fields only");
      return question({ type: "input" });
  }

  if (isList(type)) {
    const element = type.element;
    if (decl.multiselect) {
      if (!isShape(element) || element.kind !== "enum") {
        return fail(`multiselect requires a list of an enum, got ${describeType(type)}`);
      }
      if (hasBounds) fail("bounds apply to numeric fields only");
      const options = deriveVariants(element, stack).map((q) => rerootQuestion(q, path));
      return question({ type: "anyOf", options });
    }
    if (element === "string") {
      if (hasBounds) fail("bounds apply to numeric fields only");
      return question({ type: "list", element });
    }
    if (element === "int" || element === "float") {
      return question({ type: "list", element, ...bounds(decl) });
    }
    if (isShape(element) && element.kind === "enum") {
      return fail("a list of an enum needs multiselect");
    }
    return fail(`unsupported list element ${describeType(element)}`);
  }

  if (hasBounds) fail("bounds apply to numeric fields only");
  if (type.kind === "struct") {
    const questions = deriveStruct(type, stack).map((q) => rerootQuestion(q, path));
    return question({ type: "allOf", questions });
  }
  return { ...enumQuestion(type, path, prompt, stack), optional: decl.optional === true };
}

function bounds(decl: FieldDecl): { min?: number; max?: number } {
  const declared: { min?: number; max?: number } = {};
  if (decl.min !== undefined) declared.min = decl.min;
  if (decl.max !== undefined) declared.max = decl.max;
  return declared;
}

function enter(shape: Shape, stack: Shape[]): void {
  if (stack.includes(shape)) {
    const cycle = [...stack.slice(stack.indexOf(shape)), shape].map((s) => s.name);
    throw new AuthoringError(`Recursive shape: ${cycle.join(" -> ")}`, { cycle });
  }
}

function checkName(owner: string, name: string, what: "field" | "variant"): void {
  if (name === "") {
    throw new AuthoringError(`${owner}: empty ${what} name`, { shape: owner });
  }
  if (what === "field" && RESERVED_SEGMENTS.has(name)) {
    throw new AuthoringError(`${owner}.${name}: '${name}' is a reserved segment`, {
      shape: owner,
      field: name,
    });
  }
}

/**
 * No two questions may share a path, nor the dotted spelling of one. A field
 * literally named `a.b` and a field `b` nested under `a` are ambiguous and
 * rejected rather than resolved by convention.
 */
function assertDistinctPaths(questions: Question[]): void {
  const exact = new Set<string>();
  const dotted = new Map<string, ResponsePath>();
  const visit = (path: ResponsePath): void => {
    const key = path.key();
    if (exact.has(key)) {
      throw new AuthoringError(`Duplicate question path '${path.toString()}'`, { path: path.toString() });
    }
    exact.add(key);
    const spelled = path.toString();
    const previous = dotted.get(spelled);
    if (previous) {
      throw new AuthoringError(
        `Ambiguous path '${spelled}': segments ${JSON.stringify(previous.segments)} and ${JSON.stringify(path.segments)}`,
        { path: spelled },
      );
    }
    dotted.set(spelled, path);
  };
  walkQuestions(questions, (question) => {
    visit(question.path);
    if (question.kind.type === "oneOf") visit(question.path.child(SELECTED_ALTERNATIVE));
  });
}
