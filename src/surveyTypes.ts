import type { AnswerStore } from "./answerStore.js";
import type { ResponsePath } from "./responsePath.js";
import type { ResponseValue } from "./responseValue.js";

// ---------------------------------------------------------------------------
// Shape declarations
// ---------------------------------------------------------------------------

export type PrimitiveType = "string" | "int" | "float" | "bool";

export type ListElementType = "string" | "int" | "float";

/** `true` when the value is acceptable, otherwise the message to show. */
export type ValidationResult = true | string;

/**
 * Field-level validator. Receives the candidate value, the answers collected so
 * far, and the absolute path of the field.
 */
export type FieldValidator = (
  value: ResponseValue,
  responses: AnswerStore,
  path: ResponsePath,
) => ValidationResult;

/**
 * Struct-level validator over several sibling fields. Gets the struct's own
 * answers (paths relative to the struct) and returns messages keyed by relative
 * dotted path.
 */
export type CompositeValidator = (responses: AnswerStore) => Record<string, string>;

export interface ListType<E extends FieldType = FieldType> {
  readonly kind: "list";
  readonly element: E;
}

export type FieldDecl = {
  readonly type: FieldType;
  /** Prompt text. Required on every field. */
  readonly ask?: string;
  readonly mask?: boolean | string;
  readonly multiline?: boolean;
  readonly min?: number;
  readonly max?: number;
  readonly multiselect?: boolean;
  readonly optional?: boolean;
  readonly validate?: FieldValidator;
};

export type FieldMap = { readonly [name: string]: FieldDecl };

export type StructShape<F extends FieldMap = FieldMap> = {
  readonly kind: "struct";
  readonly name: string;
  readonly fields: F;
  readonly prelude?: string;
  readonly epilogue?: string;
  readonly validateFields?: FieldValidator;
  readonly validate?: CompositeValidator;
};

export type VariantFields = FieldMap | readonly FieldDecl[];

export type VariantDecl = {
  /** Label shown for the option. Defaults to the variant name. */
  readonly ask?: string;
  readonly fields?: VariantFields;
};

export type VariantMap = { readonly [name: string]: VariantDecl };

export type EnumShape<V extends VariantMap = VariantMap> = {
  readonly kind: "enum";
  readonly name: string;
  readonly variants: V;
};

export type Shape = StructShape | EnumShape;

export type FieldType = PrimitiveType | ListType | Shape;

// ---------------------------------------------------------------------------
// Value inference
// ---------------------------------------------------------------------------

type Simplify<T> = { [K in keyof T]: T[K] } & {};

export type InferType<T> = T extends "string"
  ? string
  : T extends "int" | "float"
    ? number
    : T extends "bool"
      ? boolean
      : T extends ListType<infer E>
        ? InferType<E>[]
        : T extends StructShape<infer F>
          ? InferFields<F>
          : T extends EnumShape<infer V>
            ? InferVariants<V>
            : never;

type OptionalKeys<F extends FieldMap> = {
  [K in keyof F]: F[K] extends { optional: true } ? K : never;
}[keyof F];

type RequiredKeys<F extends FieldMap> = Exclude<keyof F, OptionalKeys<F>>;

export type InferField<D extends FieldDecl> = D extends { optional: true }
  ? InferType<D["type"]> | undefined
  : InferType<D["type"]>;

export type InferFields<F extends FieldMap> = Simplify<
  { -readonly [K in RequiredKeys<F>]: InferField<F[K]> } & {
    -readonly [K in OptionalKeys<F>]?: InferField<F[K]>;
  }
>;

type InferPositional<A extends readonly FieldDecl[]> = {
  -readonly [K in keyof A]: A[K] extends FieldDecl ? InferField<A[K]> : never;
};

type InferVariantFields<D> = D extends { fields: infer F }
  ? F extends readonly FieldDecl[]
    ? InferPositional<F>
    : F extends FieldMap
      ? keyof F extends never
        ? undefined
        : InferFields<F>
      : undefined
  : undefined;

export type InferVariants<V extends VariantMap> = {
  [K in keyof V & string]: InferVariantFields<V[K]> extends undefined
    ? { variant: K }
    : { variant: K; fields: InferVariantFields<V[K]> };
}[keyof V & string];

/** Value type of a shape. */
export type Infer<S extends Shape> = InferType<S>;

/** Runtime representation of an enum value. */
export type EnumValue = {
  variant: string;
  fields?: Record<string, unknown> | unknown[];
};

// ---------------------------------------------------------------------------
// Questions
// ---------------------------------------------------------------------------

export type QuestionKind =
  | { type: "unit" }
  | { type: "input" }
  | { type: "multiline" }
  | { type: "masked"; mask?: string }
  | { type: "int"; min?: number; max?: number }
  | { type: "float"; min?: number; max?: number }
  | { type: "confirm" }
  | { type: "list"; element: ListElementType; min?: number; max?: number }
  | { type: "anyOf"; options: Question[] }
  | { type: "allOf"; questions: Question[] }
  | { type: "oneOf"; variants: Question[] };

export type QuestionKindType = QuestionKind["type"];

export type DefaultValue =
  | { type: "none" }
  | { type: "suggested"; value: ResponseValue }
  | { type: "assumed"; value: ResponseValue };

export type Question = {
  path: ResponsePath;
  prompt: string;
  kind: QuestionKind;
  default: DefaultValue;
  /** Absence of an answer is acceptable. */
  optional: boolean;
};

export type Schema = {
  questions: Question[];
  prelude?: string;
  epilogue?: string;
};
