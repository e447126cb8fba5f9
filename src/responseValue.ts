import { InvalidValueError } from "./errors.js";

/** One concrete answer. The `type` tag must agree with the question kind at its path. */
export type ResponseValue =
  | { type: "string"; value: string }
  | { type: "int"; value: number }
  | { type: "float"; value: number }
  | { type: "bool"; value: boolean }
  | { type: "chosenVariant"; value: number }
  | { type: "chosenVariants"; value: readonly number[] }
  | { type: "stringList"; value: readonly string[] }
  | { type: "intList"; value: readonly number[] }
  | { type: "floatList"; value: readonly number[] };

export type ResponseValueType = ResponseValue["type"];

type ValueMap = { [V in ResponseValue as V["type"]]: V["value"] };

export type ValueOf<T extends ResponseValueType> = ValueMap[T];

export const RESPONSE_VALUE_TYPES: readonly ResponseValueType[] = [
  "string",
  "int",
  "float",
  "bool",
  "chosenVariant",
  "chosenVariants",
  "stringList",
  "intList",
  "floatList",
];

function checkInt(value: number, what: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidValueError(`${what} must be a safe integer, got ${value}`, { value });
  }
  return value;
}

function checkFloat(value: number, what: string): number {
  if (!Number.isFinite(value)) {
    throw new InvalidValueError(`${what} must be a finite number, got ${value}`, { value });
  }
  return value;
}

function checkIndex(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidValueError(`Variant index must be a non-negative integer, got ${value}`, {
      value,
    });
  }
  return value;
}

export const values = {
  string: (value: string): ResponseValue => ({ type: "string", value }),
  int: (value: number): ResponseValue => ({ type: "int", value: checkInt(value, "Int value") }),
  float: (value: number): ResponseValue => ({ type: "float", value: checkFloat(value, "Float value") }),
  bool: (value: boolean): ResponseValue => ({ type: "bool", value }),
  chosenVariant: (index: number): ResponseValue => ({
    type: "chosenVariant",
    value: checkIndex(index),
  }),
  /** Index set: duplicates dropped, kept in ascending order. */
  chosenVariants: (indices: Iterable<number>): ResponseValue => ({
    type: "chosenVariants",
    value: [...new Set([...indices].map(checkIndex))].sort((a, b) => a - b),
  }),
  stringList: (items: readonly string[]): ResponseValue => ({
    type: "stringList",
    value: [...items],
  }),
  intList: (items: readonly number[]): ResponseValue => ({
    type: "intList",
    value: items.map((item) => checkInt(item, "Int list element")),
  }),
  floatList: (items: readonly number[]): ResponseValue => ({
    type: "floatList",
    value: items.map((item) => checkFloat(item, "Float list element")),
  }),
};

function isList(value: ResponseValue["value"]): value is readonly number[] | readonly string[] {
  return Array.isArray(value);
}

export function valuesEqual(a: ResponseValue, b: ResponseValue): boolean {
  if (a.type !== b.type) return false;
  const left = a.value;
  const right = b.value;
  if (isList(left) && isList(right)) {
    if (left.length !== right.length) return false;
    for (let i = 0; i < left.length; i++) {
      if (!Object.is(left[i], right[i])) return false;
    }
    return true;
  }
  return Object.is(left, right);
}

export function describeValue(value: ResponseValue): string {
  const inner = value.value;
  return isList(inner) ? `${value.type}[${inner.join(", ")}]` : `${value.type}(${String(inner)})`;
}

/** Structural check for values arriving from outside the type system. */
export function isResponseValue(value: unknown): value is ResponseValue {
  if (typeof value !== "object" || value === null || !("type" in value) || !("value" in value)) {
    return false;
  }
  const inner = value.value;
  const isNumber = (item: unknown): boolean => typeof item === "number" && Number.isFinite(item);
  const isIndex = (item: unknown): boolean => Number.isSafeInteger(item) && Number(item) >= 0;
  switch (value.type) {
    case "string":
      return typeof inner === "string";
    case "int":
      return Number.isSafeInteger(inner);
    case "float":
      return isNumber(inner);
    case "bool":
      return typeof inner === "boolean";
    case "chosenVariant":
      return isIndex(inner);
    case "chosenVariants":
      return Array.isArray(inner) && inner.every(isIndex);
    case "stringList":
      return Array.isArray(inner) && inner.every((item) => typeof item === "string");
    case "intList":
      return Array.isArray(inner) && inner.every((item) => Number.isSafeInteger(item));
    case "floatList":
      return Array.isArray(inner) && inner.every(isNumber);
    default:
      return false;
  }
}
