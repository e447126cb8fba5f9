import { AnswerTypeMismatchError, MissingAnswerError } from "./errors.js";
import { type PathLike, ResponsePath, toPath } from "./responsePath.js";
import type { ResponseValue, ResponseValueType, ValueOf } from "./responseValue.js";

type Entry = { path: ResponsePath; value: ResponseValue };

function hasType<T extends ResponseValueType>(
  value: ResponseValue,
  type: T,
): value is Extract<ResponseValue, { type: T }> & { value: ValueOf<T> } {
  return value.type === type;
}

/**
 * Flat path → value map of collected answers.
 *
 * A store produced by `filterPrefix` remembers the path it was cut from
 * (`origin`), so accessor errors always name the absolute path.
 */
export class AnswerStore {
  private readonly byKey = new Map<string, Entry>();
  readonly origin: ResponsePath;

  constructor(entries: Iterable<readonly [PathLike, ResponseValue]> = [], origin = ResponsePath.root) {
    this.origin = origin;
    for (const [path, value] of entries) this.set(path, value);
  }

  /** Build a store from dotted keys, split on every dot. Use `ResponsePath.of` for a segment holding a dot. */
  static fromRecord(record: Record<string, ResponseValue>): AnswerStore {
    return new AnswerStore(Object.entries(record));
  }

  get size(): number {
    return this.byKey.size;
  }

  set(path: PathLike, value: ResponseValue): this {
    const p = toPath(path);
    this.byKey.set(p.key(), { path: p, value });
    return this;
  }

  get(path: PathLike): ResponseValue | undefined {
    return this.byKey.get(toPath(path).key())?.value;
  }

  has(path: PathLike): boolean {
    return this.byKey.has(toPath(path).key());
  }

  delete(path: PathLike): boolean {
    return this.byKey.delete(toPath(path).key());
  }

  *entries(): IterableIterator<[ResponsePath, ResponseValue]> {
    for (const { path, value } of this.byKey.values()) yield [path, value];
  }

  paths(): ResponsePath[] {
    return [...this.byKey.values()].map((entry) => entry.path);
  }

  clone(): AnswerStore {
    return new AnswerStore(this.entries(), this.origin);
  }

  /** Copy every entry of `other` into this store; `other` wins on conflicts. */
  merge(other: AnswerStore): this {
    for (const [path, value] of other.entries()) this.set(path, value);
    return this;
  }

  /** Entries under `prefix`, with the prefix stripped from each key. */
  filterPrefix(prefix: PathLike): AnswerStore {
    const p = toPath(prefix);
    const sub = new AnswerStore([], this.origin.concat(p));
    for (const [path, value] of this.entries()) {
      const rest = path.stripPrefix(p);
      if (rest) sub.set(rest, value);
    }
    return sub;
  }

  /** Every entry with `prefix` prepended to its key. */
  reroot(prefix: PathLike): AnswerStore {
    const p = toPath(prefix);
    const rooted = new AnswerStore();
    for (const [path, value] of this.entries()) rooted.set(p.concat(path), value);
    return rooted;
  }

  /** Absolute path of a key of this store. */
  absolute(path: PathLike): ResponsePath {
    return this.origin.concat(toPath(path));
  }

  toRecord(): Record<string, ResponseValue> {
    const record: Record<string, ResponseValue> = {};
    for (const [path, value] of this.entries()) record[path.toString()] = value;
    return record;
  }

  getString(path: PathLike): string {
    return this.require(path, "string");
  }

  getInt(path: PathLike): number {
    return this.require(path, "int");
  }

  getFloat(path: PathLike): number {
    return this.require(path, "float");
  }

  getBool(path: PathLike): boolean {
    return this.require(path, "bool");
  }

  getChosenVariant(path: PathLike): number {
    return this.require(path, "chosenVariant");
  }

  getChosenVariants(path: PathLike): readonly number[] {
    return this.require(path, "chosenVariants");
  }

  getStringList(path: PathLike): readonly string[] {
    return this.require(path, "stringList");
  }

  getIntList(path: PathLike): readonly number[] {
    return this.require(path, "intList");
  }

  getFloatList(path: PathLike): readonly number[] {
    return this.require(path, "floatList");
  }

  getOptionalString(path: PathLike): string | undefined {
    return this.optional(path, "string");
  }

  getOptionalInt(path: PathLike): number | undefined {
    return this.optional(path, "int");
  }

  getOptionalFloat(path: PathLike): number | undefined {
    return this.optional(path, "float");
  }

  getOptionalBool(path: PathLike): boolean | undefined {
    return this.optional(path, "bool");
  }

  getOptionalChosenVariant(path: PathLike): number | undefined {
    return this.optional(path, "chosenVariant");
  }

  getOptionalChosenVariants(path: PathLike): readonly number[] | undefined {
    return this.optional(path, "chosenVariants");
  }

  getOptionalStringList(path: PathLike): readonly string[] | undefined {
    return this.optional(path, "stringList");
  }

  getOptionalIntList(path: PathLike): readonly number[] | undefined {
    return this.optional(path, "intList");
  }

  getOptionalFloatList(path: PathLike): readonly number[] | undefined {
    return this.optional(path, "floatList");
  }

  /** Read the value at `path`, which must carry the `type` tag. */
  require<T extends ResponseValueType>(path: PathLike, type: T): ValueOf<T> {
    const p = toPath(path);
    const value = this.get(p);
    if (!value) throw new MissingAnswerError(this.absolute(p));
    if (!hasType(value, type)) throw new AnswerTypeMismatchError(this.absolute(p), type, value.type);
    return value.value;
  }

  optional<T extends ResponseValueType>(path: PathLike, type: T): ValueOf<T> | undefined {
    return this.has(path) ? this.require(path, type) : undefined;
  }
}
