/** Reserved segment holding the chosen variant index of an enum. */
export const SELECTED_ALTERNATIVE = "selected_alternative";

/** Reserved segment under which each variant's fields live (`alternatives.<index>`). */
export const ALTERNATIVES = "alternatives";

/** Segment name for the positional field at `index` of a tuple variant. */
export function positionalSegment(index: number): string {
  return `field_${index}`;
}

/**
 * Address of one answer inside a (possibly nested) shape.
 *
 * Immutable: `child` and `concat` build new paths.
 */
export class ResponsePath {
  static readonly root = new ResponsePath([]);

  readonly segments: readonly string[];

  private constructor(segments: readonly string[]) {
    this.segments = Object.freeze([...segments]);
  }

  static of(...segments: string[]): ResponsePath {
    return segments.length === 0 ? ResponsePath.root : new ResponsePath(segments);
  }

  static fromSegments(segments: readonly string[]): ResponsePath {
    return segments.length === 0 ? ResponsePath.root : new ResponsePath(segments);
  }

  /** Split a dotted string. The empty string is the root path. */
  static parse(dotted: string): ResponsePath {
    if (dotted === "") return ResponsePath.root;
    return new ResponsePath(dotted.split("."));
  }

  get length(): number {
    return this.segments.length;
  }

  get isRoot(): boolean {
    return this.segments.length === 0;
  }

  /** Last segment, or undefined for the root. */
  get last(): string | undefined {
    return this.segments[this.segments.length - 1];
  }

  child(segment: string): ResponsePath {
    return new ResponsePath([...this.segments, segment]);
  }

  concat(other: ResponsePath): ResponsePath {
    if (other.isRoot) return this;
    if (this.isRoot) return other;
    return new ResponsePath([...this.segments, ...other.segments]);
  }

  /** The enclosing path. The root is its own parent. */
  parent(): ResponsePath {
    if (this.isRoot) return this;
    return ResponsePath.fromSegments(this.segments.slice(0, -1));
  }

  equals(other: ResponsePath): boolean {
    if (this.segments.length !== other.segments.length) return false;
    return this.segments.every((segment, i) => segment === other.segments[i]);
  }

  isPrefixOf(other: ResponsePath): boolean {
    if (this.segments.length > other.segments.length) return false;
    return this.segments.every((segment, i) => segment === other.segments[i]);
  }

  /** Remove `prefix` from the front, or undefined when it is not a prefix. */
  stripPrefix(prefix: ResponsePath): ResponsePath | undefined {
    if (!prefix.isPrefixOf(this)) return undefined;
    return ResponsePath.fromSegments(this.segments.slice(prefix.length));
  }

  /** Identity of the segment sequence, usable as a map key. */
  key(): string {
    return JSON.stringify(this.segments);
  }

  toString(): string {
    return this.segments.join(".");
  }

  toJSON(): string[] {
    return [...this.segments];
  }
}

export type PathLike = ResponsePath | string;

export function toPath(path: PathLike): ResponsePath {
  return typeof path === "string" ? ResponsePath.parse(path) : path;
}
