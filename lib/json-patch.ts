import jsonPatch from 'fast-json-patch';
import type { Operation } from 'fast-json-patch';

const { escapePathComponent, validate } = jsonPatch;

export type { Operation };

export const JsonPatchMediaType = 'application/json-patch+json';
export const MergePatchMediaType = 'application/merge-patch+json';

// Depth limit keeps recursive resource types from blowing up the checker
type Prev = [never, 0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

/** Every path into `T` as a tuple of keys, e.g. `['spec', 'replicas']`.
 * Array positions are numbers, with `'-'` meaning "append". */
export type PatchPath<T, Depth extends number = 10> = [Depth] extends [never] ? never
  : T extends ReadonlyArray<infer E> ? [number | '-'] | [number, ...PatchPath<NonNullable<E>, Prev[Depth]>]
  : T extends object ? { [K in keyof T & string]-?: [K] | [K, ...PatchPath<NonNullable<T[K]>, Prev[Depth]>] }[keyof T & string]
  : never;

/** The type found at `Path` inside `T`. */
export type PatchValue<T, Path extends readonly unknown[]> =
  Path extends readonly [infer K, ...infer Rest]
    ? T extends ReadonlyArray<infer E> ? PatchValue<NonNullable<E>, Rest>
    : K extends keyof T ? PatchValue<NonNullable<T[K]>, Rest>
    : never
  : T;

type PathSegment = string | number;

/** A merge-patch body: any subset of `T`, with null meaning "delete this field". */
export type MergePatch<T> = T extends ReadonlyArray<unknown> ? T
  : T extends object ? { [K in keyof T]?: MergePatch<T[K]> | null }
  : T;

export function toJsonPointer(segments: readonly PathSegment[]): string {
  return segments.map(seg => '/'+escapePathComponent(String(seg))).join('');
}

/** The operation list both patch builders write into. */
abstract class PatchOperationList {
  readonly operations = new Array<Operation>();

  protected push(op: Operation): this {
    this.operations.push(op);
    return this;
  }

  /** Throws when an operation is structurally invalid (bad pointer, missing value). */
  validate(): void {
    const problem = validate(this.operations);
    if (problem) throw new TypeError(
      `Invalid JSON-Patch operation #${problem.index ?? '?'}: ${problem.message}`);
  }

  toJSON(): Operation[] {
    return this.operations;
  }
}

/** JSON-Patch document whose paths and values are checked against `T`. */
export class JsonPatchDocument<T> extends PatchOperationList {
  add<P extends PatchPath<T> & readonly PathSegment[]>(path: P, value: PatchValue<T, P>): this {
    return this.push({ op: 'add', path: toJsonPointer(path), value });
  }
  remove<P extends PatchPath<T> & readonly PathSegment[]>(path: P): this {
    return this.push({ op: 'remove', path: toJsonPointer(path) });
  }
  replace<P extends PatchPath<T> & readonly PathSegment[]>(path: P, value: PatchValue<T, P>): this {
    return this.push({ op: 'replace', path: toJsonPointer(path), value });
  }
  move<P extends PatchPath<T> & readonly PathSegment[]>(from: PatchPath<T> & readonly PathSegment[], path: P): this {
    return this.push({ op: 'move', from: toJsonPointer(from), path: toJsonPointer(path) });
  }
  copy<P extends PatchPath<T> & readonly PathSegment[]>(from: PatchPath<T> & readonly PathSegment[], path: P): this {
    return this.push({ op: 'copy', from: toJsonPointer(from), path: toJsonPointer(path) });
  }
  test<P extends PatchPath<T> & readonly PathSegment[]>(path: P, value: PatchValue<T, P>): this {
    return this.push({ op: 'test', path: toJsonPointer(path), value });
  }
}

/** JSON-Patch document over plain JSON Pointer strings, for untyped or dynamic paths. */
export class RawJsonPatch extends PatchOperationList {
  add(path: string, value: unknown): this {
    return this.push({ op: 'add', path, value });
  }
  remove(path: string): this {
    return this.push({ op: 'remove', path });
  }
  replace(path: string, value: unknown): this {
    return this.push({ op: 'replace', path, value });
  }
  move(from: string, path: string): this {
    return this.push({ op: 'move', from, path });
  }
  copy(from: string, path: string): this {
    return this.push({ op: 'copy', from, path });
  }
  test(path: string, value: unknown): this {
    return this.push({ op: 'test', path, value });
  }
}
