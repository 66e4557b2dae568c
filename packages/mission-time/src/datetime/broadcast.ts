import { MissionTimeError } from "../errors.js";
import type { Batch } from "../types.js";

/** Whether `item` is a nested level rather than a leaf. Leaves are never arrays. */
export function isNested<T>(item: T | Batch<T>): item is Batch<T> {
  return Array.isArray(item);
}

/** Arrays are batches; any other iterable is just a sequence. */
export function isBatch<T>(values: Batch<T> | Iterable<T>): values is Batch<T> {
  return Array.isArray(values);
}

/** Apply `fn` to every leaf, keeping the nesting. */
export function mapBatch<T, U>(batch: Batch<T>, fn: (value: T) => U): Batch<U> {
  return batch.map((item) => (isNested(item) ? mapBatch(item, fn) : fn(item)));
}

function zipAt<A, B, U>(a: A | Batch<A>, b: B | Batch<B>, fn: (left: A, right: B) => U, path: string): U | Batch<U> {
  const at = (i: number): string => (path === "" ? `${i}` : `${path},${i}`);

  if (isNested(a)) {
    if (isNested(b)) {
      if (a.length !== b.length) {
        throw new MissionTimeError(
          "ShapeMismatch",
          `Shape mismatch at [${path}]: ${a.length} elements against ${b.length}`,
        );
      }
      return a.map((item, i) => zipAt(item, b[i] ?? [], fn, at(i)));
    }
    return a.map((item, i) => zipAt(item, b, fn, at(i)));
  }
  if (isNested(b)) {
    return b.map((item, i) => zipAt(a, item, fn, at(i)));
  }
  return fn(a, b);
}

/**
 * Combine two operands leaf by leaf.
 *
 * A scalar operand is broadcast against the other side; two batches must
 * have the same shape.
 */
export function zipBatch<A, B, U>(a: Batch<A>, b: B | Batch<B>, fn: (left: A, right: B) => U): Batch<U>;
export function zipBatch<A, B, U>(a: A | Batch<A>, b: Batch<B>, fn: (left: A, right: B) => U): Batch<U>;
export function zipBatch<A, B, U>(a: A | Batch<A>, b: B | Batch<B>, fn: (left: A, right: B) => U): U | Batch<U>;
export function zipBatch<A, B, U>(a: A | Batch<A>, b: B | Batch<B>, fn: (left: A, right: B) => U): U | Batch<U> {
  return zipAt(a, b, fn, "");
}
