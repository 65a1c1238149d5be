import { createLogger } from "../../src/logger.js";
import type { ShortIdGenerator } from "../../src/generator.js";

export const silentLogger = () => createLogger("silent");

/** Hands out `ids` in order, then keeps repeating the last one. */
export function sequenceGenerator(...ids: string[]): ShortIdGenerator {
  let i = 0;
  return {
    generate: () => {
      const id = ids[Math.min(i, ids.length - 1)] ?? "";
      i++;
      return id;
    }
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets pending promise callbacks run. */
export const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));
