/**
 * A lazy source of body elements. It is not iterated before its send's
 * headers are committed.
 */
export type Payload<T> = Iterable<T> | AsyncIterable<T>;

/**
 * Lazily maps a payload. The source is not touched until the result is iterated.
 */
export async function* mapPayload<T, U>(source: Payload<T>, fn: (value: T) => U): AsyncGenerator<U> {
  for await (const value of source) {
    yield fn(value);
  }
}
