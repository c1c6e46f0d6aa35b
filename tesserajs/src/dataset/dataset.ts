import { List } from "immutable";

type DatasetLike<T> =
  | AsyncIterable<T>
  | Iterable<T>
  // generators
  | (() => AsyncIterator<T, void>)
  | (() => Iterator<T, void>);

/** Lazy, restartable series of elements
 *
 * Every iteration starts over from the source, so a Dataset of tiles never
 * holds more than the element currently being consumed.
 */
export class Dataset<T> implements AsyncIterable<T> {
  readonly #content: () => AsyncIterator<T, void, undefined>;

  /** Wrap given data generator
   *
   * To avoid loading everything in memory, it is a function that upon calling
   * should return a new AsyncGenerator with the same data as before.
   */
  constructor(content: DatasetLike<T>) {
    this.#content = async function* () {
      let iter: AsyncIterator<T, void> | Iterator<T, void>;
      if (typeof content === "function") iter = content();
      else if (Symbol.asyncIterator in content)
        iter = content[Symbol.asyncIterator]();
      else iter = content[Symbol.iterator]();

      while (true) {
        const result = await iter.next();
        if (result.done === true) break;
        yield result.value;
      }
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.#content();
  }

  /** Apply function to each element, in order
   *
   * @param mapper how to change each element
   */
  map<U>(mapper: (_: T) => U | Promise<U>): Dataset<U> {
    return new Dataset(
      async function* (this: Dataset<T>) {
        for await (const e of this) yield await mapper(e);
      }.bind(this),
    );
  }

  /** Keep only elements matching the predicate */
  filter(predicate: (_: T) => boolean): Dataset<T> {
    return new Dataset(
      async function* (this: Dataset<T>) {
        for await (const e of this) if (predicate(e)) yield e;
      }.bind(this),
    );
  }

  /** Compute size
   *
   * This is a costly operation as we need to go through the whole Dataset.
   */
  async size(): Promise<number> {
    let ret = 0;
    for await (const _ of this) ret++;
    return ret;
  }

  /** Materialize every element, only for small series */
  async toList(): Promise<List<T>> {
    let ret = List<T>();
    for await (const e of this) ret = ret.push(e);
    return ret;
  }
}
