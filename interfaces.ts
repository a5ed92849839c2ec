import { Element } from './internal/nodes';

/** Read-only view of an index from numeric keys to values of type V. */
export interface IIndexSource<V> {
  /** Number of elements in the index. */
  readonly size: number;
  /** Returns the stored element with the given key, or undefined if there is none. */
  find(key: number): Element<V> | undefined;
  /** Returns the value associated with the key, or `defaultValue` if the key is absent. */
  get(key: number, defaultValue?: V): V | undefined;
  /** Returns true if the key is present. */
  has(key: number): boolean;
}

/** Write side of an index from numeric keys to values of type V. */
export interface IIndexSink<V> {
  /**
   * Adds a key-value pair if the key is absent.
   * @param overwrite If true and the key is present, its value is replaced.
   * @returns true if a new element was added.
   */
  insert(key: number, value: V, overwrite?: boolean): boolean;
  /** Removes the element with the given key. Returns true if it was present. */
  delete(key: number): boolean;
  /** Removes every element. */
  clear(): void;
}

export interface IIndex<V> extends IIndexSource<V>, IIndexSink<V> {}
