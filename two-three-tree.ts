import { IIndex } from './interfaces';
import { check } from './internal/assert';
import { createDeleteState, deleteFromNode } from './internal/delete';
import { insertIntoNode } from './internal/insert';
import { Element, TwoThreeNode } from './internal/nodes';
import { validateTree } from './internal/validate';

export { Element } from './internal/nodes';
export { IIndexSource, IIndexSink, IIndex } from './interfaces';

/**
 * An ordered index from numeric keys to values, stored as a 2-3 tree.
 *
 * Every node holds one or two elements and, unless it is a leaf, one more
 * child than elements. All leaves are at the same depth, so `find`, `insert`
 * and `delete` are O(log size). The tree stays balanced by splitting full
 * nodes on insert and by borrowing from or merging with siblings on delete;
 * it never rotates.
 *
 * Keys must be unique: `insert` leaves an existing key alone unless asked to
 * overwrite its value. `NaN` cannot be used as a key.
 *
 * @example
 *     const tree = new TwoThreeTree<string>([[2, "two"], [1, "one"]]);
 *     tree.insert(3, "three");
 *     tree.get(3);    // "three"
 *     tree.delete(1); // true
 *     tree.size;      // 2
 */
export default class TwoThreeTree<V = number> implements IIndex<V>
{
  private _root: TwoThreeNode<V> | undefined = undefined;
  private _size = 0;

  /**
   * Initializes an empty tree.
   * @param entries Key-value pairs to insert, in any order. Later pairs with
   *   a key seen before are ignored.
   */
  public constructor(entries?: [number, V][]) {
    if (entries)
      for (const [key, value] of entries)
        this.insert(key, value);
  }

  /** Gets the number of elements in the tree. */
  get size(): number { return this._size; }
  /** Returns true iff the tree contains no elements. */
  get isEmpty(): boolean { return this._root === undefined; }

  /** Number of levels of internal nodes: 0 when the tree is empty or is a single leaf. */
  get height(): number {
    var height = 0;
    for (var node = this._root; node !== undefined && node.child1 !== undefined; node = node.child1)
      height++;
    return height;
  }

  /** Releases the tree so that its size is 0. */
  clear() {
    this._root = undefined;
    this._size = 0;
  }

  /**
   * Finds the element with the given key. The returned object is the one
   * stored in the tree; its key must not be modified.
   * @description Computational complexity: O(log size)
   */
  find(key: number): Element<V> | undefined {
    var node = this._root;
    while (node !== undefined) {
      const elem1 = node.elem1;
      if (key < elem1.key) {
        node = node.child1;
      } else if (key === elem1.key) {
        return elem1;
      } else {
        const elem2 = node.elem2;
        if (elem2 === undefined || key < elem2.key)
          node = node.child2;
        else if (key === elem2.key)
          return elem2;
        else
          node = node.child3;
      }
    }
    return undefined;
  }

  /**
   * Finds a key and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   */
  get(key: number, defaultValue?: V): V | undefined {
    const element = this.find(key);
    return element === undefined ? defaultValue : element.value;
  }

  /** Returns true if the key exists in the tree, false if not. */
  has(key: number): boolean {
    return this.find(key) !== undefined;
  }

  /**
   * Adds a key-value pair to the tree.
   * @param overwrite Whether to replace the value of an existing key
   *   (default: false). The tree's shape and size do not change either way.
   * @returns true if a new element was added, false if the key existed.
   * @description Computational complexity: O(log size)
   */
  insert(key: number, value: V, overwrite?: boolean): boolean {
    check(!Number.isNaN(key), "NaN was used as a key");
    const element: Element<V> = { key, value };
    const root = this._root;
    if (root === undefined) {
      this._root = new TwoThreeNode(element);
      this._size++;
      return true;
    }

    const result = insertIntoNode(root, element);
    if (result.kind === 'exists') {
      if (overwrite)
        result.element.value = value;
      return false;
    }
    if (result.kind === 'split') {
      // The root has split, so the tree grows by one level
      this._root = new TwoThreeNode(result.promoted, result.left, result.right);
    }
    this._size++;
    return true;
  }

  /**
   * Removes the element with the given key.
   * @returns true if the key was found and removed, false otherwise.
   * @description Computational complexity: O(log size)
   */
  delete(key: number): boolean {
    const root = this._root;
    if (root === undefined)
      return false;

    const state = createDeleteState<V>(key);
    deleteFromNode(root, state);
    const phase = state.phase;
    if (phase.kind === 'fixHole') {
      // The root ran out of elements; its only child (if any) takes its place
      this._root = root.child1;
      this._size--;
      return true;
    }
    check(phase.kind === 'done', "delete of key", key, "ended while still descending");
    if (phase.found)
      this._size--;
    return phase.found;
  }

  /** Scans the whole tree for broken ordering, balance or size invariants,
   *  and throws an Error describing the first one found.
   *  Computational complexity: O(size) */
  checkValid() {
    validateTree(this._root, this._size);
  }

  /**
   * Returns a multi-line description of the tree's structure, one node per
   * line in pre-order, indented by depth, e.g.
   *
   *     Tree(3):
   *     Element: 2
   *     | Element: 1
   *     | Element: 3
   */
  dump(): string {
    const root = this._root;
    if (root === undefined)
      return "Empty tree";
    const lines = [`Tree(${this._size}):`];
    dumpNode(root, 0, lines);
    return lines.join('\n');
  }
}

function dumpNode<V>(node: TwoThreeNode<V>, indent: number, lines: string[]) {
  var line = '| '.repeat(indent) + 'Element: ' + node.elem1.key;
  if (node.elem2 !== undefined)
    line += ' ' + node.elem2.key;
  lines.push(line);
  if (node.child1 !== undefined) dumpNode(node.child1, indent + 1, lines);
  if (node.child2 !== undefined) dumpNode(node.child2, indent + 1, lines);
  if (node.child3 !== undefined) dumpNode(node.child3, indent + 1, lines);
}
