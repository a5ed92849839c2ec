import { check } from './assert';

/** A key-value pair stored in the tree. Elements are ordered by `key` alone. */
export interface Element<V> {
  key: number;
  value: V;
}

/**
 * A node of a 2-3 tree. There is no parent pointer: each node is owned by
 * exactly one slot of its parent (or by the tree, for the root), and the
 * insert and delete algorithms walk back up through the call stack.
 *
 * - 2-node: `elem2` is undefined; zero children, or `child1` and `child2`.
 * - 3-node: `elem2` is defined; zero children, or all three.
 * @internal
 */
export class TwoThreeNode<V> {
  elem1: Element<V>;
  elem2: Element<V> | undefined;
  child1: TwoThreeNode<V> | undefined;
  child2: TwoThreeNode<V> | undefined;
  child3: TwoThreeNode<V> | undefined;

  constructor(elem1: Element<V>, child1?: TwoThreeNode<V>, child2?: TwoThreeNode<V>) {
    this.elem1 = elem1;
    this.elem2 = undefined;
    this.child1 = child1;
    this.child2 = child2;
    this.child3 = undefined;
  }

  get isLeaf() { return this.child1 === undefined; }
}

/////////////////////////////////////////////////////////////////////////////
// Reshaping between 2-nodes and 3-nodes ///////////////////////////////////

/** Turns a 2-node into a 3-node by adding an element and a child on its left side. */
export function addLeft<V>(node: TwoThreeNode<V>, elem1: Element<V>, child1: TwoThreeNode<V> | undefined) {
  node.elem2 = node.elem1;
  node.elem1 = elem1;
  node.child3 = node.child2;
  node.child2 = node.child1;
  node.child1 = child1;
}

/** Turns a 2-node into a 3-node by adding an element and a child on its right side. */
export function addRight<V>(node: TwoThreeNode<V>, elem2: Element<V>, child3: TwoThreeNode<V> | undefined) {
  node.elem2 = elem2;
  node.child3 = child3;
}

/** Turns a 3-node into a 2-node, returning its left element and left child. */
export function trimLeft<V>(node: TwoThreeNode<V>): [Element<V>, TwoThreeNode<V> | undefined] {
  const elem2 = node.elem2;
  check(elem2 !== undefined, "trimLeft called on a 2-node with key", node.elem1.key);
  const removed: [Element<V>, TwoThreeNode<V> | undefined] = [node.elem1, node.child1];
  node.elem1 = elem2;
  node.elem2 = undefined;
  node.child1 = node.child2;
  node.child2 = node.child3;
  node.child3 = undefined;
  return removed;
}

/** Turns a 3-node into a 2-node, returning its right element and right child. */
export function trimRight<V>(node: TwoThreeNode<V>): [Element<V>, TwoThreeNode<V> | undefined] {
  const elem2 = node.elem2;
  check(elem2 !== undefined, "trimRight called on a 2-node with key", node.elem1.key);
  const removed: [Element<V>, TwoThreeNode<V> | undefined] = [elem2, node.child3];
  node.elem2 = undefined;
  node.child3 = undefined;
  return removed;
}
