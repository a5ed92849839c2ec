import { check } from './assert';
import { TwoThreeNode } from './nodes';

interface ValidateState {
  /** Depth of the first leaf seen; every other leaf must match it. */
  leafDepth: number | undefined;
  elements: number;
}

/**
 * Walks the whole tree and throws if the structure is broken: unordered
 * elements, keys outside the range allowed by their ancestors, wrong child
 * counts, leaves at different depths, or a count that differs from `size`.
 * @internal
 */
export function validateTree<V>(root: TwoThreeNode<V> | undefined, size: number): void {
  if (root === undefined) {
    check(size === 0, "empty tree has stored size", size);
    return;
  }
  const state: ValidateState = { leafDepth: undefined, elements: 0 };
  validateNode(root, 0, -Infinity, Infinity, state);
  check(state.elements === size, "size mismatch: counted", state.elements, "but stored", size);
}

function validateNode<V>(node: TwoThreeNode<V>, depth: number, low: number, high: number, state: ValidateState): void {
  const key1 = node.elem1.key;
  checkInRange(key1, depth, low, high);
  state.elements++;

  const elem2 = node.elem2;
  if (elem2 !== undefined) {
    check(key1 <= elem2.key, "elements out of order at depth", depth, ":", key1, elem2.key);
    checkInRange(elem2.key, depth, low, high);
    state.elements++;
  }

  const child1 = node.child1, child2 = node.child2, child3 = node.child3;
  if (child1 === undefined) {
    check(child2 === undefined && child3 === undefined, "leaf with children at depth", depth, "key", key1);
    if (state.leafDepth === undefined)
      state.leafDepth = depth;
    else
      check(depth === state.leafDepth, "leaf at depth", depth, "but another leaf is at depth", state.leafDepth);
    return;
  }

  check(child2 !== undefined, "internal node with one child at depth", depth, "key", key1);
  validateNode(child1, depth + 1, low, key1, state);
  if (elem2 === undefined) {
    check(child3 === undefined, "2-node with three children at depth", depth, "key", key1);
    validateNode(child2, depth + 1, key1, high, state);
  } else {
    check(child3 !== undefined, "3-node with two children at depth", depth, "key", key1);
    validateNode(child2, depth + 1, key1, elem2.key, state);
    validateNode(child3, depth + 1, elem2.key, high, state);
  }
}

function checkInRange(key: number, depth: number, low: number, high: number) {
  check(!Number.isNaN(key), "NaN key at depth", depth);
  check(low <= key && key <= high, "key", key, "at depth", depth, "is outside its range", low, "..", high);
}
