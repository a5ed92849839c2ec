import { check } from './assert';
import { Element, TwoThreeNode } from './nodes';

/**
 * Outcome of inserting into a subtree, reported to the caller's frame.
 * - `done`: the subtree absorbed the element.
 * - `exists`: the key was already present (nothing was changed); `element` is the stored one.
 * - `split`: the subtree overflowed and must be replaced by `left`, `promoted`, `right`,
 *   where `left` and `right` have the height the subtree had.
 */
export type InsertResult<V> =
  | { kind: 'done' }
  | { kind: 'exists', element: Element<V> }
  | { kind: 'split', promoted: Element<V>, left: TwoThreeNode<V>, right: TwoThreeNode<V> };

const Done = { kind: 'done' } as const;

function split<V>(promoted: Element<V>, left: TwoThreeNode<V>, right: TwoThreeNode<V>): InsertResult<V> {
  return { kind: 'split', promoted, left, right };
}

/**
 * Inserts `element` below `node`. Nodes are only modified after the
 * recursion has returned, so an `exists` result leaves the subtree untouched.
 * @internal
 */
export function insertIntoNode<V>(node: TwoThreeNode<V>, element: Element<V>): InsertResult<V> {
  const key = element.key, elem1 = node.elem1, elem2 = node.elem2;
  if (key === elem1.key)
    return { kind: 'exists', element: elem1 };
  if (elem2 !== undefined && key === elem2.key)
    return { kind: 'exists', element: elem2 };

  const child1 = node.child1;
  if (child1 === undefined)
    return insertIntoLeaf(node, element);

  if (key < elem1.key) {
    const result = insertIntoNode(child1, element);
    if (result.kind !== 'split')
      return result;
    if (elem2 === undefined) {
      // Absorb: (P a) with the old child2 on the right
      node.elem2 = elem1;
      node.elem1 = result.promoted;
      node.child3 = node.child2;
      node.child1 = result.left;
      node.child2 = result.right;
      return Done;
    }
    // Split: a goes up, (P) and (b) become its children
    return split(elem1,
      new TwoThreeNode(result.promoted, result.left, result.right),
      new TwoThreeNode(elem2, node.child2, node.child3));
  }

  const child2 = node.child2;
  check(child2 !== undefined, "internal node without child2 at key", elem1.key);
  if (elem2 === undefined || key < elem2.key) {
    const result = insertIntoNode(child2, element);
    if (result.kind !== 'split')
      return result;
    if (elem2 === undefined) {
      // Absorb: (a P) with the old child1 on the left
      node.elem2 = result.promoted;
      node.child2 = result.left;
      node.child3 = result.right;
      return Done;
    }
    // Split: P goes up, (a) and (b) take one half of the split each
    return split(result.promoted,
      new TwoThreeNode(elem1, child1, result.left),
      new TwoThreeNode(elem2, result.right, node.child3));
  }

  const child3 = node.child3;
  check(child3 !== undefined, "3-node without child3 at key", elem2.key);
  const result = insertIntoNode(child3, element);
  if (result.kind !== 'split')
    return result;
  // Split: b goes up, (a) keeps child1 and child2, (P) holds the split halves
  return split(elem2,
    new TwoThreeNode(elem1, child1, child2),
    new TwoThreeNode(result.promoted, result.left, result.right));
}

function insertIntoLeaf<V>(leaf: TwoThreeNode<V>, element: Element<V>): InsertResult<V> {
  const key = element.key, elem1 = leaf.elem1, elem2 = leaf.elem2;
  if (elem2 !== undefined) {
    // Three elements do not fit: the middle one is promoted
    if (key < elem1.key)
      return split(elem1, new TwoThreeNode(element), new TwoThreeNode(elem2));
    if (key < elem2.key)
      return split(element, new TwoThreeNode(elem1), new TwoThreeNode(elem2));
    return split(elem2, new TwoThreeNode(elem1), new TwoThreeNode(element));
  }
  if (elem1.key < key) {
    leaf.elem2 = element;
  } else {
    leaf.elem2 = elem1;
    leaf.elem1 = element;
  }
  return Done;
}
