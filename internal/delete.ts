import { check } from './assert';
import { Element, TwoThreeNode, addLeft, addRight, trimLeft, trimRight } from './nodes';

/**
 * Where a delete operation stands. Every frame starts `downwards`; once the
 * recursion bottoms out the phase is either `done` or `fixHole`, and each
 * frame on the way back up either repairs the hole (`done`) or passes it on.
 */
export type DeletePhase =
  | { kind: 'downwards' }
  | { kind: 'fixHole' }
  | { kind: 'done', found: boolean };

/** Traversal state shared by all frames of a single delete operation. */
export interface DeleteState<V> {
  key: number;
  phase: DeletePhase;
  /** Element removed by `extractPredecessor`, waiting to replace the deleted one. */
  predecessor: Element<V> | undefined;
}

/** Position of a child within its parent. */
export type ChildPosition = 1 | 2 | 3;

const Downwards = { kind: 'downwards' } as const;
const FixHole = { kind: 'fixHole' } as const;
const Found = { kind: 'done', found: true } as const;
const NotFound = { kind: 'done', found: false } as const;

export function createDeleteState<V>(key: number): DeleteState<V> {
  return { key, phase: Downwards, predecessor: undefined };
}

/**
 * Deletes `state.key` from the subtree rooted at `node`. Afterward,
 * `state.phase` is `done` or, if `node` lost its last element, `fixHole`,
 * in which case the caller must replace `node` by `node.child1`.
 * @internal
 */
export function deleteFromNode<V>(node: TwoThreeNode<V>, state: DeleteState<V>): void {
  const key = state.key, elem2 = node.elem2;
  const child1 = node.child1;
  if (child1 === undefined) {
    if (node.elem1.key === key) {
      if (elem2 !== undefined) {
        node.elem1 = elem2;
        node.elem2 = undefined;
        state.phase = Found;
      } else {
        state.phase = FixHole; // the leaf is now empty
      }
    } else if (elem2 !== undefined && elem2.key === key) {
      node.elem2 = undefined;
      state.phase = Found;
    } else {
      state.phase = NotFound;
    }
    return;
  }

  const child2 = node.child2;
  check(child2 !== undefined, "internal node without child2 at key", node.elem1.key);
  var position: ChildPosition;
  if (key < node.elem1.key) {
    deleteFromNode(child1, state);
    position = 1;
  } else if (key === node.elem1.key) {
    // An internal element is replaced by its predecessor, which always lives in a leaf
    extractPredecessor(child1, state);
    node.elem1 = takePredecessor(state);
    position = 1;
  } else if (elem2 === undefined || key < elem2.key) {
    deleteFromNode(child2, state);
    position = 2;
  } else if (key === elem2.key) {
    extractPredecessor(child2, state);
    node.elem2 = takePredecessor(state);
    position = 2;
  } else {
    const child3 = node.child3;
    check(child3 !== undefined, "3-node without child3 at key", elem2.key);
    deleteFromNode(child3, state);
    position = 3;
  }
  fixHole(node, position, state);
}

/**
 * Removes the largest element of the subtree rooted at `node` and stores it
 * in `state.predecessor`. Holes left behind are repaired exactly as in
 * `deleteFromNode`, so the phase afterward is `done` or `fixHole`.
 */
export function extractPredecessor<V>(node: TwoThreeNode<V>, state: DeleteState<V>): void {
  if (node.child3 !== undefined) {
    extractPredecessor(node.child3, state);
    fixHole(node, 3, state);
  } else if (node.child2 !== undefined) {
    extractPredecessor(node.child2, state);
    fixHole(node, 2, state);
  } else if (node.elem2 !== undefined) {
    state.predecessor = node.elem2;
    node.elem2 = undefined;
    state.phase = Found;
  } else {
    state.predecessor = node.elem1;
    state.phase = FixHole;
  }
}

function takePredecessor<V>(state: DeleteState<V>): Element<V> {
  const predecessor = state.predecessor;
  check(predecessor !== undefined, "no predecessor was extracted while deleting key", state.key);
  state.predecessor = undefined;
  return predecessor;
}

/**
 * Called on the way back up, after the child of `node` at `position` was
 * processed. If that child reported a hole (it has no elements left, and at
 * most one child, in `child1`), borrows an element from a sibling through
 * `node` or merges the hole with a sibling. Merging into a 2-node parent
 * empties the parent, which then reports the hole to its own parent.
 */
export function fixHole<V>(node: TwoThreeNode<V>, position: ChildPosition, state: DeleteState<V>): void {
  const phase = state.phase;
  if (phase.kind === 'done')
    return;
  check(phase.kind === 'fixHole', "delete of key", state.key, "still descending after recursion");

  const child1 = node.child1, child2 = node.child2;
  check(child1 !== undefined && child2 !== undefined, "hole below a node with missing children at key", node.elem1.key);

  const elem2 = node.elem2;
  if (elem2 === undefined) {
    if (position === 1) {
      if (child2.elem2 === undefined) {
        // Merge: the sibling becomes (a, b) and this node becomes the hole
        addLeft(child2, node.elem1, child1.child1);
        node.child1 = child2;
        node.child2 = undefined;
      } else {
        // Borrow: b moves up, a moves down into the hole
        child1.elem1 = node.elem1;
        [node.elem1, child1.child2] = trimLeft(child2);
        state.phase = Found;
      }
    } else {
      if (child1.elem2 === undefined) {
        addRight(child1, node.elem1, child2.child1);
        node.child2 = undefined;
      } else {
        child2.elem1 = node.elem1;
        child2.child2 = child2.child1;
        [node.elem1, child2.child1] = trimRight(child1);
        state.phase = Found;
      }
    }
    return;
  }

  // A 3-node parent can always absorb the hole
  const child3 = node.child3;
  check(child3 !== undefined, "3-node without child3 at key", elem2.key);
  if (position === 1) {
    if (child2.elem2 === undefined) {
      addLeft(child2, node.elem1, child1.child1);
      trimLeft(node); // drops elem1 and the empty child1
    } else {
      child1.elem1 = node.elem1;
      [node.elem1, child1.child2] = trimLeft(child2);
    }
  } else if (position === 2) {
    if (child1.elem2 === undefined) {
      addRight(child1, node.elem1, child2.child1);
      node.elem1 = elem2;
      node.elem2 = undefined;
      node.child2 = child3;
      node.child3 = undefined;
    } else {
      child2.elem1 = node.elem1;
      child2.child2 = child2.child1;
      [node.elem1, child2.child1] = trimRight(child1);
    }
  } else if (child2.elem2 === undefined) {
    addRight(child2, elem2, child3.child1);
    node.elem2 = undefined;
    node.child3 = undefined;
  } else {
    child3.elem1 = elem2;
    child3.child2 = child3.child1;
    [node.elem2, child3.child1] = trimRight(child2);
  }
  state.phase = Found;
}
