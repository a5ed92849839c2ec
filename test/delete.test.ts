import { leafDepths, treeOf } from './shared';

/** Builds a tree from `keys`, deletes `key` and checks the resulting shape. */
function expectShapeAfterDelete(keys: number[], key: number, lines: string[]) {
  const tree = treeOf(keys);
  expect(tree.delete(key)).toBe(true);
  tree.checkValid();
  expect(tree.size).toBe(keys.length - 1);
  expect(tree.dump().split('\n')).toEqual([`Tree(${keys.length - 1}):`, ...lines]);
  expect(tree.find(key)).toBeUndefined();
  for (const k of keys)
    if (k !== key)
      expect(tree.get(k)).toBe(k);
}

describe('Deleting from leaves', () =>
{
  test('Removing the first key of a 3-node leaf', () => {
    expectShapeAfterDelete([2, 1, 3, 4], 3, ["Element: 2", "| Element: 1", "| Element: 4"]);
  });

  test('Removing the second key of a 3-node leaf', () => {
    expectShapeAfterDelete([2, 1, 3, 4], 4, ["Element: 2", "| Element: 1", "| Element: 3"]);
  });

  test('Removing the only key empties the tree', () => {
    const tree = treeOf([7]);
    expect(tree.delete(7)).toBe(true);
    expect(tree.isEmpty).toBe(true);
    expect(tree.size).toBe(0);
    expect(tree.dump()).toBe("Empty tree");
  });
});

describe('Hole below a 2-node parent', () =>
{
  test('Left hole, 2-node sibling: merge and the root shrinks', () => {
    expectShapeAfterDelete([2, 1, 3], 1, ["Element: 2 3"]);
  });

  test('Left hole, 3-node sibling: borrow', () => {
    expectShapeAfterDelete([2, 1, 3, 4], 1, ["Element: 3", "| Element: 2", "| Element: 4"]);
  });

  test('Right hole, 2-node sibling: merge and the root shrinks', () => {
    expectShapeAfterDelete([2, 1, 3], 3, ["Element: 1 2"]);
  });

  test('Right hole, 3-node sibling: borrow', () => {
    expectShapeAfterDelete([2, 1, 3, 0], 3, ["Element: 1", "| Element: 0", "| Element: 2"]);
  });
});

describe('Hole below a 3-node parent', () =>
{
  // Each starts from root (20 40) over leaves (10) (30) (50), plus one key
  // where a 3-node sibling is needed
  const base = [20, 10, 30, 40, 50];

  test('Left hole, 2-node sibling: merge', () => {
    expectShapeAfterDelete(base, 10, ["Element: 40", "| Element: 20 30", "| Element: 50"]);
  });

  test('Left hole, 3-node sibling: borrow', () => {
    expectShapeAfterDelete([...base, 35], 10,
      ["Element: 30 40", "| Element: 20", "| Element: 35", "| Element: 50"]);
  });

  test('Middle hole, 2-node sibling: merge', () => {
    expectShapeAfterDelete(base, 30, ["Element: 40", "| Element: 10 20", "| Element: 50"]);
  });

  test('Middle hole, 3-node sibling: borrow', () => {
    expectShapeAfterDelete([...base, 5], 30,
      ["Element: 10 40", "| Element: 5", "| Element: 20", "| Element: 50"]);
  });

  test('Right hole, 2-node sibling: merge', () => {
    expectShapeAfterDelete(base, 50, ["Element: 20", "| Element: 10", "| Element: 30 40"]);
  });

  test('Right hole, 3-node sibling: borrow', () => {
    expectShapeAfterDelete([...base, 35], 50,
      ["Element: 20 35", "| Element: 10", "| Element: 30", "| Element: 40"]);
  });
});

describe('Deleting internal elements', () =>
{
  test('The first element is replaced by its predecessor', () => {
    expectShapeAfterDelete([20, 10, 30, 40, 50], 20, ["Element: 40", "| Element: 10 30", "| Element: 50"]);
  });

  test('The second element is replaced by its predecessor', () => {
    expectShapeAfterDelete([20, 10, 30, 40, 50], 40, ["Element: 30", "| Element: 10 20", "| Element: 50"]);
  });

  test('Predecessor taken from a 3-node leaf leaves no hole', () => {
    expectShapeAfterDelete([20, 10, 30, 40, 50, 15], 20,
      ["Element: 15 40", "| Element: 10", "| Element: 30", "| Element: 50"]);
  });

  test('Predecessor extraction repairs holes on the way up', () => {
    // root (20) over (5)->(1),(10) and (40)->(30),(50)
    expectShapeAfterDelete([20, 10, 30, 40, 50, 5, 1], 20,
      ["Element: 10 40", "| Element: 1 5", "| Element: 30", "| Element: 50"]);
  });
});

describe('Hole propagation', () =>
{
  test('A hole travels to the root and the tree loses a level', () => {
    const tree = treeOf([20, 10, 30, 40, 50, 5, 1]);
    expect(tree.height).toBe(2);
    expect(tree.delete(1)).toBe(true);
    tree.checkValid();
    expect(tree.height).toBe(1);
    expect(tree.dump().split('\n')).toEqual([
      "Tree(6):",
      "Element: 20 40",
      "| Element: 5 10",
      "| Element: 30",
      "| Element: 50",
    ]);
  });

  test('Deleting down to one leaf from a full binary tree', () => {
    const keys: number[] = [];
    for (let k = 1; k <= 15; k++)
      keys.push(k);
    const tree = treeOf(keys);
    for (let k = 15; k >= 3; k--) {
      expect(tree.delete(k)).toBe(true);
      tree.checkValid();
      expect(leafDepths(tree)).toHaveLength(1);
    }
    expect(tree.dump()).toBe("Tree(2):\nElement: 1 2");
  });
});
