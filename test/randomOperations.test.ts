import TwoThreeTree from '../two-three-tree';
import SortedArray from '../sorted-array';
import { addToBoth, deleteFromBoth, expectTreeEqualTo, leafDepths, makeArray, randInt } from './shared';

describe('Random operations compared with a sorted array', () =>
{
  for (const keyRange of [10, 100, 1000]) {
    test(`Interleaved inserts and deletes [keys below ${keyRange}]`, () => {
      const tree = new TwoThreeTree<number>();
      const list = new SortedArray<number>();
      for (let i = 0; i < 2000; i++) {
        const k = randInt(keyRange);
        if (randInt(100) < 55)
          addToBoth(tree, list, k, i);
        else
          deleteFromBoth(tree, list, k);
        tree.checkValid();
        expect(tree.size).toBe(list.size);
      }
      expectTreeEqualTo(tree, list);
      for (let k = 0; k < keyRange; k++)
        expect(tree.has(k)).toBe(list.has(k));
    });
  }

  test('Overwrites agree with the sorted array', () => {
    const tree = new TwoThreeTree<number>();
    const list = new SortedArray<number>();
    for (let i = 0; i < 500; i++) {
      const k = randInt(50);
      expect(tree.insert(k, i, true)).toBe(list.insert(k, i, true));
    }
    expectTreeEqualTo(tree, list);
  });

  for (const size of [10, 100, 1000]) {
    test(`Fill and drain in random order [size ${size}]`, () => {
      const keys = makeArray(size, true);
      const tree = new TwoThreeTree<number>();
      const list = new SortedArray<number>();
      for (const k of keys)
        addToBoth(tree, list, k, k * 2);
      expectTreeEqualTo(tree, list);
      expect(leafDepths(tree)).toHaveLength(1);

      const order = makeArray(size, true, 1).map(i => keys[i - 1]);
      for (const k of order) {
        deleteFromBoth(tree, list, k);
        tree.checkValid();
      }
      expect(tree.isEmpty).toBe(true);
      expect(list.size).toBe(0);
    });
  }
});
