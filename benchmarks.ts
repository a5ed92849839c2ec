#!/usr/bin/env ts-node
import TwoThreeTree from './two-three-tree';
import SortedArray from './sorted-array';
import {RBTree} from 'bintrees';

class Timer {
  start = Date.now();
  ms() { return Date.now() - this.start; }
  restart() { var ms = this.ms(); this.start += ms; return ms; }
}

function randInt(max: number) { return Math.random() * max | 0; }

function swap(keys: number[], i: number, j: number) {
  var tmp = keys[i];
  keys[i] = keys[j];
  keys[j] = tmp;
}

function makeArray(size: number, randomOrder: boolean, spacing = 10) {
  var keys: number[] = [], i, n;
  for (i = 0, n = 0; i < size; i++, n += 1 + randInt(spacing))
    keys[i] = n;
  if (randomOrder)
    for (i = 0; i < size; i++)
      swap(keys, i, randInt(size));
  return keys;
}

function measure<T=void>(message: (t:T) => string, callback: () => T, minMillisec: number = 600, log = console.log) {
  var timer = new Timer(), counter = 0, ms;
  do {
    var result = callback();
    counter++;
  } while ((ms = timer.ms()) < minMillisec);
  ms /= counter;
  log((Math.round(ms * 10) / 10) + "\t" + message(result));
  return result;
}

const compareNumbers = (a: number, b: number) => a - b;

function fillTree(keys: number[]) {
  const tree = new TwoThreeTree<number>();
  for (const k of keys)
    tree.insert(k, k);
  return tree;
}

function fillRBTree(keys: number[]) {
  const tree = new RBTree<number>(compareNumbers);
  for (const k of keys)
    tree.insert(k);
  return tree;
}

// Sizes may be given on the command line: npm run benchmark -- 1000 50000
const argSizes = process.argv.slice(2).map(Number).filter(n => Number.isInteger(n) && n > 0);
const sizes = argSizes.length > 0 ? argSizes : [1000, 10000, 100000];

console.log("Benchmark results (milliseconds with integer keys/values)");
console.log("---------------------------------------------------------");

console.log();
console.log("### Insertions at random locations ###");

for (let size of sizes) {
  console.log();
  const keys = makeArray(size, true);

  measure(tree => `Insert ${tree.size} pairs in TwoThreeTree`, () => fillTree(keys));
  measure(tree => `Insert ${tree.size} items in bintrees' RBTree (no values)`, () => fillRBTree(keys));
  measure(map => `Insert ${map.size} pairs in Map (unsorted)`, () => {
    const map = new Map<number, number>();
    for (const k of keys)
      map.set(k, k);
    return map;
  });
  if (size <= 10000)
    measure(list => `Insert ${list.size} pairs in SortedArray`, () => {
      const list = new SortedArray<number>();
      for (const k of keys)
        list.insert(k, k);
      return list;
    });
}

console.log();
console.log("### Insertions in sorted order ###");

for (let size of sizes) {
  console.log();
  const keys = makeArray(size, false);

  measure(tree => `Insert ${tree.size} sorted pairs in TwoThreeTree`, () => fillTree(keys));
  measure(tree => `Insert ${tree.size} sorted items in bintrees' RBTree (no values)`, () => fillRBTree(keys));
}

console.log();
console.log("### Lookups ###");

for (let size of sizes) {
  console.log();
  const keys = makeArray(size, true);
  const tree = fillTree(keys), rbtree = fillRBTree(keys);

  measure(found => `Find ${found} keys in a TwoThreeTree of size ${size}`, () => {
    var found = 0;
    for (const k of keys)
      if (tree.find(k) !== undefined)
        found++;
    return found;
  });
  measure(found => `Find ${found} keys in a bintrees RBTree of size ${size}`, () => {
    var found = 0;
    for (const k of keys)
      if (rbtree.find(k) !== null)
        found++;
    return found;
  });
}

console.log();
console.log("### Deletions in random order ###");

for (let size of sizes) {
  console.log();
  const keys = makeArray(size, true);
  const order = keys.slice();
  for (let i = 0; i < size; i++)
    swap(order, i, randInt(size));

  measure(() => `Insert ${size} then delete them all from TwoThreeTree`, () => {
    const tree = fillTree(keys);
    for (const k of order)
      tree.delete(k);
    return tree.size;
  });
  measure(() => `Insert ${size} then delete them all from bintrees' RBTree`, () => {
    const tree = fillRBTree(keys);
    for (const k of order)
      tree.remove(k);
    return tree.size;
  });
}
