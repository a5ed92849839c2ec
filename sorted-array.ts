import { IIndex } from './interfaces';
import { Element } from './internal/nodes';

/** A super-inefficient sorted list for testing purposes */
export default class SortedArray<V=number> implements IIndex<V>
{
  a: Element<V>[];

  public constructor(entries?: [number, V][]) {
    this.a = [];
    if (entries !== undefined)
      for (var e of entries)
        this.insert(e[0], e[1]);
  }

  get size() { return this.a.length; }
  find(key: number): Element<V> | undefined {
    return this.a[this.indexOf(key, -1)];
  }
  get(key: number, defaultValue?: V): V | undefined {
    var elem = this.find(key);
    return elem === undefined ? defaultValue : elem.value;
  }
  has(key: number): boolean {
    return this.indexOf(key, -1) >= 0;
  }
  insert(key: number, value: V, overwrite?: boolean): boolean {
    var i = this.indexOf(key, -1);
    if (i <= -1)
      this.a.splice(~i, 0, {key, value});
    else if (overwrite)
      this.a[i].value = value;
    return i <= -1;
  }
  delete(key: number): boolean {
    var i = this.indexOf(key, -1);
    if (i > -1)
      this.a.splice(i, 1);
    return i > -1;
  }
  clear() { this.a = []; }
  getArray() { return this.a; }
  keys(): number[] { return this.a.map(elem => elem.key); }

  indexOf(key: number, failXor: number): number {
    var lo = 0, hi = this.a.length, mid = hi >> 1;
    while(lo < hi) {
      var k = this.a[mid].key;
      if (k < key)
        lo = mid + 1;
      else if (k > key)
        hi = mid;
      else if (k === key)
        return mid;
      else
        throw new Error("Problem: compare failed");
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }
}
