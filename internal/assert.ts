/** Throws if `fact` is false. The message is "2-3 tree:" followed by `parts`, space-separated. */
export function check(fact: boolean, ...parts: unknown[]): asserts fact {
  if (!fact) {
    parts.unshift('2-3 tree:'); // at beginning of message
    throw new Error(parts.join(' '));
  }
}
