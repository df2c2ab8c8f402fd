/**
 * Longest common subsequence over two arrays.
 *
 * Returns the aligned index pairs in increasing order. Common prefixes and
 * suffixes are peeled off before the quadratic table is built.
 */
export function longestCommonSubsequence<A, B>(
  a: readonly A[],
  b: readonly B[],
  equal: (x: A, y: B) => boolean,
): Array<[number, number]> {
  const head: Array<[number, number]> = [];
  let start = 0;
  while (start < a.length && start < b.length && equal(a[start], b[start])) {
    head.push([start, start]);
    start++;
  }

  const tail: Array<[number, number]> = [];
  let endA = a.length;
  let endB = b.length;
  while (endA > start && endB > start && equal(a[endA - 1], b[endB - 1])) {
    endA--;
    endB--;
    tail.unshift([endA, endB]);
  }

  const n = endA - start;
  const m = endB - start;
  if (n === 0 || m === 0) return [...head, ...tail];

  const width = m + 1;
  const table = new Uint32Array((n + 1) * width);
  for (let i = 1; i <= n; i++) {
    for (let j = 1; j <= m; j++) {
      table[i * width + j] = equal(a[start + i - 1], b[start + j - 1])
        ? table[(i - 1) * width + j - 1] + 1
        : Math.max(table[(i - 1) * width + j], table[i * width + j - 1]);
    }
  }

  const middle: Array<[number, number]> = [];
  let i = n;
  let j = m;
  while (i > 0 && j > 0) {
    if (
      equal(a[start + i - 1], b[start + j - 1]) &&
      table[i * width + j] === table[(i - 1) * width + j - 1] + 1
    ) {
      middle.push([start + i - 1, start + j - 1]);
      i--;
      j--;
    } else if (table[(i - 1) * width + j] >= table[i * width + j - 1]) {
      i--;
    } else {
      j--;
    }
  }
  middle.reverse();

  return [...head, ...middle, ...tail];
}
