// Knots above this many are located by guess checks then bisection.
const LINEAR_SEARCH_MAX = 4
const LIKELY_IN_CACHE_SIZE = 8

/**
 * Index `j` of the segment `[xp[j], xp[j + 1])` holding `key`: -1 below `xp[0]`,
 * `xp.length` above the last knot. Short arrays are scanned; longer ones check
 * the knots around `guess` and then bisect, so on a non-monotonic `xp` the
 * segment found depends on the array length.
 */
const searchSegment = (key: number, xp: readonly number[], guess: number): number => {
  const len = xp.length
  if (key > xp[len - 1]) return len
  if (key < xp[0]) return -1

  if (len <= LINEAR_SEARCH_MAX) {
    let i = 1
    while (i < len && key >= xp[i]) i += 1
    return i - 1
  }

  let g = Math.max(1, Math.min(guess, len - 3))
  let imin = 0
  let imax = len

  if (key < xp[g]) {
    if (key >= xp[g - 1]) return g - 1
    imax = g - 1
    if (g > LIKELY_IN_CACHE_SIZE && key >= xp[g - LIKELY_IN_CACHE_SIZE]) imin = g - LIKELY_IN_CACHE_SIZE
  } else {
    if (key < xp[g + 1]) return g
    if (key < xp[g + 2]) return g + 1
    imin = g + 2
    if (g < len - LIKELY_IN_CACHE_SIZE - 1 && key < xp[g + LIKELY_IN_CACHE_SIZE]) imax = g + LIKELY_IN_CACHE_SIZE
  }

  while (imin < imax) {
    g = imin + ((imax - imin) >> 1)
    if (key >= xp[g]) imin = g + 1
    else imax = g
  }
  return imin - 1
}

/**
 * Piecewise-linear interpolation of `(xp, fp)` at `x`.
 *
 * `xp` is expected in non-decreasing order; nothing is sorted here. Above the
 * last knot the result is `fp[n - 1]`, below the first `fp[0]`, and an exact
 * hit on a knot returns that knot's value. With repeated knots the last one
 * that is `<= x` wins. When `xp` is not monotonic the segment is located the
 * same way a bisecting search would, not by a left-to-right scan.
 */
export const interpolateLinear = (x: number, xp: readonly number[], fp: readonly number[]): number => {
  const n = Math.min(xp.length, fp.length)
  if (n === 0) return Number.NaN
  if (n === 1) return fp[0]
  if (Number.isNaN(x)) return x

  const knots = xp.length === n ? xp : xp.slice(0, n)
  const j = searchSegment(x, knots, 0)

  if (j === -1) return fp[0]
  if (j >= n - 1) return fp[n - 1]
  if (knots[j] === x) return fp[j]

  const slope = (fp[j + 1] - fp[j]) / (knots[j + 1] - knots[j])
  const y = slope * (x - knots[j]) + fp[j]
  if (!Number.isNaN(y)) return y

  // Infinite knot values: retry from the right-hand end of the segment.
  const fromRight = slope * (x - knots[j + 1]) + fp[j + 1]
  if (Number.isNaN(fromRight) && fp[j] === fp[j + 1]) return fp[j]
  return fromRight
}
