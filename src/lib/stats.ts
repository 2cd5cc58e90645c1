export const mean = (values: readonly number[]): number => {
  if (!values.length) return Number.NaN
  return values.reduce((acc, v) => acc + v, 0) / values.length
}

// Population standard deviation (divides by N, not N - 1).
export const populationStd = (values: readonly number[]): number => {
  if (!values.length) return Number.NaN
  const m = mean(values)
  const sq = values.reduce((acc, v) => acc + (v - m) ** 2, 0)
  return Math.sqrt(sq / values.length)
}
