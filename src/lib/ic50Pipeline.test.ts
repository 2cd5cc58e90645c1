import { describe, expect, it } from 'vitest'
import type { AbsorbanceGrid } from './absorbanceGrid'
import { EmptyGridError, IndexOutOfRangeError, RaggedGridError, ShapeMismatchError } from './errors'
import {
  computeIc50,
  correctBackground,
  estimateIc50,
  normalizeViability,
  validateIc50Inputs,
  type Ic50Config,
  type ViabilityPoint,
} from './ic50Pipeline'

// Columns: 0 blank, 1 cells without MTT, 2 untreated + MTT, 3..7 drug at 1, 2, 4, 8, 16.
const plate: AbsorbanceGrid = {
  headers: ['Blank', 'Cells', 'Cells+MTT', 'D1', 'D2', 'D4', 'D8', 'D16'],
  values: [
    [0.05, 0.06, 1.0, 0.98, 0.8, 0.6, 0.43, 0.22],
    [0.06, 0.05, 1.1, 1.0, 0.81, 0.62, 0.43, 0.24],
    [0.04, 0.07, 0.9, 1.02, 0.82, 0.64, 0.43, 0.26],
  ],
}

const config = (overrides: Partial<Ic50Config['columns']> = {}, concentrations = [1, 2, 4, 8, 16]): Ic50Config => ({
  grid: plate,
  columns: {
    negativeControl: 0,
    untreatedReference: 2,
    cellsWithoutStain: 1,
    treatmentColumns: [3, 4, 5, 6, 7],
    ...overrides,
  },
  concentrations,
})

const curveOf = (concentrations: number[], viabilities: number[]): ViabilityPoint[] =>
  concentrations.map((concentration, i) => ({
    column: i,
    concentration,
    meanViabilityPercent: viabilities[i],
    stdDevViabilityPercent: 0,
  }))

describe('validateIc50Inputs', () => {
  it('accepts a consistent configuration', () => {
    expect(() => validateIc50Inputs(config())).not.toThrow()
  })

  it('rejects a concentration count that differs from the treatment count', () => {
    let caught: unknown
    try {
      validateIc50Inputs(config({}, [1, 2, 4, 8]))
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ShapeMismatchError)
    if (!(caught instanceof ShapeMismatchError)) return
    expect(caught.concentrationCount).toBe(4)
    expect(caught.treatmentCount).toBe(5)
    expect(caught.message).toBe('Number of concentrations (4) does not match number of treatment columns (5).')
  })

  it('rejects column indices outside the grid', () => {
    let caught: unknown
    try {
      validateIc50Inputs(config({ treatmentColumns: [3, 4, 5, 6, 8] }))
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(IndexOutOfRangeError)
    if (!(caught instanceof IndexOutOfRangeError)) return
    expect(caught.role).toBe('treatment')
    expect(caught.index).toBe(8)
    expect(caught.columnCount).toBe(8)
    expect(caught.message).toBe('Treatment column index 8 is outside 0..7.')

    expect(() => validateIc50Inputs(config({ negativeControl: -1 }))).toThrow(IndexOutOfRangeError)
    expect(() => validateIc50Inputs(config({ untreatedReference: 1.5 }))).toThrow(IndexOutOfRangeError)
    expect(() => validateIc50Inputs(config({ cellsWithoutStain: 9 }))).toThrow('Cells without MTT column index 9')
  })

  it('reports the count mismatch before a bad index', () => {
    expect(() => validateIc50Inputs(config({ treatmentColumns: [3, 4, 5, 6, 99] }, [1, 2]))).toThrow(ShapeMismatchError)
  })

  it('rejects empty and ragged grids', () => {
    expect(() => validateIc50Inputs({ ...config(), grid: { headers: plate.headers, values: [] } })).toThrow(EmptyGridError)
    expect(() => validateIc50Inputs(config({ treatmentColumns: [] }, []))).toThrow(EmptyGridError)
    expect(() =>
      validateIc50Inputs({ ...config(), grid: { headers: plate.headers, values: [plate.values[0], [0.1, 0.2]] } })
    ).toThrow(RaggedGridError)
  })
})

describe('correctBackground', () => {
  it('subtracts the negative-control mean from every cell', () => {
    const { values, negativeControlMean } = correctBackground(plate, 0)
    const expectedMean = (0.05 + 0.06 + 0.04) / 3
    expect(negativeControlMean).toBe(expectedMean)
    plate.values.forEach((row, r) => {
      row.forEach((v, c) => {
        expect(values[r][c]).toBe(v - expectedMean)
      })
    })
  })

  it('is pure: same output on repeat and input untouched', () => {
    const before = plate.values.map((row) => [...row])
    const a = correctBackground(plate, 0)
    const b = correctBackground(plate, 0)
    expect(a).toEqual(b)
    expect(plate.values).toEqual(before)
    expect(a.values).not.toBe(plate.values)
  })
})

describe('normalizeViability', () => {
  it('gives exactly 100% for a column equal to the reference', () => {
    const { values } = correctBackground(plate, 0)
    const { curve } = normalizeViability(values, 2, [2], [1])
    expect(curve[0].meanViabilityPercent).toBe(100)
  })

  it('keeps input order and uses the population SD', () => {
    const { values } = correctBackground(plate, 0)
    const { curve, referenceMean } = normalizeViability(values, 2, [7, 3], [16, 1])
    expect(referenceMean).toBeCloseTo(0.95, 12)
    expect(curve.map((p) => p.column)).toEqual([7, 3])
    expect(curve.map((p) => p.concentration)).toEqual([16, 1])
    expect(curve[0].meanViabilityPercent).toBeCloseTo(20, 10)
    // Replicates 0.98 / 1.00 / 1.02: population SD 0.0163299 over 0.95.
    expect(curve[1].stdDevViabilityPercent).toBeCloseTo(1.71894, 4)
  })

  it('does not special-case a zero reference mean', () => {
    const { curve, referenceMean } = normalizeViability([[0, 0.4], [0, 0.2]], 0, [1], [1])
    expect(referenceMean).toBe(0)
    expect(curve[0].meanViabilityPercent).toBe(Number.POSITIVE_INFINITY)
  })
})

describe('estimateIc50', () => {
  it('interpolates the 50% crossing on a falling curve', () => {
    const ic50 = estimateIc50(curveOf([1, 2, 4, 8, 16], [100, 90, 70, 40, 10]))
    expect(ic50).toBeGreaterThan(4)
    expect(ic50).toBeLessThan(8)
    expect(ic50.toFixed(2)).toBe('6.67')
  })

  it('clamps to the lowest-viability end when viability never drops to 50%', () => {
    expect(estimateIc50(curveOf([1, 2, 4, 8, 16], [100, 95, 90, 85, 80]))).toBe(16)
  })

  it('clamps to the highest-viability end when viability starts below 50%', () => {
    expect(estimateIc50(curveOf([1, 2, 4], [40, 30, 20]))).toBe(1)
  })

  it('returns the tested concentration when a point sits exactly on 50%', () => {
    expect(estimateIc50(curveOf([1, 2, 4], [90, 50, 10]))).toBe(2)
  })
})

describe('computeIc50', () => {
  it('runs the full pipeline on a triplicate plate', () => {
    const result = computeIc50(config())
    expect(result.negativeControlMean).toBeCloseTo(0.05, 12)
    expect(result.referenceMean).toBeCloseTo(0.95, 12)
    expect(result.curve).toHaveLength(5)
    expect(result.curve[0].concentration).toBe(1)
    expect(result.curve[0].meanViabilityPercent).toBeCloseTo(100, 10)
    expect(result.curve.map((p) => Number(p.meanViabilityPercent.toFixed(6)))).toEqual([100, 80, 60, 40, 20])
    expect(result.ic50).toBeCloseTo(6, 10)
    expect(result.bracketed).toBe(true)
    expect(result.warnings).toEqual([])
  })

  it('throws before any numeric work on a shape mismatch', () => {
    expect(() => computeIc50(config({}, [1, 2, 4, 8]))).toThrow(ShapeMismatchError)
  })

  it('flags a clamped estimate', () => {
    const result = computeIc50(config({ treatmentColumns: [3, 4] }, [1, 2]))
    expect(result.ic50).toBe(2)
    expect(result.bracketed).toBe(false)
    expect(result.warnings.map((w) => w.code)).toEqual(['notBracketed'])
  })

  it('flags descending concentrations but still interpolates as given', () => {
    const result = computeIc50(config({}, [16, 8, 4, 2, 1]))
    expect(result.ic50).toBeCloseTo(3, 10)
    expect(result.warnings.map((w) => w.code)).toEqual(['unsortedConcentrations'])
  })

  it('flags viability that rises with concentration', () => {
    const result = computeIc50(config({ treatmentColumns: [3, 5, 4, 6, 7] }))
    expect(result.warnings.map((w) => w.code)).toEqual(['nonMonotonicViability'])
  })

  it('flags a column used in two roles', () => {
    const result = computeIc50(config({ treatmentColumns: [3, 4, 5, 6, 2] }))
    expect(result.warnings[0]).toEqual({
      code: 'duplicateRoleColumn',
      message: 'Column 2 is used as both Untreated reference and Treatment.',
    })
  })

  it('lets the cells-without-MTT column share another role silently', () => {
    expect(computeIc50(config({ cellsWithoutStain: 2 })).warnings).toEqual([])
    expect(computeIc50(config({ cellsWithoutStain: 0 })).warnings).toEqual([])
  })

  it('flags non-positive concentrations', () => {
    const result = computeIc50(config({}, [0, 2, 4, 8, 16]))
    expect(result.warnings.map((w) => w.code)).toEqual(['nonPositiveConcentration'])
  })

  it('reports a zero reference mean instead of throwing', () => {
    const grid: AbsorbanceGrid = {
      headers: ['Blank', 'Ref', 'D1'],
      values: [
        [0.1, 0.1, 0.5],
        [0.1, 0.1, 0.3],
      ],
    }
    const result = computeIc50({
      grid,
      columns: { negativeControl: 0, untreatedReference: 1, treatmentColumns: [2] },
      concentrations: [1],
    })
    expect(result.referenceMean).toBe(0)
    expect(result.curve[0].meanViabilityPercent).toBe(Number.POSITIVE_INFINITY)
    expect(result.warnings).toEqual([
      {
        code: 'nonFiniteViability',
        message: 'Untreated reference mean is zero after background correction; viability and IC50 are undefined.',
      },
    ])
  })

  it('reports a blank treatment cell as a non-finite viability', () => {
    const grid: AbsorbanceGrid = {
      headers: ['Blank', 'Ref', 'D1', 'D2'],
      values: [
        [0, 1, 0.6, 0.3],
        [0, 1, Number.NaN, 0.3],
      ],
    }
    const result = computeIc50({
      grid,
      columns: { negativeControl: 0, untreatedReference: 1, treatmentColumns: [2, 3] },
      concentrations: [1, 2],
    })
    expect(result.referenceMean).toBe(1)
    expect(result.curve[0].meanViabilityPercent).toBeNaN()
    expect(result.curve[1].meanViabilityPercent).toBeCloseTo(30, 10)
    expect(result.warnings).toEqual([
      {
        code: 'nonFiniteViability',
        message: 'Some viability values are not finite; the IC50 estimate may be meaningless.',
      },
    ])
  })
})
