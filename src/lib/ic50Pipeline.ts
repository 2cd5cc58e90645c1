import { columnCount, columnValues, type AbsorbanceGrid } from './absorbanceGrid'
import {
  EmptyGridError,
  IndexOutOfRangeError,
  RaggedGridError,
  ShapeMismatchError,
  columnRoleLabel,
  type ColumnRole,
} from './errors'
import { interpolateLinear } from './interpolate'
import { mean, populationStd } from './stats'

export const IC50_TARGET_PERCENT = 50

export type ColumnSelection = {
  negativeControl: number
  untreatedReference: number
  treatmentColumns: readonly number[]
  // Cells without drug and without MTT. Range-checked and reported, never used numerically.
  cellsWithoutStain?: number
}

export type Ic50Config = {
  grid: AbsorbanceGrid
  columns: ColumnSelection
  concentrations: readonly number[]
}

export type ViabilityPoint = {
  column: number
  concentration: number
  meanViabilityPercent: number
  stdDevViabilityPercent: number
}

export type ViabilityCurve = ViabilityPoint[]

export type Ic50WarningCode =
  | 'nonFiniteViability'
  | 'notBracketed'
  | 'unsortedConcentrations'
  | 'nonMonotonicViability'
  | 'nonPositiveConcentration'
  | 'duplicateRoleColumn'

export type Ic50Warning = {
  code: Ic50WarningCode
  message: string
}

export type Ic50Result = {
  curve: ViabilityCurve
  ic50: number
  negativeControlMean: number
  referenceMean: number
  // True when 50% lies within the range of mean viabilities, i.e. the IC50 was not clamped.
  bracketed: boolean
  warnings: Ic50Warning[]
}

const roleIndices = (columns: ColumnSelection): Array<{ role: ColumnRole; index: number }> => {
  const out: Array<{ role: ColumnRole; index: number }> = [
    { role: 'negativeControl', index: columns.negativeControl },
    { role: 'untreatedReference', index: columns.untreatedReference },
  ]
  if (columns.cellsWithoutStain !== undefined) {
    out.push({ role: 'cellsWithoutStain', index: columns.cellsWithoutStain })
  }
  for (const index of columns.treatmentColumns) out.push({ role: 'treatment', index })
  return out
}

/** Throws an {@link Ic50InputError} subclass for the first problem found. */
export const validateIc50Inputs = ({ grid, columns, concentrations }: Ic50Config): void => {
  const nCols = columnCount(grid)
  if (nCols === 0) throw new EmptyGridError('The absorbance table has no columns.')
  if (grid.values.length === 0) throw new EmptyGridError('The absorbance table has no data rows.')
  grid.values.forEach((row, idx) => {
    if (row.length !== nCols) throw new RaggedGridError(idx, nCols, row.length)
  })

  if (concentrations.length !== columns.treatmentColumns.length) {
    throw new ShapeMismatchError(concentrations.length, columns.treatmentColumns.length)
  }
  if (columns.treatmentColumns.length === 0) {
    throw new EmptyGridError('At least one treatment column is required.')
  }

  for (const { role, index } of roleIndices(columns)) {
    if (!Number.isInteger(index) || index < 0 || index >= nCols) {
      throw new IndexOutOfRangeError(role, index, nCols)
    }
  }
}

export type CorrectedGrid = {
  values: number[][]
  negativeControlMean: number
}

/** Subtracts the negative-control mean from every cell (one scalar for the whole plate). */
export const correctBackground = (grid: AbsorbanceGrid, negativeControl: number): CorrectedGrid => {
  const negativeControlMean = mean(columnValues(grid, negativeControl))
  const values = grid.values.map((row) => row.map((v) => v - negativeControlMean))
  return { values, negativeControlMean }
}

export type NormalizedViability = {
  curve: ViabilityCurve
  referenceMean: number
}

export const normalizeViability = (
  corrected: readonly (readonly number[])[],
  untreatedReference: number,
  treatmentColumns: readonly number[],
  concentrations: readonly number[]
): NormalizedViability => {
  const column = (c: number) => corrected.map((row) => row[c])
  const referenceMean = mean(column(untreatedReference))

  // A zero reference mean yields Infinity/NaN here; computeIc50 reports it.
  const curve = treatmentColumns.map((t, i) => {
    const values = column(t)
    return {
      column: t,
      concentration: concentrations[i],
      meanViabilityPercent: (mean(values) / referenceMean) * 100,
      stdDevViabilityPercent: (populationStd(values) / referenceMean) * 100,
    }
  })

  return { curve, referenceMean }
}

/**
 * Concentration at which mean viability reaches 50%, by linear interpolation with
 * viability as the lookup axis. Both series are reversed first so that a curve
 * entered with ascending concentrations (and falling viability) is ascending in
 * viability. Outside the viability range the result is clamped to the end point.
 */
export const estimateIc50 = (curve: readonly ViabilityPoint[]): number => {
  const reversed = [...curve].reverse()
  return interpolateLinear(
    IC50_TARGET_PERCENT,
    reversed.map((p) => p.meanViabilityPercent),
    reversed.map((p) => p.concentration)
  )
}

const collectWarnings = (
  columns: ColumnSelection,
  concentrations: readonly number[],
  referenceMean: number,
  curve: ViabilityCurve,
  ic50: number,
  bracketed: boolean
): Ic50Warning[] => {
  const warnings: Ic50Warning[] = []

  // The cells-without-MTT column is never read, so sharing it is harmless.
  const seen = new Map<number, ColumnRole>()
  for (const { role, index } of roleIndices(columns)) {
    if (role === 'cellsWithoutStain') continue
    const prev = seen.get(index)
    if (prev !== undefined) {
      warnings.push({
        code: 'duplicateRoleColumn',
        message: `Column ${index} is used as both ${columnRoleLabel(prev)} and ${columnRoleLabel(role)}.`,
      })
    } else {
      seen.set(index, role)
    }
  }

  if (concentrations.some((c) => !Number.isFinite(c) || c <= 0)) {
    warnings.push({ code: 'nonPositiveConcentration', message: 'Concentrations should be positive numbers.' })
  }
  if (concentrations.some((c, i) => i > 0 && c < concentrations[i - 1])) {
    warnings.push({
      code: 'unsortedConcentrations',
      message: 'Concentrations are not in ascending order; the IC50 interpolation assumes they are.',
    })
  }

  const nonFinite =
    referenceMean === 0 ||
    !Number.isFinite(referenceMean) ||
    curve.some((p) => !Number.isFinite(p.meanViabilityPercent) || !Number.isFinite(p.stdDevViabilityPercent)) ||
    !Number.isFinite(ic50)
  if (nonFinite) {
    warnings.push({
      code: 'nonFiniteViability',
      message:
        referenceMean === 0
          ? 'Untreated reference mean is zero after background correction; viability and IC50 are undefined.'
          : 'Some viability values are not finite; the IC50 estimate may be meaningless.',
    })
    return warnings
  }

  if (curve.some((p, i) => i > 0 && p.meanViabilityPercent > curve[i - 1].meanViabilityPercent)) {
    warnings.push({
      code: 'nonMonotonicViability',
      message: 'Mean viability rises with concentration somewhere in the series; the IC50 may be unreliable.',
    })
  }
  if (!bracketed) {
    warnings.push({
      code: 'notBracketed',
      message: `Viability never crosses ${IC50_TARGET_PERCENT}%; the IC50 is clamped to the nearest tested concentration.`,
    })
  }

  return warnings
}

/** Validates the configuration, then runs correction, normalization and IC50 estimation. */
export const computeIc50 = (config: Ic50Config): Ic50Result => {
  validateIc50Inputs(config)
  const { grid, columns, concentrations } = config

  const corrected = correctBackground(grid, columns.negativeControl)
  const { curve, referenceMean } = normalizeViability(
    corrected.values,
    columns.untreatedReference,
    columns.treatmentColumns,
    concentrations
  )
  const ic50 = estimateIc50(curve)

  const viabilities = curve.map((p) => p.meanViabilityPercent)
  const bracketed =
    Math.min(...viabilities) <= IC50_TARGET_PERCENT && Math.max(...viabilities) >= IC50_TARGET_PERCENT

  return {
    curve,
    ic50,
    negativeControlMean: corrected.negativeControlMean,
    referenceMean,
    bracketed,
    warnings: collectWarnings(columns, concentrations, referenceMean, curve, ic50, bracketed),
  }
}
