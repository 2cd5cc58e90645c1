import { GridParseError, type BadCell } from './errors'
import { parseTableText, type Separator } from './tableText'

export type AbsorbanceGrid = {
  headers: readonly string[]
  // values[row][column]; rows are replicate readings.
  values: readonly (readonly number[])[]
}

export type ParsedGrid = {
  grid: AbsorbanceGrid
  warnings: string[]
}

const MISSING_TOKENS = ['NA', 'NAN', 'N/A', '#N/A']

const toAbsorbance = (value: string): number | null => {
  const s = value.trim()
  if (!s) return Number.NaN
  if (MISSING_TOKENS.includes(s.toUpperCase())) return Number.NaN
  const n = Number(s)
  return Number.isFinite(n) ? n : null
}

export const columnCount = (grid: AbsorbanceGrid) => grid.headers.length

export const columnValues = (grid: AbsorbanceGrid, column: number): number[] =>
  grid.values.map((row) => row[column])

/**
 * Reads a delimited absorbance table whose first line is the header.
 * Blank and NA cells become NaN; any other non-numeric cell is an error.
 */
export const parseAbsorbanceGrid = (text: string, separator?: Separator): ParsedGrid => {
  const table = parseTableText(text, { hasHeader: true, separator })

  const bad: BadCell[] = []
  const values = table.rows.map((row, rowIdx) =>
    row.map((cell, colIdx) => {
      const n = toAbsorbance(cell)
      if (n === null) {
        bad.push({ row: rowIdx, column: colIdx, text: cell })
        return Number.NaN
      }
      return n
    })
  )
  if (bad.length) throw new GridParseError(bad)

  const warnings = [...table.warnings]
  if (values.some((row) => row.some((v) => Number.isNaN(v)))) {
    warnings.push('Some absorbance cells are blank; means over those columns will be NaN.')
  }

  return { grid: { headers: table.headers, values }, warnings }
}
