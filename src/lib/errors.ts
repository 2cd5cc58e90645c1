export type ColumnRole = 'negativeControl' | 'untreatedReference' | 'cellsWithoutStain' | 'treatment'

const ROLE_LABELS: Record<ColumnRole, string> = {
  negativeControl: 'Negative control',
  untreatedReference: 'Untreated reference',
  cellsWithoutStain: 'Cells without MTT',
  treatment: 'Treatment',
}

export const columnRoleLabel = (role: ColumnRole) => ROLE_LABELS[role]

/** Base class for every input problem that blocks the IC50 computation. */
export class Ic50InputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class ShapeMismatchError extends Ic50InputError {
  readonly concentrationCount: number
  readonly treatmentCount: number

  constructor(concentrationCount: number, treatmentCount: number) {
    super(
      `Number of concentrations (${concentrationCount}) does not match number of treatment columns (${treatmentCount}).`
    )
    this.concentrationCount = concentrationCount
    this.treatmentCount = treatmentCount
  }
}

export class IndexOutOfRangeError extends Ic50InputError {
  readonly role: ColumnRole
  readonly index: number
  readonly columnCount: number

  constructor(role: ColumnRole, index: number, columnCount: number) {
    super(`${columnRoleLabel(role)} column index ${index} is outside 0..${columnCount - 1}.`)
    this.role = role
    this.index = index
    this.columnCount = columnCount
  }
}

export class EmptyGridError extends Ic50InputError {}

export class RaggedGridError extends Ic50InputError {
  readonly row: number
  readonly expected: number
  readonly actual: number

  constructor(row: number, expected: number, actual: number) {
    super(`Row ${row + 1} has ${actual} cells; expected ${expected}.`)
    this.row = row
    this.expected = expected
    this.actual = actual
  }
}

export type BadCell = { row: number; column: number; text: string }

export class GridParseError extends Ic50InputError {
  readonly cells: BadCell[]

  constructor(cells: BadCell[]) {
    const shown = cells
      .slice(0, 5)
      .map((c) => `row ${c.row + 1}, column ${c.column} ("${c.text}")`)
      .join('; ')
    const more = cells.length > 5 ? ` and ${cells.length - 5} more` : ''
    super(`Non-numeric absorbance values: ${shown}${more}.`)
    this.cells = cells
  }
}

export class ListParseError extends Ic50InputError {
  readonly field: string
  readonly entry: string

  constructor(field: string, entry: string, reason: string) {
    super(`${field}: ${reason} ("${entry}").`)
    this.field = field
    this.entry = entry
  }
}
