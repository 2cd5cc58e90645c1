import { parseAbsorbanceGrid, type AbsorbanceGrid } from './absorbanceGrid'
import { Ic50InputError } from './errors'
import { computeIc50, type Ic50Result } from './ic50Pipeline'
import { parseColumnIndexList, parseConcentrationList } from './listInput'
import type { Separator } from './tableText'

export type Ic50FormState = {
  gridText: string
  separator?: Separator
  negativeControl: number
  cellsWithoutStain: number
  untreatedReference: number
  concentrationsText: string
  treatmentColumnsText: string
}

export type Ic50FormOutcome =
  | { kind: 'empty' }
  | { kind: 'error'; message: string; grid: AbsorbanceGrid | null; gridWarnings: string[] }
  | { kind: 'ok'; result: Ic50Result; grid: AbsorbanceGrid; gridWarnings: string[] }

const messageOf = (err: unknown): string => {
  if (err instanceof Ic50InputError) return err.message
  throw err
}

/**
 * Turns the raw form fields into an IC50 result. Input problems come back as an
 * `error` outcome; anything else is rethrown.
 */
export const evaluateIc50Form = (form: Ic50FormState): Ic50FormOutcome => {
  if (!form.gridText.trim()) return { kind: 'empty' }

  const parsed = (() => {
    try {
      return parseAbsorbanceGrid(form.gridText, form.separator)
    } catch (err) {
      return messageOf(err)
    }
  })()
  if (typeof parsed === 'string') return { kind: 'error', message: parsed, grid: null, gridWarnings: [] }

  try {
    const concentrations = parseConcentrationList(form.concentrationsText)
    const treatmentColumns = parseColumnIndexList(form.treatmentColumnsText)
    const result = computeIc50({
      grid: parsed.grid,
      columns: {
        negativeControl: form.negativeControl,
        untreatedReference: form.untreatedReference,
        cellsWithoutStain: form.cellsWithoutStain,
        treatmentColumns,
      },
      concentrations,
    })
    return { kind: 'ok', result, grid: parsed.grid, gridWarnings: parsed.warnings }
  } catch (err) {
    return { kind: 'error', message: messageOf(err), grid: parsed.grid, gridWarnings: parsed.warnings }
  }
}
