import { ListParseError } from './errors'

const splitList = (text: string): string[] => {
  const trimmed = text.trim()
  if (!trimmed) return []
  return trimmed.split(',').map((s) => s.trim())
}

export const parseConcentrationList = (text: string): number[] =>
  splitList(text).map((entry) => {
    if (!entry) throw new ListParseError('Concentrations', entry, 'empty entry')
    const n = Number(entry)
    if (!Number.isFinite(n)) throw new ListParseError('Concentrations', entry, 'not a number')
    return n
  })

export const parseColumnIndexList = (text: string): number[] =>
  splitList(text).map((entry) => {
    if (!entry) throw new ListParseError('Treatment columns', entry, 'empty entry')
    if (!/^\d+$/.test(entry)) throw new ListParseError('Treatment columns', entry, 'not a non-negative integer')
    return Number(entry)
  })
