export type Separator = 'tab' | 'comma' | 'semicolon' | 'pipe' | 'whitespace'

export type TableText = {
  headers: string[]
  rows: string[][]
  maxColumns: number
  warnings: string[]
  separator: Separator
}

type ParseOptions = {
  hasHeader: boolean
  // Skip detection, e.g. for files uploaded as .tsv.
  separator?: Separator
}

export const detectSeparator = (text: string): Separator => {
  const head = text.split(/\r?\n/).slice(0, 5).join('\n')
  const counts: Record<Exclude<Separator, 'whitespace'>, number> = {
    tab: (head.match(/\t/g) ?? []).length,
    comma: (head.match(/,/g) ?? []).length,
    semicolon: (head.match(/;/g) ?? []).length,
    pipe: (head.match(/\|/g) ?? []).length,
  }
  let best: Separator = 'whitespace'
  let bestCount = 0
  // Ties go to the earlier entry, so tab wins over comma.
  for (const sep of ['tab', 'comma', 'semicolon', 'pipe'] as const) {
    if (counts[sep] > bestCount) {
      best = sep
      bestCount = counts[sep]
    }
  }
  return best
}

const splitRow = (line: string, sep: Separator): string[] => {
  if (sep === 'tab') return line.split('\t').map((c) => c.trim())
  if (sep === 'comma') return line.split(',').map((c) => c.trim())
  if (sep === 'semicolon') return line.split(';').map((c) => c.trim())
  if (sep === 'pipe') return line.split('|').map((c) => c.trim())
  return line.trim().split(/\s+/).map((c) => c.trim())
}

export const parseTableText = (text: string, options: ParseOptions): TableText => {
  // Only blank lines are dropped; a leading empty cell is still a cell.
  const rawLines = text
    .replace(/\r/g, '')
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0)
  if (!rawLines.length) {
    return { headers: [], rows: [], maxColumns: 0, warnings: [], separator: options.separator ?? 'whitespace' }
  }

  const separator = options.separator ?? detectSeparator(rawLines.join('\n'))

  const rawRows = rawLines.map((line) => splitRow(line, separator))
  const maxColumns = rawRows.reduce((max, row) => Math.max(max, row.length), 0)

  const warnings: string[] = []
  if (rawRows.some((r) => r.length !== maxColumns)) {
    warnings.push('Some rows have fewer columns than others; missing cells were padded with blanks.')
  }

  const normalized = rawRows.map((row) => {
    if (row.length === maxColumns) return row
    return [...row, ...Array.from({ length: maxColumns - row.length }, () => '')]
  })

  const headers = options.hasHeader
    ? normalized[0].map((h, idx) => (h.trim() ? h.trim() : `Column ${idx}`))
    : Array.from({ length: maxColumns }, (_, idx) => `Column ${idx}`)

  const rows = options.hasHeader ? normalized.slice(1) : normalized
  return { headers, rows, maxColumns, warnings, separator }
}
