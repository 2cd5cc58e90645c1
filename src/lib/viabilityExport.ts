import type { Ic50Result } from './ic50Pipeline'

const fmt2 = (n: number) => (Number.isFinite(n) ? n.toFixed(2) : String(n))

export const formatIc50 = (ic50: number, unit: string) => `${fmt2(ic50)} ${unit}`.trim()

export const plotTitle = (drugName: string) => `MTT Assay - IC50 Determination for ${drugName.trim() || 'Drug'}`

export const viabilityTsv = (result: Pick<Ic50Result, 'curve' | 'ic50'>, unit: string): string => {
  const unitSuffix = unit.trim() ? ` (${unit.trim()})` : ''
  const lines = [[`Concentration${unitSuffix}`, 'Column', 'Mean viability (%)', 'SD (%)'].join('\t')]
  for (const p of result.curve) {
    lines.push([String(p.concentration), String(p.column), fmt2(p.meanViabilityPercent), fmt2(p.stdDevViabilityPercent)].join('\t'))
  }
  lines.push(`IC50${unitSuffix}\t${fmt2(result.ic50)}`)
  return lines.join('\n')
}

export const exportFileName = (drugName: string) => {
  const slug = drugName
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return `${slug || 'drug'}-ic50.tsv`
}
