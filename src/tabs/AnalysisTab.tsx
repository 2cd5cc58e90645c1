import { useState } from 'react'
import { ViabilityPlot } from '../components/ViabilityPlot'
import type { Ic50FormOutcome } from '../lib/ic50Form'
import { exportFileName, formatIc50, plotTitle, viabilityTsv } from '../lib/viabilityExport'

export type AnalysisTabProps = {
  outcome: Ic50FormOutcome
  drugName: string
  unit: string
}

const fmt = (n: number) => (Number.isFinite(n) ? n.toFixed(2) : String(n))

export function AnalysisTab({ outcome, drugName, unit }: AnalysisTabProps) {
  const [xScale, setXScale] = useState<'linear' | 'log10'>('linear')

  if (outcome.kind === 'empty') {
    return (
      <div data-testid="analysis-tab">
        <div className="shell">
          <section className="card">
            <p className="muted">Upload or paste an absorbance table in the Data tab to compute the IC50.</p>
          </section>
        </div>
      </div>
    )
  }

  if (outcome.kind === 'error') {
    return (
      <div data-testid="analysis-tab">
        <div className="shell">
          <section className="card">
            <div className="alert error" role="alert" data-testid="input-error">
              <strong>Cannot compute IC50:</strong> {outcome.message}
            </div>
          </section>
        </div>
      </div>
    )
  }

  const { result } = outcome
  const tsv = viabilityTsv(result, unit)

  const copyTsv = async () => {
    await navigator.clipboard.writeText(tsv)
    alert('Viability table copied (TSV).')
  }

  const downloadTsv = () => {
    const url = URL.createObjectURL(new Blob([tsv], { type: 'text/tab-separated-values' }))
    const a = document.createElement('a')
    a.href = url
    a.download = exportFileName(drugName)
    a.click()
    URL.revokeObjectURL(url)
  }

  return (
    <div data-testid="analysis-tab">
      <div className="shell grid-2 tall">
        <section className="card" data-testid="plot-card">
          <div className="section-head">
            <div>
              <p className="kicker">Step 3 · Dose response</p>
              <h2>% Viability ± SD</h2>
            </div>
            <label className="control">
              <span>X axis</span>
              <select value={xScale} onChange={(e) => setXScale(e.target.value === 'log10' ? 'log10' : 'linear')}>
                <option value="linear">Linear</option>
                <option value="log10">Log10</option>
              </select>
            </label>
          </div>
          <ViabilityPlot curve={result.curve} ic50={result.ic50} unit={unit} title={plotTitle(drugName)} xScale={xScale} />
        </section>

        <section className="card" data-testid="result-card">
          <div className="section-head">
            <div>
              <p className="kicker">Step 4 · Result</p>
              <h2 data-testid="ic50-headline">Estimated IC50: {formatIc50(result.ic50, unit)}</h2>
              <p className="muted">
                Background (negative control mean): {result.negativeControlMean.toFixed(4)} · Untreated reference mean after
                correction: {result.referenceMean.toFixed(4)}
              </p>
            </div>
          </div>

          {result.warnings.length > 0 && (
            <div className="alert warn" role="alert" data-testid="result-warnings">
              <div>
                <strong>Check these before reporting:</strong>
                <ul className="bullets">
                  {result.warnings.map((w, idx) => (
                    <li key={`${w.code}-${idx}`}>{w.message}</li>
                  ))}
                </ul>
              </div>
            </div>
          )}

          <div className="table-wrap">
            <table className="table" data-testid="viability-table">
              <thead>
                <tr>
                  <th>Concentration{unit.trim() ? ` (${unit.trim()})` : ''}</th>
                  <th>Column</th>
                  <th>Mean viability (%)</th>
                  <th>SD (%)</th>
                </tr>
              </thead>
              <tbody>
                {result.curve.map((p, idx) => (
                  <tr key={idx}>
                    <td>{p.concentration}</td>
                    <td>{p.column}</td>
                    <td>{fmt(p.meanViabilityPercent)}</td>
                    <td>{fmt(p.stdDevViabilityPercent)}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>

          <div className="cta-row">
            <div className="row">
              <button className="ghost" type="button" onClick={copyTsv}>
                Copy TSV
              </button>
              <button className="primary" type="button" onClick={downloadTsv} data-testid="download-tsv-btn">
                Download TSV
              </button>
            </div>
          </div>
        </section>
      </div>
    </div>
  )
}
