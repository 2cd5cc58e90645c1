import type { ChangeEvent } from 'react'
import type { AbsorbanceGrid } from '../lib/absorbanceGrid'

export type DataTabProps = {
  gridText: string
  onChangeGridText: (next: string, fileName: string | null) => void
  fileName: string | null
  grid: AbsorbanceGrid | null
  gridWarnings: string[]
  onLoadExample: () => Promise<void>
  negativeControl: number
  onChangeNegativeControl: (next: number) => void
  cellsWithoutStain: number
  onChangeCellsWithoutStain: (next: number) => void
  untreatedReference: number
  onChangeUntreatedReference: (next: number) => void
  concentrationsText: string
  onChangeConcentrationsText: (next: string) => void
  treatmentColumnsText: string
  onChangeTreatmentColumnsText: (next: string) => void
  drugName: string
  onChangeDrugName: (next: string) => void
  unit: string
  onChangeUnit: (next: string) => void
}

const fmt = (n: number) => (Number.isNaN(n) ? '' : String(n))

type ColumnPickerProps = {
  label: string
  value: number
  onChange: (next: number) => void
  headers: readonly string[]
  testId: string
}

function ColumnPicker({ label, value, onChange, headers, testId }: ColumnPickerProps) {
  if (!headers.length) {
    return (
      <label className="control">
        <span>{label}</span>
        <input
          type="number"
          min={0}
          step={1}
          value={value}
          onChange={(e) => onChange(Number(e.target.value))}
          data-testid={testId}
        />
      </label>
    )
  }
  return (
    <label className="control">
      <span>{label}</span>
      <select value={value} onChange={(e) => onChange(Number(e.target.value))} data-testid={testId}>
        {headers.map((h, idx) => (
          <option key={h + idx} value={idx}>
            {idx} · {h}
          </option>
        ))}
      </select>
    </label>
  )
}

export function DataTab(props: DataTabProps) {
  const { gridText, onChangeGridText, fileName, grid, gridWarnings, onLoadExample } = props
  const headers = grid?.headers ?? []

  const onFile = async (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0]
    if (!file) return
    const text = await file.text()
    onChangeGridText(text, file.name)
  }

  return (
    <div data-testid="data-tab">
      <div className="shell grid-2 tall">
        <section className="card" data-testid="upload-card">
          <div className="section-head">
            <div>
              <p className="kicker">Step 1 · Absorbance data</p>
              <h2>Upload MTT absorbance table</h2>
              <p className="muted">
                Tab-separated file with a header row. Each row is one replicate reading, each column one condition
                (triplicates recommended).
              </p>
            </div>
            <div className="row">
              <span className="badge">Rows: {grid?.values.length ?? 0}</span>
              <span className="badge">Cols: {headers.length}</span>
            </div>
          </div>

          <div className="field-row">
            <input type="file" accept=".tsv,.txt,text/tab-separated-values" onChange={onFile} data-testid="grid-file-input" />
            <button className="ghost" type="button" onClick={onLoadExample} data-testid="load-example-btn">
              Load example
            </button>
            {fileName ? <span className="muted-small">{fileName}</span> : null}
          </div>

          <textarea
            className="textarea large"
            value={gridText}
            onChange={(e) => onChangeGridText(e.target.value, null)}
            placeholder={`Example:\nBlank\tCells\tCells+MTT\tDrug 1\tDrug 2\n0.05\t0.07\t1.01\t0.93\t0.80`}
            data-testid="grid-textarea"
          />

          {gridWarnings.length > 0 && (
            <div className="alert warn" role="alert">
              <div>
                <strong>Parse warnings:</strong>
                <ul className="bullets">
                  {gridWarnings.map((w) => (
                    <li key={w}>{w}</li>
                  ))}
                </ul>
              </div>
            </div>
          )}

          {grid && grid.values.length > 0 && (
            <div className="table-wrap" data-testid="grid-preview">
              <table className="table">
                <thead>
                  <tr>
                    {grid.headers.map((h, idx) => (
                      <th key={h + idx}>
                        <span className="muted-small">{idx}</span> {h}
                      </th>
                    ))}
                  </tr>
                </thead>
                <tbody>
                  {grid.values.map((row, rIdx) => (
                    <tr key={rIdx}>
                      {row.map((v, cIdx) => (
                        <td key={cIdx}>{fmt(v)}</td>
                      ))}
                    </tr>
                  ))}
                </tbody>
              </table>
            </div>
          )}
        </section>

        <section className="card" data-testid="conditions-card">
          <div className="section-head">
            <div>
              <p className="kicker">Step 2 · Experimental conditions</p>
              <h2>Controls and concentrations</h2>
              <p className="muted">Columns are addressed by zero-based position.</p>
            </div>
          </div>

          <div className="controls">
            <ColumnPicker
              label="Negative control (no cells, no MTT)"
              value={props.negativeControl}
              onChange={props.onChangeNegativeControl}
              headers={headers}
              testId="negative-control-select"
            />
            <ColumnPicker
              label="Cells (no drug, no MTT)"
              value={props.cellsWithoutStain}
              onChange={props.onChangeCellsWithoutStain}
              headers={headers}
              testId="cells-no-stain-select"
            />
            <ColumnPicker
              label="Cells (no drug, with MTT)"
              value={props.untreatedReference}
              onChange={props.onChangeUntreatedReference}
              headers={headers}
              testId="untreated-reference-select"
            />
          </div>

          <div className="controls">
            <label className="control">
              <span>Drug concentrations (comma-separated)</span>
              <input
                type="text"
                value={props.concentrationsText}
                onChange={(e) => props.onChangeConcentrationsText(e.target.value)}
                data-testid="concentrations-input"
              />
            </label>
            <label className="control">
              <span>Treatment column indices (comma-separated)</span>
              <input
                type="text"
                value={props.treatmentColumnsText}
                onChange={(e) => props.onChangeTreatmentColumnsText(e.target.value)}
                data-testid="treatment-columns-input"
              />
            </label>
          </div>

          <div className="controls">
            <label className="control">
              <span>Drug name</span>
              <input
                type="text"
                value={props.drugName}
                onChange={(e) => props.onChangeDrugName(e.target.value)}
                data-testid="drug-name-input"
              />
            </label>
            <label className="control">
              <span>Concentration unit</span>
              <input
                type="text"
                value={props.unit}
                onChange={(e) => props.onChangeUnit(e.target.value)}
                data-testid="unit-input"
              />
            </label>
          </div>
        </section>
      </div>
    </div>
  )
}
