import './App.css'
import { useMemo, useState } from 'react'
import { AnalysisTab } from './tabs/AnalysisTab'
import { DataTab } from './tabs/DataTab'
import {
  DEFAULT_CELLS_WITHOUT_STAIN_COL,
  DEFAULT_CONCENTRATION_UNIT,
  DEFAULT_CONCENTRATIONS,
  DEFAULT_DRUG_NAME,
  DEFAULT_NEGATIVE_CONTROL_COL,
  DEFAULT_TREATMENT_COLUMNS,
  DEFAULT_UNTREATED_REFERENCE_COL,
} from './lib/defaults'
import { EXAMPLE_FILE_NAME, loadExampleGridText } from './lib/exampleData'
import { evaluateIc50Form } from './lib/ic50Form'

type ActiveTab = 'data' | 'analysis'

function App() {
  const [tab, setTab] = useState<ActiveTab>('data')
  const [gridText, setGridText] = useState('')
  const [fileName, setFileName] = useState<string | null>(null)
  const [negativeControl, setNegativeControl] = useState(DEFAULT_NEGATIVE_CONTROL_COL)
  const [cellsWithoutStain, setCellsWithoutStain] = useState(DEFAULT_CELLS_WITHOUT_STAIN_COL)
  const [untreatedReference, setUntreatedReference] = useState(DEFAULT_UNTREATED_REFERENCE_COL)
  const [concentrationsText, setConcentrationsText] = useState(DEFAULT_CONCENTRATIONS)
  const [treatmentColumnsText, setTreatmentColumnsText] = useState(DEFAULT_TREATMENT_COLUMNS)
  const [drugName, setDrugName] = useState(DEFAULT_DRUG_NAME)
  const [unit, setUnit] = useState(DEFAULT_CONCENTRATION_UNIT)

  const outcome = useMemo(
    () =>
      evaluateIc50Form({
        gridText,
        // Uploaded .tsv files are tab-separated by definition; pasted text is sniffed.
        separator: fileName?.toLowerCase().endsWith('.tsv') ? 'tab' : undefined,
        negativeControl,
        cellsWithoutStain,
        untreatedReference,
        concentrationsText,
        treatmentColumnsText,
      }),
    [gridText, fileName, negativeControl, cellsWithoutStain, untreatedReference, concentrationsText, treatmentColumnsText]
  )

  const grid = outcome.kind === 'empty' ? null : outcome.grid
  const gridWarnings = outcome.kind === 'empty' ? [] : outcome.gridWarnings

  return (
    <div className="page">
      <div className="hero" data-testid="app-hero">
        <div className="hero-text">
          <div className="tag">MTT assay · Colorimetric viability</div>
          <h1>MTT Assay IC50 Calculator</h1>
          <p className="lede">
            Upload a TSV of MTT absorbance readings, pick the control and treatment columns, and enter the drug
            concentrations. Viability is background-corrected against the negative control, normalized to the untreated
            reference, and the IC50 is interpolated at 50% viability.
          </p>
          <div className="pill-row">
            <span className="pill">Background correction</span>
            <span className="pill">Mean ± SD viability</span>
            <span className="pill">Linear IC50 interpolation</span>
          </div>
        </div>
      </div>

      <div className="shell">
        <div className="tabs" role="tablist" aria-label="IC50 tabs">
          <button
            className={tab === 'data' ? 'tab active' : 'tab'}
            type="button"
            onClick={() => setTab('data')}
            aria-selected={tab === 'data'}
            data-testid="data-tab-btn"
          >
            Data
          </button>
          <button
            className={tab === 'analysis' ? 'tab active' : 'tab'}
            type="button"
            onClick={() => setTab('analysis')}
            aria-selected={tab === 'analysis'}
            data-testid="analysis-tab-btn"
          >
            IC50
          </button>
        </div>
      </div>

      {tab === 'data' ? (
        <DataTab
          gridText={gridText}
          onChangeGridText={(next, name) => {
            setGridText(next)
            setFileName(name)
          }}
          fileName={fileName}
          grid={grid}
          gridWarnings={gridWarnings}
          onLoadExample={async () => {
            const text = await loadExampleGridText()
            setGridText(text)
            setFileName(EXAMPLE_FILE_NAME)
          }}
          negativeControl={negativeControl}
          onChangeNegativeControl={setNegativeControl}
          cellsWithoutStain={cellsWithoutStain}
          onChangeCellsWithoutStain={setCellsWithoutStain}
          untreatedReference={untreatedReference}
          onChangeUntreatedReference={setUntreatedReference}
          concentrationsText={concentrationsText}
          onChangeConcentrationsText={setConcentrationsText}
          treatmentColumnsText={treatmentColumnsText}
          onChangeTreatmentColumnsText={setTreatmentColumnsText}
          drugName={drugName}
          onChangeDrugName={setDrugName}
          unit={unit}
          onChangeUnit={setUnit}
        />
      ) : (
        <AnalysisTab outcome={outcome} drugName={drugName} unit={unit} />
      )}
    </div>
  )
}

export default App
