// Form defaults, matching the column layout of the bundled example plate.
export const DEFAULT_NEGATIVE_CONTROL_COL = 0
export const DEFAULT_CELLS_WITHOUT_STAIN_COL = 1
export const DEFAULT_UNTREATED_REFERENCE_COL = 2
export const DEFAULT_CONCENTRATIONS = '1, 2, 4, 8, 16'
export const DEFAULT_TREATMENT_COLUMNS = '3, 4, 5, 6, 7'
export const DEFAULT_CONCENTRATION_UNIT = 'mg/ml'
export const DEFAULT_DRUG_NAME = 'Drug'
