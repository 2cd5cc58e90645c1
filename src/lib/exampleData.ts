export const EXAMPLE_FILE_NAME = 'mtt-example.tsv'

let pending: Promise<string> | null = null

// Fetched on first use and kept for the rest of the session.
export const loadExampleGridText = (): Promise<string> => {
  if (!pending) {
    pending = import('../data/mtt-example.tsv?raw').then((mod) => mod.default)
  }
  return pending
}
