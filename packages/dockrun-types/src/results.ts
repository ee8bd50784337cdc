export type ScoreResult =
  | { kind: 'found'; score: number; line: number }
  | { kind: 'no-result-line' }
  | { kind: 'malformed'; line: number; text: string }

export interface DockingResult {
  receptor: string
  ligand: string
  affinity: number | null // kcal/mol, lower is better
}
