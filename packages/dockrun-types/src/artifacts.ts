export const ArtifactKind = {
  Structure: 'structure',
  LigandSource: 'ligand-source',
  LigandPdb: 'ligand-pdb',
  Receptor: 'receptor',
  Ligand: 'ligand',
  Pose: 'pose',
  DockingLog: 'docking-log'
} as const

export type ArtifactKindEnum = (typeof ArtifactKind)[keyof typeof ArtifactKind]

// One artifact per (kind, identifier); poses and logs are keyed by the pair.
export type ArtifactKey =
  | { kind: 'structure'; receptor: string }
  | { kind: 'ligand-source'; ligand: string }
  | { kind: 'ligand-pdb'; ligand: string }
  | { kind: 'receptor'; receptor: string }
  | { kind: 'ligand'; ligand: string }
  | { kind: 'pose'; receptor: string; ligand: string }
  | { kind: 'docking-log'; receptor: string; ligand: string }

export type ArtifactDirectories = Readonly<Record<ArtifactKindEnum, string>>
