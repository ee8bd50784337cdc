import type { ArtifactKey, ArtifactKindEnum } from '@dockrun/types'

export const PAIR_DELIMITER = '__'
export const POSE_SUFFIX = '_out'

export const ARTIFACT_EXTENSIONS: Readonly<Record<ArtifactKindEnum, string>> =
  {
    structure: '.pdb',
    'ligand-source': '.sdf',
    'ligand-pdb': '.pdb',
    receptor: '.pdbqt',
    ligand: '.pdbqt',
    pose: '.pdbqt',
    'docking-log': '.log'
  }

export class InvalidIdentifierError extends Error {
  constructor(readonly identifier: string, reason: string) {
    super(`Invalid identifier "${identifier}": ${reason}`)
    this.name = 'InvalidIdentifierError'
  }
}

export function validateIdentifier(identifier: string): string {
  if (identifier.length === 0) {
    throw new InvalidIdentifierError(identifier, 'must not be empty')
  }
  if (identifier.includes(PAIR_DELIMITER)) {
    throw new InvalidIdentifierError(
      identifier,
      `must not contain "${PAIR_DELIMITER}"`
    )
  }
  // a pair stem joined next to an edge underscore splits at the wrong place
  if (identifier.startsWith('_') || identifier.endsWith('_')) {
    throw new InvalidIdentifierError(
      identifier,
      'must not start or end with "_"'
    )
  }
  if (/[/\\]/.test(identifier)) {
    throw new InvalidIdentifierError(identifier, 'must not contain a path separator')
  }
  return identifier
}

export function isValidIdentifier(identifier: string): boolean {
  try {
    validateIdentifier(identifier)
    return true
  } catch (error) {
    if (error instanceof InvalidIdentifierError) return false
    throw error
  }
}

export function pairStem(receptor: string, ligand: string): string {
  return `${validateIdentifier(receptor)}${PAIR_DELIMITER}${validateIdentifier(ligand)}`
}

export function splitPairStem(
  stem: string
): { receptor: string; ligand: string } | null {
  const parts = stem.split(PAIR_DELIMITER)
  if (parts.length !== 2) return null
  const [receptor, ligand] = parts
  if (receptor === '' || ligand === '') return null
  return { receptor, ligand }
}

/** File name (no directory) an artifact is stored under. */
export function artifactFileName(key: ArtifactKey): string {
  const ext = ARTIFACT_EXTENSIONS[key.kind]
  switch (key.kind) {
    case 'structure':
    case 'receptor':
      return `${validateIdentifier(key.receptor)}${ext}`
    case 'ligand-source':
    case 'ligand-pdb':
    case 'ligand':
      return `${validateIdentifier(key.ligand)}${ext}`
    case 'pose':
      return `${pairStem(key.receptor, key.ligand)}${POSE_SUFFIX}${ext}`
    case 'docking-log':
      return `${pairStem(key.receptor, key.ligand)}${ext}`
  }
}

/** File name without directory or final extension. */
export function stemOf(fileName: string): string {
  const base = fileName.split(/[/\\]/).pop() ?? fileName
  const dot = base.lastIndexOf('.')
  return dot > 0 ? base.slice(0, dot) : base
}
