import type { Vec3 } from '@dockrun/types'

export interface FieldRange {
  start: number
  end: number // exclusive
}

/**
 * Fixed-column layout of ATOM/HETATM records in PDB-family files
 * (.pdb and .pdbqt share the coordinate columns).
 */
export const ATOM_RECORD_LAYOUT = {
  recordName: { start: 0, end: 6 },
  x: { start: 30, end: 38 },
  y: { start: 38, end: 46 },
  z: { start: 46, end: 54 }
} as const satisfies Record<string, FieldRange>

const COORDINATE_RECORDS = ['ATOM', 'HETATM'] as const

export function readField(line: string, range: FieldRange): string {
  return line.slice(range.start, range.end)
}

export function readNumericField(
  line: string,
  range: FieldRange
): number | null {
  const text = readField(line, range).trim()
  if (text === '') return null
  const value = Number(text)
  return Number.isFinite(value) ? value : null
}

export function isCoordinateRecord(line: string): boolean {
  return COORDINATE_RECORDS.some((name) => line.startsWith(name))
}

export function readCoordinate(line: string): Vec3 | null {
  const x = readNumericField(line, ATOM_RECORD_LAYOUT.x)
  const y = readNumericField(line, ATOM_RECORD_LAYOUT.y)
  const z = readNumericField(line, ATOM_RECORD_LAYOUT.z)
  if (x === null || y === null || z === null) return null
  return [x, y, z]
}

export interface CoordinateScan {
  coordinates: Vec3[]
  records: number
  skipped: number
}

export function scanCoordinates(text: string): CoordinateScan {
  const coordinates: Vec3[] = []
  let records = 0
  let skipped = 0
  for (const line of text.split(/\r?\n/)) {
    if (!isCoordinateRecord(line)) continue
    records++
    const coordinate = readCoordinate(line)
    if (coordinate === null) {
      skipped++
    } else {
      coordinates.push(coordinate)
    }
  }
  return { coordinates, records, skipped }
}
