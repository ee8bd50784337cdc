export type Vec3 = readonly [number, number, number]

export const BoxProvenance = {
  Manual: 'manual',
  Computed: 'computed',
  Default: 'default'
} as const

export type BoxProvenanceEnum = (typeof BoxProvenance)[keyof typeof BoxProvenance]

export interface BoundingBox {
  center: Vec3
  size: Vec3 // Angstroms along x, y, z
  provenance: BoxProvenanceEnum
}

export interface BoxParams {
  margin: number
  minSize: number
  maxSize: number
}

export type DefaultBoxReason = 'no-coordinates' | 'malformed' | 'unreadable'

export type BoxResult =
  | { kind: 'manual'; box: BoundingBox }
  | { kind: 'computed'; box: BoundingBox; coordinates: number; skipped: number }
  | {
      kind: 'default'
      box: BoundingBox
      reason: DefaultBoxReason
      skipped: number
    }
