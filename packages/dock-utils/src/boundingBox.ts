import type {
  BoundingBox,
  BoxParams,
  BoxResult,
  DefaultBoxReason,
  Logger,
  Vec3
} from '@dockrun/types'
import { scanCoordinates } from './recordLayout.js'
import { noopLogger } from './logger.js'

export const DEFAULT_BOX_PARAMS: BoxParams = {
  margin: 8.0,
  minSize: 20.0,
  maxSize: 28.0
}

export const DEFAULT_BOX: BoundingBox = {
  center: [0.0, 0.0, 0.0],
  size: [24.0, 24.0, 24.0],
  provenance: 'default'
}

export function clampSize(extent: number, params: BoxParams): number {
  return Math.max(params.minSize, Math.min(extent, params.maxSize))
}

/**
 * Axis-aligned box around the coordinates: center at the midpoint of each
 * axis, size is the extent plus margin clamped to [minSize, maxSize].
 * Returns null when there is nothing to bound.
 */
export function computeBoundingBox(
  coordinates: readonly Vec3[],
  params: BoxParams = DEFAULT_BOX_PARAMS
): BoundingBox | null {
  if (coordinates.length === 0) return null
  const min = [Infinity, Infinity, Infinity]
  const max = [-Infinity, -Infinity, -Infinity]
  for (const point of coordinates) {
    for (let axis = 0; axis < 3; axis++) {
      min[axis] = Math.min(min[axis], point[axis])
      max[axis] = Math.max(max[axis], point[axis])
    }
  }
  const axis = (i: number): [number, number] => [
    (min[i] + max[i]) / 2,
    clampSize(max[i] - min[i] + params.margin, params)
  ]
  const [cx, sx] = axis(0)
  const [cy, sy] = axis(1)
  const [cz, sz] = axis(2)
  return { center: [cx, cy, cz], size: [sx, sy, sz], provenance: 'computed' }
}

export function defaultBoxResult(
  reason: DefaultBoxReason,
  skipped = 0
): BoxResult {
  return { kind: 'default', box: DEFAULT_BOX, reason, skipped }
}

export function manualBoxFor(
  receptor: string,
  overrides: Readonly<Record<string, BoundingBox>>
): BoxResult | null {
  if (!Object.hasOwn(overrides, receptor)) return null
  const override = overrides[receptor]
  return {
    kind: 'manual',
    box: { center: override.center, size: override.size, provenance: 'manual' }
  }
}

export function boxFromReceptorText(
  text: string,
  params: BoxParams = DEFAULT_BOX_PARAMS,
  logger: Logger = noopLogger
): BoxResult {
  const scan = scanCoordinates(text)
  if (scan.skipped > 0) {
    logger.warn(
      `[WARN] Skipped ${scan.skipped} coordinate record(s) with unreadable columns`
    )
  }
  const box = computeBoundingBox(scan.coordinates, params)
  if (box === null) {
    const reason = scan.records === 0 ? 'no-coordinates' : 'malformed'
    logger.warn(
      `[WARN] No usable coordinates (${reason}), using default search box`
    )
    return defaultBoxResult(reason, scan.skipped)
  }
  return {
    kind: 'computed',
    box,
    coordinates: scan.coordinates.length,
    skipped: scan.skipped
  }
}

const fixed = (v: Vec3): string => v.map((n) => n.toFixed(2)).join(', ')

export function formatBox(box: BoundingBox): string {
  return `center=(${fixed(box.center)}), size=(${fixed(box.size)})`
}
