/**
 * SymmetryReplicator - Rotated copies of a set of contours about the origin
 */

import type { Contour } from "./types"
import { rotate } from "./utils/transform"

/**
 * Evenly spaced angles for an N-fold pattern: [0, 360/n, 2·360/n, …]
 */
export function revolutionAngles(revolutions: number): number[] {
  const count = Math.max(1, Math.floor(revolutions))
  const step = 360 / count
  return Array.from({ length: count }, (_, i) => i * step)
}

/**
 * One copy of every base contour per angle, angle-major. A zero angle
 * copies the points as they are.
 */
export function replicate(
  baseContours: readonly Contour[],
  angles: readonly number[],
): Contour[] {
  const output: Contour[] = []
  for (const angle of angles) {
    for (const contour of baseContours) {
      output.push(
        angle === 0 ? contour.map((p) => ({ x: p.x, y: p.y })) : rotate(contour, angle),
      )
    }
  }
  return output
}
