/**
 * LineJointSolver - Closed-form fillet between two segments meeting at a vertex
 */

import type { FilletResult, Orientation, Point2D } from "./types"
import { DomainError } from "./types"
import { sampleArcBetween } from "./utils/arcUtils"

const MIN_HALF_ANGLE = 1e-6

function unit(from: Point2D, to: Point2D): Point2D | null {
  const dx = to.x - from.x
  const dy = to.y - from.y
  const length = Math.hypot(dx, dy)
  if (length === 0) return null
  return { x: dx / length, y: dy / length }
}

export class LineJointSolver {
  /**
   * Fillet of `radius` in the corner A-B-C. Contacts are the feet of the
   * perpendiculars from the center onto BA and BC; the arc runs from the
   * BA contact to the BC contact in `orientation`.
   */
  solve(
    a: Point2D,
    b: Point2D,
    c: Point2D,
    radius: number,
    orientation: Orientation,
    sampleCount: number,
  ): FilletResult {
    if (!(radius > 0)) {
      throw new DomainError(`Joint radius must be positive, got ${radius}`)
    }

    const u = unit(b, a)
    const v = unit(b, c)
    if (!u || !v) {
      throw new DomainError("Joint segment endpoints coincide with the vertex")
    }

    const cosAngle = Math.max(-1, Math.min(1, u.x * v.x + u.y * v.y))
    const halfAngle = Math.acos(cosAngle) / 2

    if (halfAngle < MIN_HALF_ANGLE) {
      throw new DomainError(
        `Joint segments are nearly parallel at (${b.x}, ${b.y}); fillet radius diverges`,
      )
    }
    if (Math.PI / 2 - halfAngle < MIN_HALF_ANGLE) {
      throw new DomainError(
        `Joint segments are collinear at (${b.x}, ${b.y}); there is no corner to round`,
      )
    }

    const bisectorLength = Math.hypot(u.x + v.x, u.y + v.y)
    const bisector = { x: (u.x + v.x) / bisectorLength, y: (u.y + v.y) / bisectorLength }

    const centerDistance = radius / Math.sin(halfAngle)
    const center = {
      x: b.x + centerDistance * bisector.x,
      y: b.y + centerDistance * bisector.y,
    }

    const legLength = radius / Math.tan(halfAngle)
    const contactA = { x: b.x + legLength * u.x, y: b.y + legLength * u.y }
    const contactB = { x: b.x + legLength * v.x, y: b.y + legLength * v.y }

    return {
      center,
      radius,
      contactA,
      contactB,
      arc: sampleArcBetween(center, radius, contactA, contactB, orientation, sampleCount),
      orientation,
    }
  }
}
