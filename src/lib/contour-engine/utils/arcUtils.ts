/**
 * Circular arc sampling helpers
 */

import type { Orientation, Point2D } from "../types"

export function linspace(start: number, end: number, count: number): number[] {
  if (count < 1) return []
  if (count === 1) return [start]

  const step = (end - start) / (count - 1)
  const values: number[] = []
  for (let i = 0; i < count; i++) {
    values.push(i === count - 1 ? end : start + step * i)
  }
  return values
}

/**
 * Sample `count` points on a circle from `startAngle` to `endAngle` (radians),
 * both ends included. The sign of (end - start) sets the direction.
 */
export function sampleArc(
  center: Point2D,
  radius: number,
  startAngle: number,
  endAngle: number,
  count: number,
): Point2D[] {
  return linspace(startAngle, endAngle, count).map((t) => ({
    x: center.x + radius * Math.cos(t),
    y: center.y + radius * Math.sin(t),
  }))
}

export function polarAngle(p: Point2D, about: Point2D): number {
  return Math.atan2(p.y - about.y, p.x - about.x)
}

/**
 * Signed sweep from `startAngle` to `endAngle` in the requested orientation:
 * [0, 2π) counter-clockwise, (-2π, 0] clockwise.
 */
export function sweepAngle(
  startAngle: number,
  endAngle: number,
  orientation: Orientation,
): number {
  const twoPi = 2 * Math.PI
  let sweep = (endAngle - startAngle) % twoPi

  if (orientation === "counterclockwise") {
    if (sweep < 0) sweep += twoPi
  } else if (sweep > 0) {
    sweep -= twoPi
  }

  return sweep
}

/**
 * Sample the arc about `center` running from `from` to `to` in `orientation`
 */
export function sampleArcBetween(
  center: Point2D,
  radius: number,
  from: Point2D,
  to: Point2D,
  orientation: Orientation,
  count: number,
): Point2D[] {
  const start = polarAngle(from, center)
  const sweep = sweepAngle(start, polarAngle(to, center), orientation)
  return sampleArc(center, radius, start, start + sweep, count)
}
