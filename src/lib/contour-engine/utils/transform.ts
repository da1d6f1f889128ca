/**
 * Rigid transforms on point sets. All functions return new arrays.
 */

import type { Point2D } from "../types"

const ORIGIN: Point2D = { x: 0, y: 0 }

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180
}

/**
 * Rotate points counter-clockwise by `angleDeg` about `center`
 */
export function rotate(
  points: readonly Point2D[],
  angleDeg: number,
  center: Point2D = ORIGIN,
): Point2D[] {
  const angle = degreesToRadians(angleDeg)
  const cos = Math.cos(angle)
  const sin = Math.sin(angle)

  return points.map((p) => {
    const dx = p.x - center.x
    const dy = p.y - center.y
    return {
      x: center.x + dx * cos - dy * sin,
      y: center.y + dx * sin + dy * cos,
    }
  })
}

/**
 * Reflect points across the line through the origin at `axisAngleDeg`.
 * Rotates the axis onto +x, mirrors y, rotates back.
 */
export function reflect(
  points: readonly Point2D[],
  axisAngleDeg: number,
): Point2D[] {
  const aligned = rotate(points, -axisAngleDeg)
  const mirrored = aligned.map((p) => ({ x: p.x, y: -p.y }))
  return rotate(mirrored, axisAngleDeg)
}

export function translate(
  points: readonly Point2D[],
  dx: number,
  dy: number,
): Point2D[] {
  return points.map((p) => ({ x: p.x + dx, y: p.y + dy }))
}

/**
 * Reflect across a line at `axisAngleDeg` passing through `through`
 */
export function reflectAbout(
  points: readonly Point2D[],
  axisAngleDeg: number,
  through: Point2D,
): Point2D[] {
  const centered = translate(points, -through.x, -through.y)
  return translate(reflect(centered, axisAngleDeg), through.x, through.y)
}
