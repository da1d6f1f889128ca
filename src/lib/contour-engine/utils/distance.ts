/**
 * Point-to-obstacle distance and closest-point queries
 */

import type { Obstacle, Point2D } from "../types"
import { DomainError } from "../types"

export function distance(a: Point2D, b: Point2D): number {
  return Math.hypot(a.x - b.x, a.y - b.y)
}

/**
 * Exact closest point on segment [a, b] to `p`
 */
export function projectOntoSegment(p: Point2D, a: Point2D, b: Point2D): Point2D {
  const dx = b.x - a.x
  const dy = b.y - a.y
  const lengthSq = dx * dx + dy * dy
  if (lengthSq === 0) return { x: a.x, y: a.y }

  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq))
  return { x: a.x + t * dx, y: a.y + t * dy }
}

/**
 * Index of the sample nearest to `p`. First index wins ties.
 */
export function nearestSampleIndex(points: readonly Point2D[], p: Point2D): number {
  let bestIndex = -1
  let bestDistSq = Infinity

  for (let i = 0; i < points.length; i++) {
    const dx = points[i].x - p.x
    const dy = points[i].y - p.y
    const distSq = dx * dx + dy * dy
    if (distSq < bestDistSq) {
      bestDistSq = distSq
      bestIndex = i
    }
  }

  return bestIndex
}

export function closestPointOnObstacle(obstacle: Obstacle, p: Point2D): Point2D {
  switch (obstacle.kind) {
    case "segment":
      return projectOntoSegment(p, obstacle.points[0], obstacle.points[1])
    case "sampledArc": {
      const index = nearestSampleIndex(obstacle.points, p)
      if (index < 0) {
        throw new DomainError("Sampled arc obstacle has no points")
      }
      const sample = obstacle.points[index]
      return { x: sample.x, y: sample.y }
    }
  }
}

export function distanceToObstacle(obstacle: Obstacle, p: Point2D): number {
  return distance(p, closestPointOnObstacle(obstacle, p))
}
