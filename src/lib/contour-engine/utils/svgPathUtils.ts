/**
 * SVG path utilities for converting point arrays to path data
 */

import type { Point2D } from "../types"

/**
 * Format a number for SVG output, rounded to `precision` decimals
 */
export function formatSvg(n: number, precision: number = 6): string {
  const factor = 10 ** precision
  const rounded = Math.round(n * factor) / factor
  // Avoid "-0"
  return (rounded === 0 ? 0 : rounded).toString()
}

/**
 * Absolute move-to/line-to path, left open: "M x0,y0 L x1,y1 L …"
 */
export function pointsToSvgPath(points: readonly Point2D[], precision: number = 6): string {
  if (points.length === 0) return ""

  return points
    .map((p, i) => `${i === 0 ? "M" : "L"} ${formatSvg(p.x, precision)},${formatSvg(p.y, precision)}`)
    .join(" ")
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;")
}
