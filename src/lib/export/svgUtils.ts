/**
 * SVG export document assembly
 *
 * - Bounds over every point of every layer
 * - viewBox = bounds padded on every side, canvas = viewBox × pixelsPerUnit
 * - Layers keep their order, so later layers draw on top
 */

import type {
  Bounds,
  Contour,
  ExportDocument,
  ExportLayer,
} from "@/lib/contour-engine/types"
import { EmptyGeometryError } from "@/lib/contour-engine/types"
import { SvgPathRenderer } from "@/lib/contour-engine/renderers/SvgPathRenderer"
import type { RenderOptions } from "@/lib/contour-engine/renderers/Renderer"
import { EXPORT_DEFAULTS } from "@/lib/constants"

export interface ExportOptions {
  padding: number
  pixelsPerUnit: number
  label: string
}

export const DEFAULT_EXPORT_OPTIONS: ExportOptions = {
  padding: EXPORT_DEFAULTS.padding,
  pixelsPerUnit: EXPORT_DEFAULTS.pixelsPerUnit,
  label: EXPORT_DEFAULTS.labelTitle,
}

/**
 * Metadata label for an N-fold export, e.g. "SpinPAK Logo - 3× Revolution"
 */
export function createRevolutionLabel(
  revolutions: number,
  title: string = EXPORT_DEFAULTS.labelTitle,
): string {
  return `${title} - ${revolutions}× Revolution`
}

/**
 * Axis-aligned bounds over every point, or null when there are none
 */
export function calculateContourBounds(contours: readonly Contour[]): Bounds | null {
  let minX = Infinity
  let minY = Infinity
  let maxX = -Infinity
  let maxY = -Infinity

  for (const contour of contours) {
    for (const p of contour) {
      minX = Math.min(minX, p.x)
      minY = Math.min(minY, p.y)
      maxX = Math.max(maxX, p.x)
      maxY = Math.max(maxY, p.y)
    }
  }

  if (minX === Infinity) return null

  return { minX, minY, maxX, maxY }
}

export function buildExportDocument(
  layers: readonly ExportLayer[],
  options: Partial<ExportOptions> = {},
): ExportDocument {
  const { padding, pixelsPerUnit, label } = { ...DEFAULT_EXPORT_OPTIONS, ...options }

  const bounds = calculateContourBounds(layers.map((layer) => layer.contour))
  if (!bounds) {
    throw new EmptyGeometryError("Cannot export: no layer contains any points")
  }

  const width = bounds.maxX - bounds.minX + 2 * padding
  const height = bounds.maxY - bounds.minY + 2 * padding

  return {
    bounds,
    padding,
    pixelsPerUnit,
    viewBox: {
      x: bounds.minX - padding,
      y: bounds.minY - padding,
      width,
      height,
    },
    canvas: {
      width: width * pixelsPerUnit,
      height: height * pixelsPerUnit,
    },
    layers: [...layers],
    label,
  }
}

/**
 * Render a document to SVG text
 */
export function generateSvg(
  document: ExportDocument,
  options: Partial<RenderOptions> = {},
): string {
  return new SvgPathRenderer(false).renderDocument(document, options)
}
