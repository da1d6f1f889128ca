/**
 * SvgPathRenderer - Emits an SVG document from an ExportDocument
 *
 * Output layout
 * - <svg> sized in pixels, viewBox in logical units (the padded bounds)
 * - one white background <rect> covering the viewBox
 * - one stroke-only <path> per non-empty contour, in layer order
 * - one metadata <text> near the top-left corner of the viewBox
 */

import type { ExportDocument, ExportLayer } from "../types"
import { Renderer, type RenderOptions } from "./Renderer"
import { escapeXml, formatSvg, pointsToSvgPath } from "../utils/svgPathUtils"
import { EXPORT_DEFAULTS } from "@/lib/constants"

export class SvgPathRenderer extends Renderer<string> {
  constructor(debugMode = false) {
    super(debugMode)
  }

  renderDocument(document: ExportDocument, options: Partial<RenderOptions> = {}): string {
    const precision = options.precision ?? EXPORT_DEFAULTS.precision
    const fmt = (n: number) => formatSvg(n, precision)
    const { viewBox, canvas } = document

    const background = `  <rect x="${fmt(viewBox.x)}" y="${fmt(viewBox.y)}" width="${fmt(viewBox.width)}" height="${fmt(viewBox.height)}" fill="${EXPORT_DEFAULTS.backgroundColor}" />`

    const paths = document.layers
      .map((layer) => this.renderLayer(layer, { precision }))
      .filter(Boolean)

    const labelX = viewBox.x + EXPORT_DEFAULTS.labelOffset.x
    const labelY = viewBox.y + EXPORT_DEFAULTS.labelOffset.y
    const label = `  <text x="${fmt(labelX)}" y="${fmt(labelY)}" font-size="${EXPORT_DEFAULTS.labelFontSize}" fill="${EXPORT_DEFAULTS.labelColor}">${escapeXml(document.label)}</text>`

    if (this.debugMode) {
      console.log(
        `[SvgPathRenderer] ${paths.length} paths, canvas ${fmt(canvas.width)}x${fmt(canvas.height)}px`,
      )
    }

    return [
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(canvas.width)}px" height="${fmt(canvas.height)}px" viewBox="${fmt(viewBox.x)} ${fmt(viewBox.y)} ${fmt(viewBox.width)} ${fmt(viewBox.height)}">`,
      background,
      ...paths,
      label,
      `</svg>`,
    ].join("\n")
  }

  renderLayer(layer: ExportLayer, options: Partial<RenderOptions> = {}): string {
    const d = pointsToSvgPath(layer.contour, options.precision ?? EXPORT_DEFAULTS.precision)
    if (!d) return ""

    return `  <path d="${d}" fill="none" stroke="${escapeXml(layer.strokeColor)}" stroke-width="${layer.strokeWidth}" opacity="${layer.opacity}" />`
  }
}
