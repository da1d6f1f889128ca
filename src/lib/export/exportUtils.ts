/**
 * Export utilities: filenames and writing SVG documents to disk
 *
 * Writes are not atomic. A failure mid-write can leave a partial file.
 */

import { writeFile } from "node:fs/promises"
import type { ExportDocument } from "@/lib/contour-engine/types"
import { ExportIOError } from "@/lib/contour-engine/types"
import type { Renderer, RenderOptions } from "@/lib/contour-engine/renderers/Renderer"
import { SvgPathRenderer } from "@/lib/contour-engine/renderers/SvgPathRenderer"

const pad = (n: number) => n.toString().padStart(2, "0")

/**
 * e.g. spinpak_logo_3rev_20240131_094500.svg (local time)
 */
export function defaultExportFilename(revolutions: number, date: Date = new Date()): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `spinpak_logo_${revolutions}rev_${stamp}.svg`
}

export function ensureSvgExtension(filename: string): string {
  return filename.toLowerCase().endsWith(".svg") ? filename : `${filename}.svg`
}

/**
 * Render `document` and write it to `filePath` (".svg" appended if missing).
 * Resolves to the path actually written.
 */
export async function writeSvgDocument(
  filePath: string,
  document: ExportDocument,
  renderer: Renderer<string> = new SvgPathRenderer(),
  options: Partial<RenderOptions> = {},
): Promise<string> {
  const target = ensureSvgExtension(filePath)
  const svg = renderer.renderDocument(document, options)

  try {
    await writeFile(target, svg, "utf8")
  } catch (error) {
    console.error(`[Export] Failed to write ${target}:`, error)
    throw new ExportIOError(
      `Failed to export SVG to ${target}: ${error instanceof Error ? error.message : "Unknown error"}`,
      target,
      error,
    )
  }

  return target
}
