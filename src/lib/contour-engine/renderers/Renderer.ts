/**
 * Abstract Renderer interface for export documents
 *
 * Renderers turn an ExportDocument into an output format. The same point
 * arrays are handed to every renderer unmodified.
 */

import type { ExportDocument, ExportLayer } from "../types"

export interface RenderOptions {
  // Decimal places for coordinates
  precision: number
}

export abstract class Renderer<Output> {
  protected debugMode: boolean = false

  constructor(debugMode: boolean = false) {
    this.debugMode = debugMode
  }

  /**
   * Render a complete document (background, every layer, label)
   */
  abstract renderDocument(document: ExportDocument, options?: Partial<RenderOptions>): Output

  /**
   * Render a single stroked layer
   */
  abstract renderLayer(layer: ExportLayer, options?: Partial<RenderOptions>): Output
}
