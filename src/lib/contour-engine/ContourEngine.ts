/**
 * ContourEngine - Main orchestrator for emblem and overlay geometry
 *
 * Coordinates the fillet solvers, the airfoil generator, replication and
 * export document assembly. The emblem is built on request and is meant to
 * be kept by the caller; the overlay is cheap and regenerated on every
 * parameter change.
 */

import type {
  AirfoilParameters,
  Contour,
  Curve,
  EmblemGeometry,
  ExportDocument,
  ExportLayer,
  OverlayParameters,
} from "./types"
import { ContourEngineError } from "./types"
import { AirfoilGenerator } from "./AirfoilGenerator"
import { buildEmblem } from "./EmblemBuilder"
import { FilletCache } from "./FilletCache"
import { LineJointSolver } from "./LineJointSolver"
import { ContourAssembler } from "./ContourAssembler"
import { replicate, revolutionAngles } from "./SymmetryReplicator"
import {
  TangentCircleSolver,
  type TangentCircleSolverOptions,
} from "./TangentCircleSolver"
import { translate } from "./utils/transform"
import {
  buildExportDocument,
  createRevolutionLabel,
  type ExportOptions,
} from "@/lib/export/svgUtils"
import {
  AIRFOIL_SAMPLE_COUNT,
  ARC_SAMPLE_COUNT,
  EMBLEM_STROKE,
  FILLET_SAMPLE_COUNT,
  OVERLAY_STROKE,
} from "@/lib/constants"

export interface ContourEngineOptions {
  enableCaching?: boolean
  maxCacheSize?: number
  debugMode?: boolean
  airfoilSamples?: number
  arcSamples?: number
  filletSamples?: number
  solver?: Partial<TangentCircleSolverOptions>
}

type ResolvedOptions = Required<ContourEngineOptions>

const DEFAULT_OPTIONS: ResolvedOptions = {
  enableCaching: true,
  maxCacheSize: 256,
  debugMode: false,
  airfoilSamples: AIRFOIL_SAMPLE_COUNT,
  arcSamples: ARC_SAMPLE_COUNT,
  filletSamples: FILLET_SAMPLE_COUNT,
  solver: {},
}

export class ContourEngine {
  private options: ResolvedOptions
  private cache: FilletCache
  private solver: TangentCircleSolver
  private jointSolver = new LineJointSolver()
  private assembler = new ContourAssembler()
  private generator: AirfoilGenerator

  constructor(options: ContourEngineOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
    this.cache = new FilletCache(this.options.maxCacheSize)
    this.solver = this.createSolver()
    this.generator = new AirfoilGenerator(this.options.airfoilSamples)
  }

  /**
   * Build the static emblem. Fits are memoized when caching is enabled, so
   * repeated builds with the same options skip the solver.
   */
  buildEmblem(): EmblemGeometry {
    return this.run("buildEmblem", () => {
      const emblem = buildEmblem({
        solver: this.solver,
        jointSolver: this.jointSolver,
        assembler: this.assembler,
        arcSamples: this.options.arcSamples,
        filletSamples: this.options.filletSamples,
        debugMode: this.options.debugMode,
      })
      return { result: emblem, summary: `${emblem.contours.length} contours` }
    })
  }

  generateAirfoil(params: AirfoilParameters): Curve {
    return this.run("generateAirfoil", () => {
      const airfoil = this.generator.generate(params)
      return { result: airfoil, summary: `${airfoil.length} points` }
    })
  }

  /**
   * Airfoil shifted vertically by `yOffset`, then replicated `revolutions`
   * times about the origin
   */
  generateOverlay(params: AirfoilParameters, overlay: OverlayParameters): Contour[] {
    return this.run("generateOverlay", () => {
      const airfoil = translate(this.generator.generate(params), 0, overlay.yOffset)
      const contours = replicate([airfoil], revolutionAngles(overlay.revolutions))
      return { result: contours, summary: `${contours.length} copies` }
    })
  }

  /**
   * Emblem contours first, overlay copies on top
   */
  createExportLayers(
    emblem: EmblemGeometry,
    overlayContours: readonly Contour[],
    revolutions: number,
  ): ExportLayer[] {
    const overlayOpacity =
      revolutions > 1 ? OVERLAY_STROKE.replicaOpacity : OVERLAY_STROKE.opacity

    return [
      ...emblem.contours.map((contour) => ({
        contour,
        strokeColor: EMBLEM_STROKE.strokeColor,
        strokeWidth: EMBLEM_STROKE.strokeWidth,
        opacity: EMBLEM_STROKE.opacity,
      })),
      ...overlayContours.map((contour) => ({
        contour,
        strokeColor: OVERLAY_STROKE.strokeColor,
        strokeWidth: OVERLAY_STROKE.strokeWidth,
        opacity: overlayOpacity,
      })),
    ]
  }

  buildDocument(
    emblem: EmblemGeometry,
    overlayContours: readonly Contour[],
    revolutions: number,
    exportOptions: Partial<ExportOptions> = {},
  ): ExportDocument {
    return buildExportDocument(this.createExportLayers(emblem, overlayContours, revolutions), {
      label: createRevolutionLabel(revolutions),
      ...exportOptions,
    })
  }

  getStats() {
    return {
      options: { ...this.options },
      cache: this.cache.getStats(),
    }
  }

  clearCaches(): void {
    this.cache.clear()
  }

  updateOptions(newOptions: Partial<ContourEngineOptions>): void {
    const previous = this.options
    this.options = { ...this.options, ...newOptions }

    if (this.options.maxCacheSize !== previous.maxCacheSize) {
      this.cache = new FilletCache(this.options.maxCacheSize)
    }
    if (this.options.airfoilSamples !== previous.airfoilSamples) {
      this.generator = new AirfoilGenerator(this.options.airfoilSamples)
    }
    this.solver = this.createSolver()
  }

  private createSolver(): TangentCircleSolver {
    return new TangentCircleSolver(
      this.options.solver,
      this.options.enableCaching ? this.cache : null,
    )
  }

  /**
   * Time an operation in debug mode and tag unexpected failures
   */
  private run<T>(operation: string, body: () => { result: T; summary: string }): T {
    const startTime = this.options.debugMode ? performance.now() : 0

    try {
      const { result, summary } = body()

      if (this.options.debugMode) {
        const duration = performance.now() - startTime
        console.log(`[ContourEngine] ${operation}: ${duration.toFixed(2)}ms, ${summary}`)
      }

      return result
    } catch (error) {
      if (error instanceof ContourEngineError) throw error
      throw new ContourEngineError(
        `Failed to ${operation}: ${error instanceof Error ? error.message : "Unknown error"}`,
        "GENERATION_ERROR",
        { cause: error },
      )
    }
  }
}
