import { computed, map } from "nanostores"
import { ContourEngine } from "@/lib/contour-engine/ContourEngine"
import type {
  AirfoilParameters,
  Contour,
  Curve,
  EmblemGeometry,
  ExportDocument,
  OverlayParameters,
  ValidationIssue,
} from "@/lib/contour-engine/types"
import { ContourEngineError } from "@/lib/contour-engine/types"
import { validateStudioParameters } from "@/lib/contour-engine/utils/validation"
import type { ExportOptions } from "@/lib/export/svgUtils"
import { writeSvgDocument } from "@/lib/export/exportUtils"
import { DEFAULT_AIRFOIL_PARAMS, DEFAULT_OVERLAY_PARAMS } from "@/lib/constants"

export type GeometryState<T> =
  | { status: "ready"; value: T }
  | { status: "error"; error: ContourEngineError }

export interface StudioSessionOptions {
  engine?: ContourEngine
  // Shared emblem; built by the engine when omitted
  emblem?: EmblemGeometry
  initial?: {
    airfoil?: Partial<AirfoilParameters>
    overlay?: Partial<OverlayParameters>
  }
}

function capture<T>(compute: () => T): GeometryState<T> {
  try {
    return { status: "ready", value: compute() }
  } catch (error) {
    if (error instanceof ContourEngineError) {
      return { status: "error", error }
    }
    throw error
  }
}

export function createStudioSession(options: StudioSessionOptions = {}) {
  const engine = options.engine ?? new ContourEngine()
  // Static for the lifetime of the session
  const emblem = options.emblem ?? engine.buildEmblem()

  const $airfoilParams = map<AirfoilParameters>({
    ...DEFAULT_AIRFOIL_PARAMS,
    ...options.initial?.airfoil,
  })
  const $overlayParams = map<OverlayParameters>({
    ...DEFAULT_OVERLAY_PARAMS,
    ...options.initial?.overlay,
  })

  const $airfoil = computed(
    $airfoilParams,
    (params): GeometryState<Curve> => capture(() => engine.generateAirfoil(params)),
  )

  const $overlay = computed(
    [$airfoilParams, $overlayParams],
    (params, overlay): GeometryState<Contour[]> =>
      capture(() => engine.generateOverlay(params, overlay)),
  )

  const $issues = computed(
    [$airfoilParams, $overlayParams],
    (params, overlay): ValidationIssue[] => validateStudioParameters(params, overlay),
  )

  function setAirfoilParameter<K extends keyof AirfoilParameters>(
    key: K,
    value: AirfoilParameters[K],
  ): void {
    $airfoilParams.setKey(key, value)
  }

  function setOverlayParameter<K extends keyof OverlayParameters>(
    key: K,
    value: OverlayParameters[K],
  ): void {
    $overlayParams.setKey(key, value)
  }

  function reset(): void {
    $airfoilParams.set({ ...DEFAULT_AIRFOIL_PARAMS })
    $overlayParams.set({ ...DEFAULT_OVERLAY_PARAMS })
  }

  /**
   * Export document for the current parameters. Throws the overlay's
   * error when the current parameters are invalid.
   */
  function buildDocument(exportOptions: Partial<ExportOptions> = {}): ExportDocument {
    const overlay = $overlay.get()
    if (overlay.status === "error") {
      throw overlay.error
    }

    const revolutions = Math.max(1, Math.floor($overlayParams.get().revolutions))
    return engine.buildDocument(emblem, overlay.value, revolutions, exportOptions)
  }

  async function exportSvg(
    filePath: string,
    exportOptions: Partial<ExportOptions> = {},
  ): Promise<string> {
    return writeSvgDocument(filePath, buildDocument(exportOptions))
  }

  return {
    engine,
    emblem,
    $airfoilParams,
    $overlayParams,
    $airfoil,
    $overlay,
    $issues,
    setAirfoilParameter,
    setOverlayParameter,
    reset,
    buildDocument,
    exportSvg,
  }
}

export type StudioSession = ReturnType<typeof createStudioSession>
