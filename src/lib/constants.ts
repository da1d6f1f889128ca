/**
 * Design constants and defaults for the contour engine and SVG export
 */

import type {
  AirfoilParameters,
  OverlayParameters,
} from "@/lib/contour-engine/types"

// === Sampling ===

export const AIRFOIL_SAMPLE_COUNT = 400
// Samples per designer arc; sampled-arc distance error is bounded by arcLength / count
export const ARC_SAMPLE_COUNT = 100
export const FILLET_SAMPLE_COUNT = 100

// === Emblem design ===

export const EMBLEM_INNER_RADIUS = 1.0
export const EMBLEM_OUTER_RADIUS = 1.2
export const EMBLEM_CORNER_RADIUS = 0.05
export const EMBLEM_JOINT_RADIUS = 0.3
export const EMBLEM_SHOULDER_X = -0.7
export const EMBLEM_SPINE_X = -0.1
export const EMBLEM_MIRROR_AXIS_DEG = 150
export const EMBLEM_REPLICATION_ANGLES = [0, 120, 240] as const

// === Solver ===

export const SOLVER_DEFAULTS = {
  maxIterations: 2000,
  xTolerance: 1e-10,
  fTolerance: 1e-16,
  residualTolerance: 1e-3,
  scalarTolerance: 1e-10,
} as const

// === Live parameters ===

export const DEFAULT_AIRFOIL_PARAMS: AirfoilParameters = {
  radius: 0.85,
  xCenter: -0.1,
  yCenter: 0.23,
  scale: 1.0,
}

export const DEFAULT_OVERLAY_PARAMS: OverlayParameters = {
  yOffset: 0,
  revolutions: 1,
}

// Ranges the parameter controls enforce; the engine itself never clamps
export const PARAMETER_RANGES = {
  radius: { min: 0.5, max: 1.2 },
  xCenter: { min: -0.5, max: 0.5 },
  yCenter: { min: 0, max: 0.5 },
  scale: { min: 0.1, max: 3 },
  yOffset: { min: -1, max: 1 },
  revolutions: { min: 1, max: 12 },
} as const

// === Export ===

export const EXPORT_DEFAULTS = {
  padding: 0.2,
  pixelsPerUnit: 300,
  precision: 6,
  backgroundColor: "white",
  labelColor: "gray",
  labelFontSize: 0.1,
  labelOffset: { x: 0.05, y: 0.15 },
  labelTitle: "SpinPAK Logo",
} as const

export const EMBLEM_STROKE = {
  strokeColor: "blue",
  strokeWidth: 0.01,
  opacity: 0.6,
} as const

export const OVERLAY_STROKE = {
  strokeColor: "red",
  strokeWidth: 0.015,
  opacity: 1,
  replicaOpacity: 0.8,
} as const
