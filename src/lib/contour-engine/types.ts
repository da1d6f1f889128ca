/**
 * Core type definitions for the contour engine
 */

// === Geometry ===

export interface Point2D {
  x: number
  y: number
}

// Ordered in traversal order; open unless first and last coincide
export type Curve = Point2D[]

// A finished shape ready for transform or export
export type Contour = Curve

export type Orientation = "clockwise" | "counterclockwise"

export interface SegmentObstacle {
  kind: "segment"
  points: readonly [Point2D, Point2D]
}

export interface SampledArcObstacle {
  kind: "sampledArc"
  points: readonly Point2D[]
}

export type Obstacle = SegmentObstacle | SampledArcObstacle

export interface Bounds {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

// === Solver ===

/**
 * Soft constraint on a fillet center.
 * "maxDistance" penalizes centers farther than `radius` from `center`,
 * "minDistance" penalizes centers closer than `radius`.
 */
export interface DiskConstraint {
  kind: "maxDistance" | "minDistance"
  center: Point2D
  radius: number
  weight: number
}

export interface TangentFit {
  center: Point2D
  // sqrt of the final objective value
  residual: number
  converged: boolean
  iterations: number
}

export interface FilletResult {
  center: Point2D
  radius: number
  contactA: Point2D
  contactB: Point2D
  arc: Curve
  orientation: Orientation
}

export interface ConvergenceWarning {
  fillet: string
  residual: number
  tolerance: number
  message: string
}

// === Live parameters ===

export interface AirfoilParameters {
  radius: number
  xCenter: number
  yCenter: number
  scale: number
}

export interface OverlayParameters {
  yOffset: number
  revolutions: number
}

// === Emblem ===

export interface EmblemFillets {
  inner: FilletResult
  outer: FilletResult
  lower: FilletResult
  joint: FilletResult
}

export interface EmblemGeometry {
  // One open sector: outer arc, shoulder, inner arc and three fillets
  readonly sector: Contour
  // Spine joint closing the sector against its mirror image
  readonly joint: Contour
  readonly mirroredSector: Contour
  readonly baseContours: readonly Contour[]
  // All replicated contours, angle-major
  readonly contours: readonly Contour[]
  readonly fillets: EmblemFillets
  readonly warnings: readonly ConvergenceWarning[]
}

// === Export ===

export interface RenderStyle {
  strokeColor: string
  strokeWidth: number
  opacity: number
}

export interface ExportLayer extends RenderStyle {
  contour: Contour
}

export interface ViewBox {
  x: number
  y: number
  width: number
  height: number
}

export interface ExportDocument {
  // Raw bounds of every point, before padding
  bounds: Bounds
  padding: number
  pixelsPerUnit: number
  viewBox: ViewBox
  canvas: { width: number; height: number }
  layers: ExportLayer[]
  label: string
}

// === Validation ===

export interface ValidationIssue {
  severity: "warning" | "error"
  parameter: string
  message: string
}

// === Error Types ===

export class ContourEngineError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "ContourEngineError"
  }
}

export class DomainError extends ContourEngineError {
  constructor(message: string) {
    super(message, "DOMAIN_ERROR")
    this.name = "DomainError"
  }
}

export class EmptyGeometryError extends ContourEngineError {
  constructor(message: string = "No points to export") {
    super(message, "EMPTY_GEOMETRY")
    this.name = "EmptyGeometryError"
  }
}

export class ExportIOError extends ContourEngineError {
  constructor(
    message: string,
    public filePath: string,
    cause?: unknown,
  ) {
    super(message, "EXPORT_IO_ERROR", { cause })
    this.name = "ExportIOError"
  }
}
