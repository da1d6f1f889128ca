/**
 * EmblemBuilder - Builds the static three-fold revolution emblem
 *
 * One sector runs along the outer arc, down the shoulder segment and along
 * the inner arc, with fitted fillets at the three corners. The sector is
 * mirrored across the 150° axis, the spine ends are joined by a
 * closed-form fillet, and the resulting wedge is replicated at 0°/120°/240°.
 *
 * The result is deep-frozen and meant to be built once and shared.
 */

import type {
  ConvergenceWarning,
  Curve,
  DiskConstraint,
  EmblemFillets,
  EmblemGeometry,
  Obstacle,
  Point2D,
  TangentFit,
} from "./types"
import { TangentCircleSolver } from "./TangentCircleSolver"
import { LineJointSolver } from "./LineJointSolver"
import { ContourAssembler } from "./ContourAssembler"
import { replicate } from "./SymmetryReplicator"
import { sampleArc } from "./utils/arcUtils"
import { reflect } from "./utils/transform"
import {
  ARC_SAMPLE_COUNT,
  EMBLEM_CORNER_RADIUS,
  EMBLEM_INNER_RADIUS,
  EMBLEM_JOINT_RADIUS,
  EMBLEM_MIRROR_AXIS_DEG,
  EMBLEM_OUTER_RADIUS,
  EMBLEM_REPLICATION_ANGLES,
  EMBLEM_SHOULDER_X,
  EMBLEM_SPINE_X,
  FILLET_SAMPLE_COUNT,
} from "@/lib/constants"

export interface EmblemBuilderOptions {
  solver?: TangentCircleSolver
  jointSolver?: LineJointSolver
  assembler?: ContourAssembler
  arcSamples?: number
  filletSamples?: number
  debugMode?: boolean
}

export interface EmblemPrimitives {
  outerArc: Obstacle
  shoulder: Obstacle
  innerArc: Obstacle
  spine: Obstacle
}

const ORIGIN: Point2D = { x: 0, y: 0 }

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value)
    const children: unknown[] = Object.values(value)
    for (const child of children) {
      deepFreeze(child)
    }
  }
  return value
}

/**
 * Raw arcs and segments of one sector before any rounding
 */
export function createEmblemPrimitives(arcSamples: number = ARC_SAMPLE_COUNT): EmblemPrimitives {
  const r1 = EMBLEM_INNER_RADIUS
  const r2 = EMBLEM_OUTER_RADIUS
  const shoulderX = EMBLEM_SHOULDER_X
  const spineX = EMBLEM_SPINE_X

  const innerShoulder = { x: shoulderX, y: Math.sqrt(r1 ** 2 - shoulderX ** 2) }
  const outerShoulder = { x: shoulderX, y: Math.sqrt(r2 ** 2 - shoulderX ** 2) }
  const spineTop = { x: spineX, y: Math.sqrt(r1 ** 2 - spineX ** 2) }
  const spineBottom = { x: spineX, y: 0 }

  return {
    outerArc: {
      kind: "sampledArc",
      points: sampleArc(ORIGIN, r2, Math.PI / 2, Math.acos(shoulderX / r2), arcSamples),
    },
    shoulder: { kind: "segment", points: [outerShoulder, innerShoulder] },
    innerArc: {
      kind: "sampledArc",
      points: sampleArc(ORIGIN, r1, Math.acos(shoulderX / r1), Math.acos(spineX / r1), arcSamples),
    },
    spine: { kind: "segment", points: [spineTop, spineBottom] },
  }
}

export function buildEmblem(options: EmblemBuilderOptions = {}): EmblemGeometry {
  const solver = options.solver ?? new TangentCircleSolver()
  const jointSolver = options.jointSolver ?? new LineJointSolver()
  const assembler = options.assembler ?? new ContourAssembler()
  const filletSamples = options.filletSamples ?? FILLET_SAMPLE_COUNT
  const r = EMBLEM_CORNER_RADIUS

  const { outerArc, shoulder, innerArc, spine } = createEmblemPrimitives(
    options.arcSamples ?? ARC_SAMPLE_COUNT,
  )
  const warnings: ConvergenceWarning[] = []

  const check = (name: string, fit: TangentFit) => {
    if (options.debugMode) {
      console.log(
        `[EmblemBuilder] ${name} fillet center (${fit.center.x.toFixed(6)}, ${fit.center.y.toFixed(6)}), residual ${fit.residual.toExponential(2)}, ${fit.iterations} iterations`,
      )
    }
    if (fit.converged) return

    const warning: ConvergenceWarning = {
      fillet: name,
      residual: fit.residual,
      tolerance: solver.residualTolerance,
      message: `Fillet "${name}" did not converge (residual ${fit.residual.toExponential(2)}); try another seed`,
    }
    console.warn(`[EmblemBuilder] ${warning.message}`)
    warnings.push(warning)
  }

  // Outer arc -> shoulder: center must stay inside the outer circle
  const innerPenalty: DiskConstraint = {
    kind: "maxDistance",
    center: ORIGIN,
    radius: EMBLEM_OUTER_RADIUS - r,
    weight: 10,
  }
  const innerFit = solver.fit(
    { x: EMBLEM_SHOULDER_X + r, y: 1.0 },
    [shoulder, outerArc],
    r,
    [innerPenalty],
  )
  check("inner", innerFit)
  const inner = solver.resolveFillet(
    innerFit.center,
    outerArc,
    shoulder,
    r,
    "counterclockwise",
    filletSamples,
  )

  // Shoulder -> inner arc: center must stay outside the inner circle
  const outerPenalty: DiskConstraint = {
    kind: "minDistance",
    center: ORIGIN,
    radius: EMBLEM_INNER_RADIUS + r,
    weight: 1000,
  }
  const outerFit = solver.fit(
    { x: EMBLEM_SHOULDER_X + r, y: 0.8 },
    [shoulder, innerArc],
    r,
    [outerPenalty],
  )
  check("outer", outerFit)
  const outer = solver.resolveFillet(
    outerFit.center,
    shoulder,
    innerArc,
    r,
    "counterclockwise",
    filletSamples,
  )

  // Inner arc -> spine: x is set by the spine alone, then y by the arc
  const lowerFit = solver.fitAxisConstrained({
    first: spine,
    second: innerArc,
    fixedAxis: "y",
    fixedValue: 0.3,
    firstInterval: [-0.3, EMBLEM_SPINE_X],
    secondInterval: [0.3, 1.0],
    targetRadius: r,
  })
  check("lower", lowerFit)
  const lower = solver.resolveFillet(lowerFit.center, innerArc, spine, r, "clockwise", filletSamples)

  const sector = assembler.assembleSector([
    { kind: "piece", obstacle: outerArc, before: inner },
    { kind: "fillet", fillet: inner },
    { kind: "piece", obstacle: shoulder, after: inner, before: outer },
    { kind: "fillet", fillet: outer },
    { kind: "piece", obstacle: innerArc, after: outer, before: lower },
    { kind: "fillet", fillet: lower },
  ])
  const mirroredSector = reflect(sector, EMBLEM_MIRROR_AXIS_DEG)

  // Round the spine corner between the sector and its mirror image
  const spineEnd = lower.contactB
  const spineBottom = spine.points[1]
  const [mirroredSpineEnd] = reflect([spineEnd], EMBLEM_MIRROR_AXIS_DEG)
  const joint = jointSolver.solve(
    spineEnd,
    spineBottom,
    mirroredSpineEnd,
    EMBLEM_JOINT_RADIUS,
    "clockwise",
    filletSamples,
  )
  const jointPath: Curve = assembler.join([
    [spineEnd, joint.contactA],
    joint.arc,
    [joint.contactB, mirroredSpineEnd],
  ])

  const baseContours = [sector, jointPath, mirroredSector]
  const contours = replicate(baseContours, EMBLEM_REPLICATION_ANGLES)

  const fillets: EmblemFillets = {
    inner,
    outer,
    lower,
    joint,
  }

  return deepFreeze({
    sector,
    joint: jointPath,
    mirroredSector,
    baseContours,
    contours,
    fillets,
    warnings,
  })
}
