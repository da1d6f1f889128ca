/**
 * TangentCircleSolver - Fits fixed-radius circles tangent to two obstacles
 *
 * The fit minimizes Σ (dist(center, obstacle) - r)² plus quadratic penalties
 * for disallowed regions. Convergence is not guaranteed: every fit returns
 * its best iterate together with the residual so callers can decide.
 */

import type {
  DiskConstraint,
  FilletResult,
  Obstacle,
  Orientation,
  Point2D,
  TangentFit,
} from "./types"
import { FilletCache, fitCacheKey } from "./FilletCache"
import { closestPointOnObstacle, distance, distanceToObstacle } from "./utils/distance"
import { minimizeScalarBounded, nelderMead } from "./utils/optimize"
import { sampleArcBetween } from "./utils/arcUtils"
import { SOLVER_DEFAULTS } from "@/lib/constants"

export interface TangentCircleSolverOptions {
  maxIterations: number
  xTolerance: number
  fTolerance: number
  // Fits with a residual above this are reported as not converged
  residualTolerance: number
  scalarTolerance: number
}

export interface AxisConstrainedFitRequest {
  // Obstacle that fixes the free coordinate while `fixedAxis` is held
  first: Obstacle
  // Obstacle that fixes the held coordinate afterwards
  second: Obstacle
  fixedAxis: "x" | "y"
  fixedValue: number
  firstInterval: readonly [number, number]
  secondInterval: readonly [number, number]
  targetRadius: number
}

export function penaltyTerm(center: Point2D, constraint: DiskConstraint): number {
  const d = distance(center, constraint.center)
  if (constraint.kind === "maxDistance" && d > constraint.radius) {
    return constraint.weight * (d - constraint.radius) ** 2
  }
  if (constraint.kind === "minDistance" && d < constraint.radius) {
    return constraint.weight * (constraint.radius - d) ** 2
  }
  return 0
}

export class TangentCircleSolver {
  private options: TangentCircleSolverOptions

  constructor(
    options: Partial<TangentCircleSolverOptions> = {},
    private cache: FilletCache | null = null,
  ) {
    this.options = { ...SOLVER_DEFAULTS, ...options }
  }

  get residualTolerance(): number {
    return this.options.residualTolerance
  }

  /**
   * Build the penalized least-squares objective for a fit
   */
  objective(
    obstacles: readonly Obstacle[],
    targetRadius: number,
    penalties: readonly DiskConstraint[] = [],
  ): (center: Point2D) => number {
    return (center) => {
      let total = 0
      for (const obstacle of obstacles) {
        total += (distanceToObstacle(obstacle, center) - targetRadius) ** 2
      }
      for (const penalty of penalties) {
        total += penaltyTerm(center, penalty)
      }
      return total
    }
  }

  /**
   * Simplex search for a center seeded at `initialGuess`
   */
  fit(
    initialGuess: Point2D,
    obstacles: readonly Obstacle[],
    targetRadius: number,
    penalties: readonly DiskConstraint[] = [],
  ): TangentFit {
    const compute = (): TangentFit => {
      const f = this.objective(obstacles, targetRadius, penalties)
      const result = nelderMead(
        ([x, y]) => f({ x, y }),
        [initialGuess.x, initialGuess.y],
        {
          maxIterations: this.options.maxIterations,
          xTolerance: this.options.xTolerance,
          fTolerance: this.options.fTolerance,
        },
      )
      return this.toFit({ x: result.x[0], y: result.x[1] }, result.value, result.iterations)
    }

    if (!this.cache) return compute()

    const key = fitCacheKey(
      "simplex",
      obstacles,
      targetRadius,
      [initialGuess.x, initialGuess.y],
      penalties,
      this.settingsKey(),
    )
    return this.cache.getOrCompute(key, compute)
  }

  /**
   * Two bounded 1-D searches: first the free coordinate against `first`
   * with the other held at `fixedValue`, then the held coordinate against
   * `second`.
   */
  fitAxisConstrained(request: AxisConstrainedFitRequest): TangentFit {
    const compute = (): TangentFit => {
      const { first, second, fixedAxis, fixedValue, targetRadius } = request
      const at = (free: number, held: number): Point2D =>
        fixedAxis === "y" ? { x: free, y: held } : { x: held, y: free }
      const scalarOptions = {
        tolerance: this.options.scalarTolerance,
        maxIterations: this.options.maxIterations,
      }

      const freeResult = minimizeScalarBounded(
        (free) => Math.abs(distanceToObstacle(first, at(free, fixedValue)) - targetRadius),
        request.firstInterval[0],
        request.firstInterval[1],
        scalarOptions,
      )
      const heldResult = minimizeScalarBounded(
        (held) => Math.abs(distanceToObstacle(second, at(freeResult.x, held)) - targetRadius),
        request.secondInterval[0],
        request.secondInterval[1],
        scalarOptions,
      )

      const center = at(freeResult.x, heldResult.x)
      const value = this.objective([first, second], targetRadius)(center)
      return this.toFit(center, value, freeResult.iterations + heldResult.iterations)
    }

    if (!this.cache) return compute()

    const key = fitCacheKey(
      `axis-${request.fixedAxis}=${request.fixedValue}` +
        `[${request.firstInterval.join(",")}][${request.secondInterval.join(",")}]`,
      [request.first, request.second],
      request.targetRadius,
      [],
      [],
      this.settingsKey(),
    )
    return this.cache.getOrCompute(key, compute)
  }

  /**
   * Contacts and connecting arc for a fitted center. The arc runs from the
   * contact on `obstacleA` to the contact on `obstacleB` in `orientation`.
   */
  resolveFillet(
    center: Point2D,
    obstacleA: Obstacle,
    obstacleB: Obstacle,
    radius: number,
    orientation: Orientation,
    sampleCount: number,
  ): FilletResult {
    const contactA = closestPointOnObstacle(obstacleA, center)
    const contactB = closestPointOnObstacle(obstacleB, center)

    return {
      center,
      radius,
      contactA,
      contactB,
      arc: sampleArcBetween(center, radius, contactA, contactB, orientation, sampleCount),
      orientation,
    }
  }

  // Every option changes either the fitted center or its converged flag
  private settingsKey(): string {
    const { maxIterations, xTolerance, fTolerance, residualTolerance, scalarTolerance } =
      this.options
    return [maxIterations, xTolerance, fTolerance, residualTolerance, scalarTolerance].join(",")
  }

  private toFit(center: Point2D, value: number, iterations: number): TangentFit {
    const residual = Math.sqrt(Math.max(0, value))
    return {
      center,
      residual,
      converged: residual <= this.options.residualTolerance,
      iterations,
    }
  }
}
