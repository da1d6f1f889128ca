/**
 * AirfoilGenerator - Joukowsky airfoil from a parametrized circle
 *
 * The circle w(θ) = (xc + R cos θ) + i(yc + R sin θ) is mapped through
 * z = w + R²/w, then scaled. θ covers [0, 2π] with both ends sampled, so
 * the curve closes up to rounding.
 */

import type { AirfoilParameters, Curve } from "./types"
import { DomainError } from "./types"
import { linspace } from "./utils/arcUtils"
import { AIRFOIL_SAMPLE_COUNT } from "@/lib/constants"

// Relative tolerance for the generating circle touching the origin
const ORIGIN_TOLERANCE = 1e-9

export class AirfoilGenerator {
  constructor(private sampleCount: number = AIRFOIL_SAMPLE_COUNT) {}

  generate(params: AirfoilParameters): Curve {
    const { radius, xCenter, yCenter, scale } = params

    if (![radius, xCenter, yCenter, scale].every(Number.isFinite)) {
      throw new DomainError("Airfoil parameters must be finite numbers")
    }
    if (radius <= 0) {
      throw new DomainError(`Airfoil radius must be positive, got ${radius}`)
    }
    if (Math.abs(Math.hypot(xCenter, yCenter) - radius) <= ORIGIN_TOLERANCE * radius) {
      throw new DomainError(
        `Generating circle (R=${radius}, center=(${xCenter}, ${yCenter})) passes through the origin`,
      )
    }

    const a2 = radius * radius
    const points = linspace(0, 2 * Math.PI, this.sampleCount).map((theta) => {
      const wx = xCenter + radius * Math.cos(theta)
      const wy = yCenter + radius * Math.sin(theta)
      const modulusSq = wx * wx + wy * wy

      // R²/w = R² · conj(w) / |w|²
      const zx = wx + (a2 * wx) / modulusSq
      const zy = wy - (a2 * wy) / modulusSq
      return { x: scale * zx, y: scale * zy }
    })

    if (!points.every((p) => Number.isFinite(p.x) && Number.isFinite(p.y))) {
      throw new DomainError("Conformal map produced non-finite coordinates")
    }

    return points
  }
}
