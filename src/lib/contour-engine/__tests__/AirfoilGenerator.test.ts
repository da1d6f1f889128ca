import { describe, it, expect } from "vitest"
import { AirfoilGenerator } from "../AirfoilGenerator"
import { DomainError } from "../types"
import { DEFAULT_AIRFOIL_PARAMS } from "@/lib/constants"

describe("AirfoilGenerator", () => {
  const generator = new AirfoilGenerator()

  it("should sample 400 finite points by default", () => {
    const airfoil = generator.generate(DEFAULT_AIRFOIL_PARAMS)

    expect(airfoil).toHaveLength(400)
    expect(airfoil.every((p) => Number.isFinite(p.x) && Number.isFinite(p.y))).toBe(true)
  })

  it("should close up to rounding", () => {
    const airfoil = generator.generate(DEFAULT_AIRFOIL_PARAMS)
    const first = airfoil[0]
    const last = airfoil[airfoil.length - 1]

    expect(Math.abs(first.x - last.x)).toBeLessThan(1e-9)
    expect(Math.abs(first.y - last.y)).toBeLessThan(1e-9)
  })

  it("should map θ = 0 through z = w + R²/w", () => {
    // w = (0.75, 0.23), |w|² = 0.6154, R² = 0.7225
    const [first] = generator.generate(DEFAULT_AIRFOIL_PARAMS)

    expect(first.x).toBeCloseTo(1.630525, 5)
    expect(first.y).toBeCloseTo(-0.040028, 5)
  })

  it("should flatten a circle centered at the origin into a plate", () => {
    const plate = generator.generate({ radius: 1, xCenter: 0, yCenter: 0, scale: 1 })

    expect(plate[0].x).toBeCloseTo(2, 12)
    for (const p of plate) {
      expect(Math.abs(p.y)).toBeLessThan(1e-12)
      expect(Math.abs(p.x)).toBeLessThanOrEqual(2 + 1e-12)
    }
  })

  it("should scale linearly", () => {
    const unit = generator.generate(DEFAULT_AIRFOIL_PARAMS)
    const doubled = generator.generate({ ...DEFAULT_AIRFOIL_PARAMS, scale: 2 })

    doubled.forEach((p, i) => {
      expect(p.x).toBeCloseTo(2 * unit[i].x, 12)
      expect(p.y).toBeCloseTo(2 * unit[i].y, 12)
    })
  })

  it("should honor a custom sample count", () => {
    expect(new AirfoilGenerator(10).generate(DEFAULT_AIRFOIL_PARAMS)).toHaveLength(10)
  })

  describe("domain errors", () => {
    it("should reject a generating circle through the origin", () => {
      expect(() =>
        generator.generate({ radius: 0.5, xCenter: 0, yCenter: 0.5, scale: 1 }),
      ).toThrow(DomainError)
    })

    it("should reject a non-positive radius", () => {
      expect(() =>
        generator.generate({ ...DEFAULT_AIRFOIL_PARAMS, radius: 0 }),
      ).toThrow(DomainError)
    })

    it("should reject non-finite parameters", () => {
      expect(() =>
        generator.generate({ ...DEFAULT_AIRFOIL_PARAMS, xCenter: Number.NaN }),
      ).toThrow("Airfoil parameters must be finite numbers")
    })
  })
})
