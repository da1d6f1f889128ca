import { describe, it, expect, vi, afterEach } from "vitest"
import { ContourEngine } from "../ContourEngine"
import { ContourEngineError, DomainError } from "../types"
import { rotate } from "../utils/transform"
import { DEFAULT_AIRFOIL_PARAMS, EMBLEM_STROKE, OVERLAY_STROKE } from "@/lib/constants"

describe("ContourEngine", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe("generateOverlay", () => {
    const engine = new ContourEngine()

    it("should return the plain airfoil for one revolution", () => {
      const airfoil = engine.generateAirfoil(DEFAULT_AIRFOIL_PARAMS)
      const overlay = engine.generateOverlay(DEFAULT_AIRFOIL_PARAMS, { yOffset: 0, revolutions: 1 })

      expect(overlay).toHaveLength(1)
      expect(overlay[0]).toEqual(airfoil)
    })

    it("should shift before replicating", () => {
      const airfoil = engine.generateAirfoil(DEFAULT_AIRFOIL_PARAMS)
      const overlay = engine.generateOverlay(DEFAULT_AIRFOIL_PARAMS, {
        yOffset: 0.5,
        revolutions: 3,
      })

      expect(overlay).toHaveLength(3)
      expect(overlay[0][0].x).toBe(airfoil[0].x)
      expect(overlay[0][0].y).toBe(airfoil[0].y + 0.5)

      const [expected] = rotate([overlay[0][0]], 120)
      expect(overlay[1][0].x).toBeCloseTo(expected.x, 12)
      expect(overlay[1][0].y).toBeCloseTo(expected.y, 12)
    })

    it("should pass domain errors through unchanged", () => {
      expect(() =>
        engine.generateOverlay(
          { radius: 0.5, xCenter: 0, yCenter: 0.5, scale: 1 },
          { yOffset: 0, revolutions: 1 },
        ),
      ).toThrow(DomainError)
    })
  })

  describe("emblem and export", () => {
    const engine = new ContourEngine()
    const emblem = engine.buildEmblem()

    it("should style emblem and overlay layers", () => {
      const overlay = engine.generateOverlay(DEFAULT_AIRFOIL_PARAMS, { yOffset: 0, revolutions: 3 })
      const layers = engine.createExportLayers(emblem, overlay, 3)

      expect(layers).toHaveLength(12)
      expect(layers[0]).toEqual({
        contour: emblem.contours[0],
        strokeColor: EMBLEM_STROKE.strokeColor,
        strokeWidth: EMBLEM_STROKE.strokeWidth,
        opacity: EMBLEM_STROKE.opacity,
      })
      expect(layers[9].strokeColor).toBe(OVERLAY_STROKE.strokeColor)
      expect(layers[9].opacity).toBe(0.8)
    })

    it("should draw a single overlay at full opacity", () => {
      const overlay = engine.generateOverlay(DEFAULT_AIRFOIL_PARAMS, { yOffset: 0, revolutions: 1 })
      const layers = engine.createExportLayers(emblem, overlay, 1)

      expect(layers).toHaveLength(10)
      expect(layers[9].opacity).toBe(1)
    })

    it("should label the document with the revolution count", () => {
      const overlay = engine.generateOverlay(DEFAULT_AIRFOIL_PARAMS, { yOffset: 0, revolutions: 3 })
      const document = engine.buildDocument(emblem, overlay, 3)

      expect(document.label).toBe("SpinPAK Logo - 3× Revolution")
      expect(document.padding).toBe(0.2)
      expect(document.pixelsPerUnit).toBe(300)
    })

    it("should let export options override the label", () => {
      const document = engine.buildDocument(emblem, [], 1, { label: "Draft" })
      expect(document.label).toBe("Draft")
    })
  })

  describe("caching", () => {
    it("should reuse fits across emblem builds", () => {
      const engine = new ContourEngine()
      engine.buildEmblem()
      const afterFirst = engine.getStats().cache
      engine.buildEmblem()
      const afterSecond = engine.getStats().cache

      expect(afterFirst.misses).toBe(3)
      expect(afterFirst.hits).toBe(0)
      expect(afterSecond.hits).toBe(3)
      expect(afterSecond.size).toBe(3)
    })

    it("should not reuse fits made under other solver settings", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
      const engine = new ContourEngine()
      expect(engine.buildEmblem().warnings).toEqual([])

      engine.updateOptions({ solver: { maxIterations: 3, residualTolerance: 1e-30 } })
      const strict = engine.buildEmblem()

      expect(strict.warnings).toHaveLength(3)
      expect(warn).toHaveBeenCalledTimes(3)
      expect(engine.getStats().cache).toMatchObject({ hits: 0, misses: 6, size: 6 })
    })

    it("should skip the cache when caching is disabled", () => {
      const engine = new ContourEngine({ enableCaching: false })
      engine.buildEmblem()

      expect(engine.getStats().cache.size).toBe(0)
    })

    it("should empty the cache on clearCaches", () => {
      const engine = new ContourEngine()
      engine.buildEmblem()
      engine.clearCaches()

      expect(engine.getStats().cache).toMatchObject({ size: 0, hits: 0, misses: 0 })
    })
  })

  describe("options", () => {
    it("should apply updated sample counts", () => {
      const engine = new ContourEngine()
      engine.updateOptions({ airfoilSamples: 25 })

      expect(engine.generateAirfoil(DEFAULT_AIRFOIL_PARAMS)).toHaveLength(25)
      expect(engine.getStats().options.airfoilSamples).toBe(25)
    })

    it("should log timings in debug mode", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {})
      const engine = new ContourEngine({ debugMode: true })
      engine.generateAirfoil(DEFAULT_AIRFOIL_PARAMS)

      expect(log).toHaveBeenCalledTimes(1)
      expect(String(log.mock.calls[0][0])).toMatch(
        /^\[ContourEngine\] generateAirfoil: \d+\.\d{2}ms, 400 points$/,
      )
    })

    it("should wrap unexpected failures", () => {
      const engine = new ContourEngine({ airfoilSamples: 10 })
      const params = { ...DEFAULT_AIRFOIL_PARAMS }
      Object.defineProperty(params, "radius", {
        get() {
          throw new RangeError("broken input")
        },
      })

      expect(() => engine.generateAirfoil(params)).toThrow(ContourEngineError)
      expect(() => engine.generateAirfoil(params)).toThrow(
        "Failed to generateAirfoil: broken input",
      )
    })
  })
})
