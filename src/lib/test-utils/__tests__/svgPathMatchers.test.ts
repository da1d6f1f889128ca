/**
 * Tests for SVG comparison utilities
 */

import { describe, it, expect } from "vitest"
import {
  parseSvgPath,
  numbersMatch,
  pathToPoints,
  pathsMatch,
  extractPathsFromSvg,
  extractViewBox,
  getPathBounds,
  isPathClosed,
  expectPathsToMatch,
} from "../svgPathMatchers"

describe("SVG Path Matchers", () => {
  describe("parseSvgPath", () => {
    it("should parse comma-separated polyline commands", () => {
      const commands = parseSvgPath("M 10,20 L 30,40")

      expect(commands).toEqual([
        { type: "M", coords: [10, 20] },
        { type: "L", coords: [30, 40] },
      ])
    })

    it("should normalize whitespace and negative numbers", () => {
      expect(parseSvgPath("M -1.5,2   L 3,-4")).toEqual(parseSvgPath("M-1.5 2L3 -4"))
    })

    it("should parse close path command", () => {
      const commands = parseSvgPath("M 10 20 L 30 40 Z")

      expect(commands).toHaveLength(3)
      expect(commands[2]).toEqual({ type: "Z", coords: [] })
    })
  })

  describe("numbersMatch", () => {
    it("should match numbers within epsilon", () => {
      expect(numbersMatch(10.0001, 10.0002, 0.001)).toBe(true)
      expect(numbersMatch(-5, -5)).toBe(true)
    })

    it("should not match numbers outside epsilon", () => {
      expect(numbersMatch(10, 10.1, 0.001)).toBe(false)
    })
  })

  describe("pathToPoints", () => {
    it("should list vertices in order", () => {
      expect(pathToPoints("M 0,0 L 1,2 L 3,4")).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 2 },
        { x: 3, y: 4 },
      ])
    })

    it("should return nothing for an empty path", () => {
      expect(pathToPoints("")).toEqual([])
    })
  })

  describe("pathsMatch", () => {
    it("should match paths with different formatting", () => {
      expect(pathsMatch("M 10,20 L 30,40", "M10 20L30 40").match).toBe(true)
    })

    it("should match paths with minor precision differences", () => {
      expect(pathsMatch("M 10 20 L 30 40", "M 10.0001 20.0002 L 30.0001 40.0002").match).toBe(
        true,
      )
    })

    it("should report the first differing vertex", () => {
      const result = pathsMatch("M 10 20 L 30 40", "M 10 20 L 50 60")

      expect(result.match).toBe(false)
      expect(result.reason).toBe("Vertex 1 differs: (30, 40) vs (50, 60)")
    })

    it("should report different vertex counts", () => {
      const result = pathsMatch("M 10 20 L 30 40", "M 10 20 L 30 40 L 50 60")

      expect(result.match).toBe(false)
      expect(result.reason).toBe("Different number of vertices: 2 vs 3")
    })

    it("should throw from expectPathsToMatch on mismatch", () => {
      expect(() => expectPathsToMatch("M 0 0 L 1 1", "M 0 0 L 1 1")).not.toThrow()
      expect(() => expectPathsToMatch("M 0 0 L 1 1", "M 0 0 L 2 2")).toThrow(
        "SVG paths do not match",
      )
    })
  })

  describe("extractPathsFromSvg", () => {
    it("should extract path data and stroke attributes", () => {
      const svg = [
        `<svg xmlns="http://www.w3.org/2000/svg" viewBox="-1 -2 3 4">`,
        `  <path d="M 0,0 L 1,1" fill="none" stroke="red" stroke-width="0.015" opacity="0.8" />`,
        `</svg>`,
      ].join("\n")

      expect(extractPathsFromSvg(svg)).toEqual([
        {
          d: "M 0,0 L 1,1",
          fill: "none",
          stroke: "red",
          strokeWidth: "0.015",
          opacity: "0.8",
        },
      ])
      expect(extractViewBox(svg)).toEqual({ x: -1, y: -2, width: 3, height: 4 })
    })

    it("should return null viewBox when absent", () => {
      expect(extractViewBox("<svg></svg>")).toBeNull()
    })
  })

  describe("getPathBounds", () => {
    it("should calculate bounds for simple path", () => {
      const bounds = getPathBounds("M 10 20 L 30 40 L 50 60")

      expect(bounds?.minX).toBe(10)
      expect(bounds?.minY).toBe(20)
      expect(bounds?.maxX).toBe(50)
      expect(bounds?.maxY).toBe(60)
      expect(bounds?.width).toBe(40)
      expect(bounds?.height).toBe(40)
    })

    it("should return null for empty path", () => {
      expect(getPathBounds("")).toBeNull()
    })
  })

  describe("isPathClosed", () => {
    it("should detect paths that return to their start", () => {
      expect(isPathClosed("M 0 0 L 1 0 L 0 0")).toBe(true)
      expect(isPathClosed("M 0 0 L 1 0 Z")).toBe(true)
      expect(isPathClosed("M 0 0 L 1 0")).toBe(false)
    })
  })
})
