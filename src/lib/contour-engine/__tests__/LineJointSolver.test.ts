import { describe, it, expect } from "vitest"
import { LineJointSolver } from "../LineJointSolver"
import { DomainError } from "../types"
import { distance, projectOntoSegment } from "../utils/distance"

const B = { x: 0, y: 0 }
const A = { x: 2, y: 0 }
const C = { x: 0, y: 2 }

describe("LineJointSolver", () => {
  const solver = new LineJointSolver()

  it("should round a right-angle corner", () => {
    const joint = solver.solve(A, B, C, 0.5, "clockwise", 5)

    expect(joint.center.x).toBeCloseTo(0.5, 12)
    expect(joint.center.y).toBeCloseTo(0.5, 12)
    expect(joint.contactA.x).toBeCloseTo(0.5, 12)
    expect(joint.contactA.y).toBeCloseTo(0, 12)
    expect(joint.contactB.x).toBeCloseTo(0, 12)
    expect(joint.contactB.y).toBeCloseTo(0.5, 12)
  })

  it("should keep the center at the radius from both legs", () => {
    const a = { x: 1, y: 3 }
    const c = { x: -2, y: 0.5 }
    const joint = solver.solve(a, B, c, 0.3, "counterclockwise", 10)

    expect(distance(joint.center, projectOntoSegment(joint.center, B, a))).toBeCloseTo(0.3, 9)
    expect(distance(joint.center, projectOntoSegment(joint.center, B, c))).toBeCloseTo(0.3, 9)
  })

  it("should sample the minor arc between the contacts", () => {
    const joint = solver.solve(A, B, C, 0.5, "clockwise", 5)

    expect(joint.arc).toHaveLength(5)
    for (const p of joint.arc) {
      expect(distance(p, joint.center)).toBeCloseTo(0.5, 12)
    }
    expect(joint.arc[0].x).toBeCloseTo(joint.contactA.x, 12)
    expect(joint.arc[0].y).toBeCloseTo(joint.contactA.y, 12)
    expect(joint.arc[4].x).toBeCloseTo(joint.contactB.x, 12)
    expect(joint.arc[4].y).toBeCloseTo(joint.contactB.y, 12)
    // Midpoint faces the vertex
    expect(joint.arc[2].x).toBeCloseTo(0.5 - 0.5 * Math.SQRT1_2, 12)
    expect(joint.arc[2].y).toBeCloseTo(0.5 - 0.5 * Math.SQRT1_2, 12)
  })

  it("should reject parallel legs", () => {
    expect(() => solver.solve(A, B, { x: 1, y: 0 }, 0.5, "clockwise", 5)).toThrow(DomainError)
  })

  it("should reject collinear legs", () => {
    expect(() => solver.solve(A, B, { x: -1, y: 0 }, 0.5, "clockwise", 5)).toThrow(
      /collinear/,
    )
  })

  it("should reject degenerate input", () => {
    expect(() => solver.solve(A, B, C, 0, "clockwise", 5)).toThrow(DomainError)
    expect(() => solver.solve(B, B, C, 0.5, "clockwise", 5)).toThrow(DomainError)
  })
})
