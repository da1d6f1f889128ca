/**
 * Advisory checks on live parameters.
 * Reports values outside the control ranges and a generating circle that
 * touches the origin. Nothing is clamped.
 */

import type { AirfoilParameters, OverlayParameters, ValidationIssue } from "../types"
import { PARAMETER_RANGES } from "@/lib/constants"

type RangedParameter = keyof typeof PARAMETER_RANGES

function checkRange(
  issues: ValidationIssue[],
  parameter: RangedParameter,
  value: number,
): void {
  const { min, max } = PARAMETER_RANGES[parameter]

  if (!Number.isFinite(value)) {
    issues.push({
      severity: "error",
      parameter,
      message: `${parameter} must be a finite number, got ${value}`,
    })
    return
  }

  if (value < min || value > max) {
    issues.push({
      severity: "warning",
      parameter,
      message: `${parameter} = ${value} is outside [${min}, ${max}]`,
    })
  }
}

export function validateStudioParameters(
  airfoil: AirfoilParameters,
  overlay: OverlayParameters,
): ValidationIssue[] {
  const issues: ValidationIssue[] = []

  checkRange(issues, "radius", airfoil.radius)
  checkRange(issues, "xCenter", airfoil.xCenter)
  checkRange(issues, "yCenter", airfoil.yCenter)
  checkRange(issues, "scale", airfoil.scale)
  checkRange(issues, "yOffset", overlay.yOffset)
  checkRange(issues, "revolutions", overlay.revolutions)

  if (Number.isFinite(overlay.revolutions) && !Number.isInteger(overlay.revolutions)) {
    issues.push({
      severity: "warning",
      parameter: "revolutions",
      message: `revolutions should be an integer, got ${overlay.revolutions} (rounded down)`,
    })
  }

  // Same tolerance the generator uses to reject the circle
  const { radius, xCenter, yCenter } = airfoil
  if (
    [radius, xCenter, yCenter].every(Number.isFinite) &&
    radius > 0 &&
    Math.abs(Math.hypot(xCenter, yCenter) - radius) <= 1e-9 * radius
  ) {
    issues.push({
      severity: "error",
      parameter: "radius",
      message: "Generating circle passes through the origin; the airfoil is undefined",
    })
  }

  return issues
}
