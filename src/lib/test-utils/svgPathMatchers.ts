/**
 * Test utilities for comparing SVG output semantically
 *
 * Exported paths are polylines ("M x,y L x,y …"), so two paths describe the
 * same contour when their vertex lists agree within a tolerance, whatever
 * the number formatting or whitespace.
 */

export interface PathCommand {
  type: string
  coords: number[]
}

export interface PathPoint {
  x: number
  y: number
}

/**
 * Parse an SVG path string into commands with numeric coordinates
 */
export function parseSvgPath(pathString: string): PathCommand[] {
  const commands: PathCommand[] = []

  const segments = pathString
    .trim()
    .replace(/,/g, " ")
    .replace(/\s+/g, " ")
    .replace(/([a-zA-Z])/g, "|$1 ")
    .split("|")
    .filter(Boolean)

  for (const segment of segments) {
    const parts = segment.trim().split(/\s+/)
    if (parts.length === 0 || parts[0] === "") continue

    commands.push({
      type: parts[0],
      coords: parts
        .slice(1)
        .map(Number)
        .filter((n) => !isNaN(n)),
    })
  }

  return commands
}

export function numbersMatch(a: number, b: number, epsilon: number = 0.001): boolean {
  return Math.abs(a - b) < epsilon
}

/**
 * Vertices of a move-to/line-to path, in order
 */
export function pathToPoints(pathString: string): PathPoint[] {
  const points: PathPoint[] = []

  for (const cmd of parseSvgPath(pathString)) {
    const type = cmd.type.toUpperCase()
    if (type !== "M" && type !== "L") continue

    for (let i = 0; i + 1 < cmd.coords.length; i += 2) {
      points.push({ x: cmd.coords[i], y: cmd.coords[i + 1] })
    }
  }

  return points
}

/**
 * Compare two polyline paths vertex by vertex
 */
export function pathsMatch(
  actual: string,
  expected: string,
  epsilon: number = 0.001,
): { match: boolean; reason?: string } {
  const actualPoints = pathToPoints(actual)
  const expectedPoints = pathToPoints(expected)

  if (actualPoints.length !== expectedPoints.length) {
    return {
      match: false,
      reason: `Different number of vertices: ${actualPoints.length} vs ${expectedPoints.length}`,
    }
  }

  for (let i = 0; i < actualPoints.length; i++) {
    const a = actualPoints[i]
    const e = expectedPoints[i]
    if (!numbersMatch(a.x, e.x, epsilon) || !numbersMatch(a.y, e.y, epsilon)) {
      return {
        match: false,
        reason: `Vertex ${i} differs: (${a.x}, ${a.y}) vs (${e.x}, ${e.y})`,
      }
    }
  }

  return { match: true }
}

export interface ExtractedPath {
  d: string
  fill?: string
  stroke?: string
  strokeWidth?: string
  opacity?: string
}

/**
 * Extract all <path> elements from an SVG string
 */
export function extractPathsFromSvg(svg: string): ExtractedPath[] {
  const paths: ExtractedPath[] = []
  const pathRegex = /<path[^>]*\bd="([^"]*)"[^>]*>/gi
  let match: RegExpExecArray | null = pathRegex.exec(svg)

  while (match !== null) {
    const fullTag = match[0]
    const attribute = (name: string) =>
      fullTag.match(new RegExp(`\\b${name}="([^"]*)"`))?.[1]

    paths.push({
      d: match[1],
      fill: attribute("fill"),
      stroke: attribute("stroke"),
      strokeWidth: attribute("stroke-width"),
      opacity: attribute("opacity"),
    })

    match = pathRegex.exec(svg)
  }

  return paths
}

export function countPaths(svg: string): number {
  return extractPathsFromSvg(svg).length
}

/**
 * The root viewBox as numbers, or null when absent
 */
export function extractViewBox(
  svg: string,
): { x: number; y: number; width: number; height: number } | null {
  const match = svg.match(/<svg[^>]*\bviewBox="([^"]*)"/)
  if (!match) return null

  const [x, y, width, height] = match[1].trim().split(/\s+/).map(Number)
  return { x, y, width, height }
}

export function getPathBounds(pathString: string): {
  minX: number
  minY: number
  maxX: number
  maxY: number
  width: number
  height: number
} | null {
  const points = pathToPoints(pathString)
  if (points.length === 0) return null

  let minX = Infinity
  let minY = Infinity
  let maxX = -Infinity
  let maxY = -Infinity

  for (const p of points) {
    minX = Math.min(minX, p.x)
    minY = Math.min(minY, p.y)
    maxX = Math.max(maxX, p.x)
    maxY = Math.max(maxY, p.y)
  }

  return {
    minX,
    minY,
    maxX,
    maxY,
    width: maxX - minX,
    height: maxY - minY,
  }
}

/**
 * Closed when it ends with Z or returns to its first vertex
 */
export function isPathClosed(pathString: string, epsilon: number = 0.001): boolean {
  const commands = parseSvgPath(pathString)
  if (commands.length === 0) return false
  if (commands[commands.length - 1].type.toUpperCase() === "Z") return true

  const points = pathToPoints(pathString)
  if (points.length < 2) return false

  const first = points[0]
  const last = points[points.length - 1]
  return numbersMatch(first.x, last.x, epsilon) && numbersMatch(first.y, last.y, epsilon)
}

export function expectPathsToMatch(actual: string, expected: string, epsilon?: number): void {
  const result = pathsMatch(actual, expected, epsilon)

  if (!result.match) {
    throw new Error(
      `SVG paths do not match:\n` +
        `  Reason: ${result.reason}\n` +
        `  Actual:   ${actual}\n` +
        `  Expected: ${expected}`,
    )
  }
}
