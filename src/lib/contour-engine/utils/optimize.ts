/**
 * Derivative-free minimizers used by the fillet solver.
 *
 * nelderMead follows the classic simplex update (reflect 1, expand 2,
 * contract 1/2, shrink 1/2) and always returns its best vertex, whether or
 * not the tolerances were reached.
 */

export interface MinimizeOptions {
  maxIterations: number
  xTolerance: number
  fTolerance: number
}

export interface MinimizeResult {
  x: number[]
  value: number
  iterations: number
  // True when the tolerances were met before maxIterations
  terminated: boolean
}

export interface ScalarMinimizeOptions {
  tolerance: number
  maxIterations: number
}

export interface ScalarMinimizeResult {
  x: number
  value: number
  iterations: number
}

const REFLECT = 1
const EXPAND = 2
const CONTRACT = 0.5
const SHRINK = 0.5

function initialSimplex(x0: readonly number[]): number[][] {
  const simplex = [x0.slice()]
  for (let k = 0; k < x0.length; k++) {
    const vertex = x0.slice()
    vertex[k] = vertex[k] !== 0 ? 1.05 * vertex[k] : 0.00025
    simplex.push(vertex)
  }
  return simplex
}

// Weighted combination (1 + w) * a - w * b
function combine(a: readonly number[], b: readonly number[], w: number): number[] {
  return a.map((value, i) => (1 + w) * value - w * b[i])
}

export function nelderMead(
  f: (x: number[]) => number,
  x0: readonly number[],
  options: MinimizeOptions,
): MinimizeResult {
  const n = x0.length
  let simplex = initialSimplex(x0)
  let values = simplex.map((vertex) => f(vertex))

  const sortSimplex = () => {
    const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b])
    simplex = order.map((i) => simplex[i])
    values = order.map((i) => values[i])
  }

  sortSimplex()

  let iterations = 1
  let terminated = false

  while (iterations < options.maxIterations) {
    let xSpread = 0
    let fSpread = 0
    for (let i = 1; i <= n; i++) {
      fSpread = Math.max(fSpread, Math.abs(values[i] - values[0]))
      for (let j = 0; j < n; j++) {
        xSpread = Math.max(xSpread, Math.abs(simplex[i][j] - simplex[0][j]))
      }
    }
    if (xSpread <= options.xTolerance && fSpread <= options.fTolerance) {
      terminated = true
      break
    }

    const centroid = new Array<number>(n).fill(0)
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        centroid[j] += simplex[i][j] / n
      }
    }

    const worst = simplex[n]
    const reflected = combine(centroid, worst, REFLECT)
    const fReflected = f(reflected)
    let shrink = false

    if (fReflected < values[0]) {
      const expanded = combine(centroid, worst, REFLECT * EXPAND)
      const fExpanded = f(expanded)
      if (fExpanded < fReflected) {
        simplex[n] = expanded
        values[n] = fExpanded
      } else {
        simplex[n] = reflected
        values[n] = fReflected
      }
    } else if (fReflected < values[n - 1]) {
      simplex[n] = reflected
      values[n] = fReflected
    } else if (fReflected < values[n]) {
      const outside = combine(centroid, worst, CONTRACT * REFLECT)
      const fOutside = f(outside)
      if (fOutside <= fReflected) {
        simplex[n] = outside
        values[n] = fOutside
      } else {
        shrink = true
      }
    } else {
      const inside = combine(centroid, worst, -CONTRACT)
      const fInside = f(inside)
      if (fInside < values[n]) {
        simplex[n] = inside
        values[n] = fInside
      } else {
        shrink = true
      }
    }

    if (shrink) {
      for (let i = 1; i <= n; i++) {
        simplex[i] = simplex[i].map(
          (value, j) => simplex[0][j] + SHRINK * (value - simplex[0][j]),
        )
        values[i] = f(simplex[i])
      }
    }

    sortSimplex()
    iterations++
  }

  return { x: simplex[0], value: values[0], iterations, terminated }
}

const INV_PHI = (Math.sqrt(5) - 1) / 2

/**
 * Golden-section search for a minimum of `f` on [lower, upper].
 * Assumes `f` is unimodal on the interval.
 */
export function minimizeScalarBounded(
  f: (x: number) => number,
  lower: number,
  upper: number,
  options: ScalarMinimizeOptions,
): ScalarMinimizeResult {
  let a = Math.min(lower, upper)
  let b = Math.max(lower, upper)
  let c = b - INV_PHI * (b - a)
  let d = a + INV_PHI * (b - a)
  let fc = f(c)
  let fd = f(d)
  let iterations = 0

  while (b - a > options.tolerance && iterations < options.maxIterations) {
    if (fc < fd) {
      b = d
      d = c
      fd = fc
      c = b - INV_PHI * (b - a)
      fc = f(c)
    } else {
      a = c
      c = d
      fc = fd
      d = a + INV_PHI * (b - a)
      fd = f(d)
    }
    iterations++
  }

  const mid = (a + b) / 2
  const fMid = f(mid)
  if (fMid <= fc && fMid <= fd) return { x: mid, value: fMid, iterations }
  return fc <= fd
    ? { x: c, value: fc, iterations }
    : { x: d, value: fd, iterations }
}
