/**
 * FilletCache - LRU memo for tangent-circle fits
 *
 * The solver is deterministic, so a fit is fully determined by its inputs
 * (obstacle samples, target radius, seed, penalties) and the solver's own
 * settings. Keys are built from those by content, so equal obstacles built
 * separately still hit.
 */

import type { DiskConstraint, Obstacle, Point2D, TangentFit } from "./types"

interface CacheEntry {
  fit: TangentFit
  accessCount: number
}

const formatPoint = (p: Point2D) => `${p.x},${p.y}`

export function obstacleKey(obstacle: Obstacle): string {
  return `${obstacle.kind}[${obstacle.points.map(formatPoint).join(";")}]`
}

function penaltyKey(penalty: DiskConstraint): string {
  return `${penalty.kind}(${formatPoint(penalty.center)},${penalty.radius},${penalty.weight})`
}

/**
 * Build the cache key for a fit request. `method` separates simplex fits
 * from axis-constrained fits over the same obstacles; `settings` separates
 * solvers with different iteration limits and tolerances sharing one cache.
 */
export function fitCacheKey(
  method: string,
  obstacles: readonly Obstacle[],
  targetRadius: number,
  seed: readonly number[],
  penalties: readonly DiskConstraint[] = [],
  settings: string = "",
): string {
  return [
    method,
    `s=${settings}`,
    obstacles.map(obstacleKey).join("|"),
    `r=${targetRadius}`,
    `seed=${seed.join(",")}`,
    `p=${penalties.map(penaltyKey).join("|")}`,
  ].join("#")
}

export class FilletCache {
  private readonly maxCacheSize: number

  private entries = new Map<string, CacheEntry>()

  // Access tracking for LRU eviction, least recent first
  private accessOrder: string[] = []

  private hits = 0
  private misses = 0

  constructor(maxCacheSize: number = 256) {
    this.maxCacheSize = Math.max(1, maxCacheSize)
  }

  get(key: string): TangentFit | undefined {
    const cached = this.entries.get(key)
    if (!cached) {
      this.misses++
      return undefined
    }

    this.hits++
    cached.accessCount++
    this.updateAccessOrder(key)
    return cached.fit
  }

  set(key: string, fit: TangentFit): void {
    this.entries.set(key, { fit, accessCount: 1 })
    this.updateAccessOrder(key)
    this.evictIfNecessary()
  }

  /**
   * Return the cached fit for `key`, computing and storing it on a miss
   */
  getOrCompute(key: string, compute: () => TangentFit): TangentFit {
    const cached = this.get(key)
    if (cached) return cached

    const fit = compute()
    this.set(key, fit)
    return fit
  }

  clear(): void {
    this.entries.clear()
    this.accessOrder = []
    this.hits = 0
    this.misses = 0
  }

  getStats(): {
    size: number
    hits: number
    misses: number
    hitRatio: number
    mostAccessed: number
  } {
    const lookups = this.hits + this.misses
    let mostAccessed = 0
    for (const entry of this.entries.values()) {
      mostAccessed = Math.max(mostAccessed, entry.accessCount)
    }

    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRatio: lookups > 0 ? this.hits / lookups : 0,
      mostAccessed,
    }
  }

  private updateAccessOrder(key: string): void {
    const index = this.accessOrder.indexOf(key)
    if (index >= 0) {
      this.accessOrder.splice(index, 1)
    }
    this.accessOrder.push(key)
  }

  private evictIfNecessary(): void {
    while (this.entries.size > this.maxCacheSize) {
      const lruKey = this.accessOrder.shift()
      if (lruKey === undefined) break
      this.entries.delete(lruKey)
    }
  }
}
