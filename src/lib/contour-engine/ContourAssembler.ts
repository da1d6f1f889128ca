/**
 * ContourAssembler - Stitches arcs, segments and fillets into one polyline
 *
 * Pieces adjoining a fillet are cut where the fillet takes over: sampled
 * arcs at the sample nearest the fillet center, segments at the projection
 * of the center. Consecutive curves share their joining vertex, so the
 * first point of every curve after the first is dropped.
 */

import type { Curve, FilletResult, Obstacle, Point2D } from "./types"
import { ContourEngineError } from "./types"
import { nearestSampleIndex, projectOntoSegment } from "./utils/distance"

export type SectorItem =
  | {
      kind: "piece"
      obstacle: Obstacle
      // Fillet that replaces the beginning of this piece
      after?: FilletResult
      // Fillet that replaces the end of this piece
      before?: FilletResult
    }
  | { kind: "fillet"; fillet: FilletResult }

const copy = (points: readonly Point2D[]): Curve => points.map((p) => ({ x: p.x, y: p.y }))

export class ContourAssembler {
  /**
   * The part of `piece` that lies between the two fillets (either may be absent)
   */
  trim(piece: Obstacle, after?: FilletResult, before?: FilletResult): Curve {
    if (piece.kind === "segment") {
      const [start, end] = piece.points
      return [
        after ? projectOntoSegment(after.center, start, end) : { ...start },
        before ? projectOntoSegment(before.center, start, end) : { ...end },
      ]
    }

    const startIndex = after ? nearestSampleIndex(piece.points, after.center) : 0
    const endIndex = before
      ? nearestSampleIndex(piece.points, before.center)
      : piece.points.length - 1

    if (startIndex > endIndex) {
      throw new ContourEngineError(
        `Fillets overlap on arc piece (cut at ${startIndex} after ${endIndex})`,
        "ASSEMBLY_ERROR",
      )
    }

    return copy(piece.points.slice(startIndex, endIndex + 1))
  }

  trimStart(piece: Obstacle, fillet: FilletResult): Curve {
    return this.trim(piece, fillet, undefined)
  }

  trimEnd(piece: Obstacle, fillet: FilletResult): Curve {
    return this.trim(piece, undefined, fillet)
  }

  join(curves: readonly Curve[]): Curve {
    const joined: Curve = []
    curves.forEach((curve, index) => {
      const points = index === 0 ? curve : curve.slice(1)
      joined.push(...copy(points))
    })
    return joined
  }

  /**
   * Concatenate pieces and fillet arcs in the given order
   */
  assembleSector(items: readonly SectorItem[]): Curve {
    return this.join(
      items.map((item) =>
        item.kind === "fillet"
          ? item.fillet.arc
          : this.trim(item.obstacle, item.after, item.before),
      ),
    )
  }
}
