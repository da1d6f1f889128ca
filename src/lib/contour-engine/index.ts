/**
 * Contour Engine - Main export file
 */

export * from "./types"
export { ContourEngine } from "./ContourEngine"
export type { ContourEngineOptions } from "./ContourEngine"
export { AirfoilGenerator } from "./AirfoilGenerator"
export { TangentCircleSolver, penaltyTerm } from "./TangentCircleSolver"
export type { AxisConstrainedFitRequest, TangentCircleSolverOptions } from "./TangentCircleSolver"
export { LineJointSolver } from "./LineJointSolver"
export { ContourAssembler } from "./ContourAssembler"
export type { SectorItem } from "./ContourAssembler"
export { replicate, revolutionAngles } from "./SymmetryReplicator"
export { buildEmblem, createEmblemPrimitives } from "./EmblemBuilder"
export { FilletCache, fitCacheKey } from "./FilletCache"
export { rotate, reflect, reflectAbout, translate, degreesToRadians } from "./utils/transform"
export { validateStudioParameters } from "./utils/validation"

// Renderers
export { Renderer } from "./renderers/Renderer"
export type { RenderOptions } from "./renderers/Renderer"
export { SvgPathRenderer } from "./renderers/SvgPathRenderer"
export { pointsToSvgPath, formatSvg } from "./utils/svgPathUtils"

// Export
export {
  buildExportDocument,
  calculateContourBounds,
  createRevolutionLabel,
  generateSvg,
} from "@/lib/export/svgUtils"
export { defaultExportFilename, ensureSvgExtension, writeSvgDocument } from "@/lib/export/exportUtils"
