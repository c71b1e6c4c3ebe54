/**
 * T-mesh topology module
 *
 * The topology store, construction and validation, vertex stars and the
 * mutation primitives used by refinement.
 */

export * from './handles.js';
export * from './errors.js';
export {
  TMesh,
  type Axis,
  type Direction,
  type ControlPoint,
  type HalfEdgeRecord,
  type FaceRecord,
  type VertexHalfEdges,
  type ParamSegment,
  type MeshChanges,
  type TMeshState,
  type TMeshStats,
} from './TMesh.js';
export * from './schema.js';
export {
  createTMesh,
  describeTMesh,
  buildTMesh,
  createGrid,
  createUniformGrid,
  type BuildOptions,
  type GridOptions,
  type GridMesh,
} from './build.js';
export {
  validateTMesh,
  type ValidationIssueKind,
  type ValidationSeverity,
  type ValidationEntityRef,
  type ValidationIssue,
  type ValidationReport,
  type ValidationOptions,
} from './validate.js';
export {
  DIRECTIONS,
  opposite,
  axisOf,
  perpendicular,
  vertexStar,
  classifyVertex,
  isTJunction,
  type Spoke,
  type VertexKind,
  type VertexClassification,
} from './star.js';
export { faceInDirection, faceCrossing, type FaceCrossing } from './faceWalk.js';
export {
  splitEdge,
  connectVertices,
  insertTJunction,
  extendTJunction,
  removeEdge,
  dissolveVertex,
  type FaceSplit,
} from './mutate.js';
