/**
 * Analysis-suitability (ASTS) validation
 *
 * A T-mesh is analysis-suitable when no horizontal T-junction extension meets
 * a vertical one. Segments are closed: touching at an end point counts.
 */

import type { Vec2 } from '../num/vec2.js';
import { segmentsIntersect2D, axisSegmentCrossing } from '../num/predicates.js';
import type { TMesh } from '../topo/TMesh.js';
import type { VertexId } from '../topo/handles.js';
import { AstsViolationError } from '../topo/errors.js';
import { collectExtensions, type TJunctionExtension } from './extensions.js';

/**
 * One pair of crossing extensions
 */
export interface AstsViolation {
  /** Junction whose extension runs along s */
  horizontal: VertexId;
  /** Junction whose extension runs along t */
  vertical: VertexId;
  /** Where the two extensions meet */
  point: Vec2;
}

export interface AstsReport {
  isValid: boolean;
  extensions: TJunctionExtension[];
  violations: AstsViolation[];
}

export function validateAsts(mesh: TMesh): AstsReport {
  const extensions = collectExtensions(mesh);
  const horizontal = extensions.filter((e) => e.axis === 's');
  const vertical = extensions.filter((e) => e.axis === 't');

  const violations: AstsViolation[] = [];
  for (const h of horizontal) {
    for (const v of vertical) {
      if (segmentsIntersect2D(h.start, h.end, v.start, v.end, mesh.ctx)) {
        violations.push({
          horizontal: h.junction,
          vertical: v.junction,
          point: axisSegmentCrossing(h.start[1], v.start[0]),
        });
      }
    }
  }

  return { isValid: violations.length === 0, extensions, violations };
}

/**
 * Throw AstsViolationError unless the mesh is analysis-suitable
 */
export function assertAsts(mesh: TMesh): AstsReport {
  const report = validateAsts(mesh);
  if (!report.isValid) {
    throw new AstsViolationError(report.violations);
  }
  return report;
}
