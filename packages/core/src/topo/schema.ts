/**
 * Zod schemas for the topology description accepted by createTMesh and
 * produced by describeTMesh.
 *
 * The schema checks shape and types only. Cross-references and parametric
 * invariants are checked by validateTMesh once the tables are loaded.
 */

import { z } from 'zod';

const index = z.number().int().nonnegative();

export const axisSchema = z.enum(['s', 't']);

export const vertexDescriptionSchema = z.object({
  position: z.tuple([z.number(), z.number(), z.number()]),
  weight: z.number().positive('Weight must be positive').default(1),
  param: z.tuple([z.number(), z.number()]),
  outgoing: index.nullable(),
});

export const halfEdgeDescriptionSchema = z.object({
  origin: index,
  twin: index.nullable(),
  face: index,
  next: index,
  prev: index,
  axis: axisSchema,
  interval: z.number().positive('Knot interval must be positive'),
});

export const faceDescriptionSchema = z.object({
  edge: index,
});

export const topologyDescriptionSchema = z.object({
  vertices: z.array(vertexDescriptionSchema),
  halfEdges: z.array(halfEdgeDescriptionSchema),
  faces: z.array(faceDescriptionSchema),
});

/** Description as accepted (weights optional) */
export type TopologyDescriptionInput = z.input<typeof topologyDescriptionSchema>;

/** Description as produced (every field present) */
export type TopologyDescription = z.infer<typeof topologyDescriptionSchema>;

export type VertexDescription = z.infer<typeof vertexDescriptionSchema>;
export type HalfEdgeDescription = z.infer<typeof halfEdgeDescriptionSchema>;
export type FaceDescription = z.infer<typeof faceDescriptionSchema>;

// ============================================================================
// Face-loop builder input
// ============================================================================

export const faceLoopMeshSchema = z.object({
  vertices: z.array(
    z.object({
      param: z.tuple([z.number(), z.number()]),
      position: z.tuple([z.number(), z.number(), z.number()]).optional(),
      weight: z.number().positive('Weight must be positive').optional(),
    })
  ),
  /** Counter-clockwise vertex loops, one per face */
  faces: z.array(z.array(index).min(4, 'A face needs at least four corners')),
});

export type FaceLoopMesh = z.input<typeof faceLoopMeshSchema>;
