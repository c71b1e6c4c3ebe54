/**
 * Mesh module - Tessellation from surfaces to triangle meshes
 */

export * from './types.js';
export * from './tessellateSurface.js';
