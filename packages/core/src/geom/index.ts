/**
 * Geometry module - basis functions and surface evaluation
 */

export * from './basis.js';
export * from './rational.js';
export * from './supportIndex.js';
export * from './tspline.js';
export * from './nurbs.js';
export * from './surface.js';
