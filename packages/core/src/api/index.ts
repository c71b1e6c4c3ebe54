/**
 * Session API
 *
 * - TSplineSession - transactional editing and evaluation of one T-mesh
 * - MutationResult - success/failure union returned by every operation
 */

export * from './types.js';
export * from './TSplineSession.js';
