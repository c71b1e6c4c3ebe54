/**
 * Analysis-suitability module
 */

export {
  FACE_EXTENSION_CROSSINGS,
  EDGE_EXTENSION_CROSSINGS,
  tJunctionExtension,
  collectExtensions,
  type TJunctionExtension,
} from './extensions.js';
export { validateAsts, assertAsts, type AstsViolation, type AstsReport } from './validate.js';
