/**
 * Record Shape Exports
 */

export { validateCreateRecord } from './create-record.js';
export type { CreateRecordDeps } from './create-record.js';
export {
  validateUpdateRecord,
  EMPTY_UPDATE_MESSAGE,
} from './update-record.js';
export { toOutwardRecord } from './outward-record.js';
export { readDraft, isBlank } from './draft.js';
