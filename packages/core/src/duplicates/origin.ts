import type { DuplicateOrigin } from './types.js';

/**
 * Attribute a duplicate group to the source document or to the mapper.
 * `sourceCount` is undefined when no source facts were supplied.
 */
export function attributeOrigin(groupSize: number, sourceCount: number | undefined): DuplicateOrigin {
  if (sourceCount === undefined) return 'UNKNOWN';
  if (sourceCount > 1) return 'SOURCE_DATA';
  if (sourceCount === 1 && groupSize > 1) return 'MAPPING_INTRODUCED';
  return 'UNKNOWN';
}
