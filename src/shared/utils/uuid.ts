/**
 * UUID Utility
 * Time-ordered ids used to correlate the log lines of one logical request
 */

import { v7 as uuidv7 } from 'uuid';

/**
 * Generate a UUID v7 (time-ordered, sortable)
 */
export function generateId(): string {
  return uuidv7();
}
