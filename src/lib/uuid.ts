/**
 * UUID Generator Utility - Duty Rota Service
 *
 * Provides UUID v4 generation for entity identifiers.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a new UUID v4
 *
 * @example
 * const shiftId = generateUUID();
 * // Returns: "f47ac10b-58cc-4372-a567-0e02b2c3d479"
 */
export const generateUUID = (): string => {
  return uuidv4();
};
