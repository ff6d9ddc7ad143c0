/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');
