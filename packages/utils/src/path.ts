/**
 * Path Utilities
 */

import { extname } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}
