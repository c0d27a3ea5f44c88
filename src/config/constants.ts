/**
 * Configuration constants
 */

export const LEGACY_PROFILE_FILENAME = 'chunkwright.yaml';
export const DEFAULT_PROFILE_FILENAME = '.chunkwright.yaml';
export const EXPORT_FORMAT_VERSION = '1.0';
