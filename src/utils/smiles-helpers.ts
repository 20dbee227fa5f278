/**
 * SMILES Helpers
 *
 * Quality predicate for structure strings: chirality (@) or double-bond geometry
 * (/ or \) markup means the structure is stereo-complete.
 */

import { QualityTier } from '../types/EnrichmentTypes';

const STEREO_MARKERS = ['@', '/', '\\'];

export function hasStereochemistry(smiles: string): boolean {
  return STEREO_MARKERS.some((marker) => smiles.includes(marker));
}

/**
 * FULL for stereo-aware SMILES, DEGRADED for flat ones, UNRESOLVED for blank input.
 */
export function classifySmiles(smiles: string): QualityTier {
  if (smiles.trim() === '') return 'UNRESOLVED';
  return hasStereochemistry(smiles) ? 'FULL' : 'DEGRADED';
}

