import type { SpecimenType } from '../models/specimen-type.js';

/**
 * Order matters: the waterproof variants are checked before the plain types,
 * so `45DWP` never falls through to `45D`.
 */
export function classifySpecimenType(markPrefix: string): SpecimenType {
  const mark = markPrefix.toUpperCase();
  const is45 = mark.includes('45D');
  const is60 = mark.includes('60D');
  const isWaterproof = mark.includes('WP');

  if (is45 && isWaterproof) return '45DWP';
  if (is60 && isWaterproof) return '60DWP';
  if (is45) return '45D';
  if (is60) return '60D';
  return 'Unknown';
}
