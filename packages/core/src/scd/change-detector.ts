import type { Attributes, DimensionDefinition, DimensionVersion } from '../dimensions/types.js';

export type ChangeVerdict = 'NO_CHANGE' | 'TYPE1_UPDATE' | 'TYPE2_VERSION' | 'NEW_ENTITY';

export const CHANGE_VERDICTS: readonly ChangeVerdict[] = [
  'NO_CHANGE',
  'TYPE1_UPDATE',
  'TYPE2_VERSION',
  'NEW_ENTITY',
];

export interface ChangeDetection {
  verdict: ChangeVerdict;
  changed: {
    type1: string[];
    type2: string[];
  };
}

/**
 * Classify an incoming (normalized) attribute set against the current version.
 * Any TYPE2 difference wins over TYPE1 differences; null vs populated counts as a difference.
 */
export function detectChange(
  definition: DimensionDefinition,
  current: DimensionVersion | null,
  incoming: Attributes,
): ChangeDetection {
  if (!current) {
    return { verdict: 'NEW_ENTITY', changed: { type1: [], type2: [] } };
  }

  const type1: string[] = [];
  const type2: string[] = [];

  for (const attribute of definition.attributes) {
    const before = current.attributes[attribute.name] ?? null;
    const after = incoming[attribute.name] ?? null;
    if (before === after) continue;

    if (attribute.tracked_as === 'TYPE2') {
      type2.push(attribute.name);
    } else {
      type1.push(attribute.name);
    }
  }

  const verdict: ChangeVerdict =
    type2.length > 0 ? 'TYPE2_VERSION' : type1.length > 0 ? 'TYPE1_UPDATE' : 'NO_CHANGE';

  return { verdict, changed: { type1, type2 } };
}
