import { InvalidAsOfDateError } from '../shared/errors.js';
import { compareIsoDates } from '../shared/dates.js';
import type { Attributes, DimensionDefinition, DimensionVersion } from '../dimensions/types.js';
import type { DimensionStore } from '../store/types.js';
import type { ChangeDetection } from './change-detector.js';
import type { SurrogateKeyAllocator } from './surrogate-key-allocator.js';

export type WritePlan =
  | { verdict: 'NO_CHANGE'; current: DimensionVersion }
  | { verdict: 'TYPE1_UPDATE'; current: DimensionVersion; attributes: Attributes }
  | {
      verdict: 'TYPE2_VERSION';
      current: DimensionVersion;
      effective_date: string;
      attributes: Attributes;
    }
  | { verdict: 'NEW_ENTITY'; natural_key: string; effective_date: string; attributes: Attributes };

export interface WriteOutcome {
  verdict: WritePlan['verdict'];
  current: DimensionVersion;
  closed?: DimensionVersion;
}

function pick(attributes: Attributes, names: string[]): Attributes {
  const picked: Attributes = {};
  for (const name of names) {
    picked[name] = attributes[name] ?? null;
  }
  return picked;
}

/**
 * Turn a change verdict into the writes that keep the version chain contiguous.
 * Rejects loads dated before the current version's effective_from.
 */
export function planWrite(
  definition: DimensionDefinition,
  detection: ChangeDetection,
  current: DimensionVersion | null,
  naturalKey: string,
  incoming: Attributes,
  asOfDate: string,
): WritePlan {
  if (current && compareIsoDates(asOfDate, current.effective_from) < 0) {
    throw new InvalidAsOfDateError(
      definition.dimension_id,
      naturalKey,
      asOfDate,
      current.effective_from,
    );
  }

  if (!current || detection.verdict === 'NEW_ENTITY') {
    return {
      verdict: 'NEW_ENTITY',
      natural_key: naturalKey,
      effective_date: asOfDate,
      attributes: { ...incoming },
    };
  }

  switch (detection.verdict) {
    case 'NO_CHANGE':
      return { verdict: 'NO_CHANGE', current };
    case 'TYPE1_UPDATE':
      return {
        verdict: 'TYPE1_UPDATE',
        current,
        attributes: pick(incoming, detection.changed.type1),
      };
    case 'TYPE2_VERSION':
      return {
        verdict: 'TYPE2_VERSION',
        current,
        effective_date: asOfDate,
        attributes: { ...incoming },
      };
  }
}

/**
 * Apply a plan against the store. Close-and-insert runs in a single
 * transaction; a lost conditional write rolls both back.
 */
export async function applyPlan(
  store: DimensionStore,
  allocator: SurrogateKeyAllocator,
  definition: DimensionDefinition,
  plan: WritePlan,
): Promise<WriteOutcome> {
  switch (plan.verdict) {
    case 'NO_CHANGE':
      return { verdict: plan.verdict, current: plan.current };

    case 'TYPE1_UPDATE': {
      const updated = await store.transaction((tx) =>
        tx.updateAttributes(
          definition,
          plan.current.natural_key,
          plan.current.surrogate_key,
          plan.attributes,
        ),
      );
      return { verdict: plan.verdict, current: updated };
    }

    case 'TYPE2_VERSION': {
      const surrogateKey = await allocator.next(definition);
      return store.transaction(async (tx) => {
        const closed = await tx.closeVersion(
          definition,
          plan.current.natural_key,
          plan.current.surrogate_key,
          plan.effective_date,
        );
        const inserted = await tx.insertVersion(definition, {
          surrogate_key: surrogateKey,
          natural_key: plan.current.natural_key,
          attributes: plan.attributes,
          effective_from: plan.effective_date,
          effective_to: null,
          is_current: true,
        });
        return { verdict: plan.verdict, current: inserted, closed };
      });
    }

    case 'NEW_ENTITY': {
      const surrogateKey = await allocator.next(definition);
      const inserted = await store.transaction((tx) =>
        tx.insertVersion(definition, {
          surrogate_key: surrogateKey,
          natural_key: plan.natural_key,
          attributes: plan.attributes,
          effective_from: plan.effective_date,
          effective_to: null,
          is_current: true,
        }),
      );
      return { verdict: plan.verdict, current: inserted };
    }
  }
}
