import type { DimensionVersion } from '@bankdw/core';

export function serializeVersion(version: DimensionVersion) {
  return {
    surrogate_key: version.surrogate_key,
    natural_key: version.natural_key,
    effective_from: version.effective_from,
    effective_to: version.effective_to,
    is_current: version.is_current,
    attributes: version.attributes,
  };
}
