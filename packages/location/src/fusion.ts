import type { LocationContext } from "./context.js";
import type { LocationMetadata } from "./descriptors.js";
import { locationError } from "./errors.js";
import type { Location } from "./location.js";
import { metadataEqual } from "./structural.js";

/**
 * Fuses locations the way merging passes want them: nested fused locations
 * carrying the same metadata are flattened, unknown locations and repeats are
 * dropped, and trivial results collapse. Unlike `LocationContext.fused`, the
 * result for equal inputs in a different order or multiplicity may coincide.
 */
export const mergeLocations = (
  context: LocationContext,
  locations: readonly Location[],
  metadata?: LocationMetadata,
): Location => {
  const seen = new Set<Location>();
  const merged: Location[] = [];

  const add = (location: Location): void => {
    if (location.context !== context) {
      throw locationError({
        code: "LB0002",
        params: {
          kind: "foreign-child",
          variant: "fused",
          field: "locations",
          childContext: location.context.label,
          targetContext: context.label,
        },
      });
    }
    const view = location.view();
    if (view.kind === "unknown" || seen.has(location)) {
      return;
    }
    if (view.kind === "fused" && metadataEqual(view.metadata, metadata)) {
      view.locations.forEach(add);
      return;
    }
    seen.add(location);
    merged.push(location);
  };

  locations.forEach(add);

  if (merged.length === 0) {
    return context.unknown;
  }
  if (merged.length === 1 && metadata === undefined) {
    return merged[0];
  }
  return context.fused(merged, metadata);
};
