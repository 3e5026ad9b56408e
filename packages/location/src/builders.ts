import type { LocationContext, MaybeLocation } from "./context.js";
import type { LocationMetadata } from "./descriptors.js";
import { locationError, missingChildHint } from "./errors.js";
import type { Location } from "./location.js";

/*
 * Conveniences that infer the owning context from an argument. Each one
 * delegates to the explicit-context builder on `LocationContext`, so the
 * same-context check still applies to every other argument.
 */

const contextOf = (
  variant: string,
  field: string,
  location: MaybeLocation,
): LocationContext => {
  if (location === undefined || location === null) {
    throw locationError({
      code: "LB0001",
      params: { kind: "missing-field", variant, field },
      hints: [missingChildHint],
    });
  }
  return location.context;
};

/** `callsite(callee at caller)` in the context that owns `callee`. */
export const callSiteOf = (callee: MaybeLocation, caller: MaybeLocation): Location =>
  contextOf("call-site", "callee", callee).callSite(callee, caller);

/** A name wrapping `child`, in the context that owns `child`. */
export const nameOf = (name: string, child: Location): Location =>
  child.context.name(name, child);

/** A fused location in the context that owns the first element. */
export const fusedOf = (
  locations: readonly [MaybeLocation, ...MaybeLocation[]],
  metadata?: LocationMetadata,
): Location =>
  contextOf("fused", "locations[0]", locations[0]).fused(locations, metadata);
