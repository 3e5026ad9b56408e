import { locationError } from "./errors.js";
import { opaqueAddressFrom, type OpaqueAddress } from "./ids.js";
import type { Location } from "./location.js";
import { sameTypeTag, type TypeTag } from "./type-tags.js";

let nextAddress = 1;
const addresses = new WeakMap<object, OpaqueAddress>();

/**
 * A stable number per object for the life of the process. Addresses are never
 * reused, even after the object is collected, and reading one neither keeps
 * the object alive nor dereferences it.
 */
export const addressOf = (target: object): OpaqueAddress => {
  const existing = addresses.get(target);
  if (existing !== undefined) {
    return existing;
  }
  const address = opaqueAddressFrom(nextAddress++);
  addresses.set(target, address);
  return address;
};

// The stored tag is the only evidence of the target's type; this predicate is
// the single place that evidence is trusted.
const isTaggedAs = <T>(
  target: object,
  stored: TypeTag<unknown>,
  requested: TypeTag<T>,
): target is T & object => sameTypeTag(stored, requested);

/** The tag an opaque location was built with, or `undefined` for other kinds. */
export const underlyingTagOf = (location: Location): TypeTag<unknown> | undefined =>
  location.as("opaque")?.tag;

/**
 * The referenced object as `T`, or `undefined` when the location is not
 * opaque, was tagged with another type, or its target has been collected.
 */
export const getUnderlyingAs = <T>(
  location: Location,
  tag: TypeTag<T>,
): T | undefined => {
  const opaque = location.as("opaque");
  if (!opaque) {
    return undefined;
  }
  const target = location.context.opaqueTarget(location);
  if (target === undefined || !isTaggedAs(target, opaque.tag, tag)) {
    return undefined;
  }
  return target;
};

/** Like `getUnderlyingAs`, for call sites that already know the type. Throws on mismatch. */
export const expectUnderlying = <T>(location: Location, tag: TypeTag<T>): T => {
  const opaque = location.as("opaque");
  if (!opaque) {
    throw locationError({
      code: "LO0001",
      params: { kind: "not-opaque", expected: tag.name, actualKind: location.kind },
    });
  }
  if (!sameTypeTag(opaque.tag, tag)) {
    throw locationError({
      code: "LO0001",
      params: { kind: "tag-mismatch", expected: tag.name, actual: opaque.tag.name },
    });
  }
  const target = getUnderlyingAs(location, tag);
  if (target === undefined) {
    throw locationError({
      code: "LO0001",
      params: { kind: "target-released", expected: tag.name },
    });
  }
  return target;
};

/** The location that stands in for an opaque one when it is printed; other kinds are returned as is. */
export const fallbackOf = (location: Location): Location =>
  location.as("opaque")?.fallback ?? location;
