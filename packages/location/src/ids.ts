/**
 * Identifier aliases for values owned by a location context. Location ids are
 * indices into one context's arena; they are meaningless outside of it, which
 * is why builders accept `Location` handles rather than raw ids.
 */
export type LocationId = number & { readonly __brand: "LocationId" };
export type ContextId = number & { readonly __brand: "ContextId" };
export type TypeTagId = number & { readonly __brand: "TypeTagId" };

/** Stand-in for the address of a caller-owned object referenced by an opaque location. */
export type OpaqueAddress = number & { readonly __brand: "OpaqueAddress" };

export const locationIdFrom = (index: number): LocationId => index as LocationId;
export const contextIdFrom = (index: number): ContextId => index as ContextId;
export const typeTagIdFrom = (index: number): TypeTagId => index as TypeTagId;
export const opaqueAddressFrom = (index: number): OpaqueAddress =>
  index as OpaqueAddress;
