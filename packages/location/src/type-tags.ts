import { typeTagIdFrom, type TypeTagId } from "./ids.js";

/**
 * Runtime token standing for a type `T`. Tokens are stable for the life of the
 * process; compare them with `sameTypeTag`, since each lookup may return a
 * fresh token object carrying the same id.
 */
export interface TypeTag<T> {
  readonly id: TypeTagId;
  readonly name: string;
  /** Phantom member tying the token to `T`; never set at runtime. */
  readonly __type?: () => T;
}

export type Constructor<T> = abstract new (...args: never[]) => T;

export interface TypeTagEntry {
  id: TypeTagId;
  name: string;
  /** Whether the tag was derived from a constructor rather than minted by name. */
  fromConstructor: boolean;
}

let nextTypeTagId = 0;
const tagsByConstructor = new Map<Function, TypeTagEntry>();
const entries: TypeTagEntry[] = [];

const register = (name: string, fromConstructor: boolean): TypeTagEntry => {
  const entry = Object.freeze({
    id: typeTagIdFrom(nextTypeTagId++),
    name,
    fromConstructor,
  });
  entries.push(entry);
  return entry;
};

const entryForFunction = (ctor: Function): TypeTagEntry => {
  const existing = tagsByConstructor.get(ctor);
  if (existing) {
    return existing;
  }
  const entry = register(ctor.name || "<anonymous>", true);
  tagsByConstructor.set(ctor, entry);
  return entry;
};

const tokenOf = <T>(entry: TypeTagEntry): TypeTag<T> =>
  Object.freeze({ id: entry.id, name: entry.name });

/** The tag for instances of `ctor`. The same constructor always maps to the same id. */
export const typeTagFor = <T>(ctor: Constructor<T>): TypeTag<T> =>
  tokenOf(entryForFunction(ctor));

/**
 * Mints a tag for a type with no runtime constructor (an interface or a type
 * alias). Every call returns a new tag; hold on to the result.
 */
export const defineTypeTag = <T>(name: string): TypeTag<T> =>
  tokenOf(register(name, false));

/**
 * Derives the tag of a value from its constructor. Objects without a prototype
 * chain are tagged as `Object`.
 */
export const typeTagOfValue = (value: object): TypeTag<unknown> => {
  const ctor: unknown = value.constructor;
  return tokenOf(entryForFunction(typeof ctor === "function" ? ctor : Object));
};

export const sameTypeTag = <A, B>(left: TypeTag<A>, right: TypeTag<B>): boolean =>
  left.id === right.id;

export const registeredTypeTags = (): readonly TypeTagEntry[] => [...entries];
