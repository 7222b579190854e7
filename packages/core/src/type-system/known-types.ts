/**
 * Well-known CLR types the record matchers recognize by name
 */

import type { IlNamedType, IlType } from "./types.js";

export type KnownTypeCode =
  | "Object"
  | "Type"
  | "String"
  | "Boolean"
  | "Int32"
  | "IntPtr"
  | "UIntPtr"
  | "StringBuilder"
  | "EqualityComparer";

export type KnownAttributeCode = "CompilerGenerated";

type KnownTypeEntry = {
  readonly namespace: string;
  readonly name: string;
  readonly arity: number;
};

const KNOWN_TYPES: Readonly<Record<KnownTypeCode, KnownTypeEntry>> = {
  Object: { namespace: "System", name: "Object", arity: 0 },
  Type: { namespace: "System", name: "Type", arity: 0 },
  String: { namespace: "System", name: "String", arity: 0 },
  Boolean: { namespace: "System", name: "Boolean", arity: 0 },
  Int32: { namespace: "System", name: "Int32", arity: 0 },
  IntPtr: { namespace: "System", name: "IntPtr", arity: 0 },
  UIntPtr: { namespace: "System", name: "UIntPtr", arity: 0 },
  StringBuilder: { namespace: "System.Text", name: "StringBuilder", arity: 0 },
  EqualityComparer: {
    namespace: "System.Collections.Generic",
    name: "EqualityComparer",
    arity: 1,
  },
};

const KNOWN_ATTRIBUTES: Readonly<Record<KnownAttributeCode, KnownTypeEntry>> = {
  CompilerGenerated: {
    namespace: "System.Runtime.CompilerServices",
    name: "CompilerGeneratedAttribute",
    arity: 0,
  },
};

const matchesEntry = (type: IlType, entry: KnownTypeEntry): boolean =>
  type.kind === "named" &&
  type.namespace === entry.namespace &&
  type.name === entry.name &&
  type.typeArguments.length === entry.arity;

/**
 * Check whether a type is the given well-known type.
 * Nullability annotations and type arguments are ignored: `object?` is Object,
 * `EqualityComparer<int>` is EqualityComparer.
 */
export const isKnownType = (type: IlType, code: KnownTypeCode): boolean =>
  matchesEntry(type, KNOWN_TYPES[code]);

export const isKnownAttribute = (
  type: IlType,
  code: KnownAttributeCode
): boolean => matchesEntry(type, KNOWN_ATTRIBUTES[code]);

/**
 * Build a reference to a non-generic well-known type.
 */
export const knownType = (
  code: Exclude<KnownTypeCode, "EqualityComparer">
): IlNamedType => {
  const entry = KNOWN_TYPES[code];
  return {
    kind: "named",
    namespace: entry.namespace,
    name: entry.name,
    typeArguments: [],
  };
};

export const knownAttribute = (code: KnownAttributeCode): IlNamedType => {
  const entry = KNOWN_ATTRIBUTES[code];
  return {
    kind: "named",
    namespace: entry.namespace,
    name: entry.name,
    typeArguments: [],
  };
};
