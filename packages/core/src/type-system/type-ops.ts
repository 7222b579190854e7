/**
 * Type and member identity operations
 */

import { knownType } from "./known-types.js";
import type {
  FieldReference,
  IlNamedType,
  IlType,
  MethodDefinition,
  MethodReference,
  RecordTypeDefinition,
} from "./types.js";

const sameNullability = (
  a: { readonly nullable?: boolean },
  b: { readonly nullable?: boolean }
): boolean => (a.nullable ?? false) === (b.nullable ?? false);

const allTypesEqual = (
  left: readonly IlType[],
  right: readonly IlType[]
): boolean =>
  left.length === right.length &&
  left.every((type, i) => {
    const other = right[i];
    return other !== undefined && typesEqual(type, other);
  });

/**
 * Structural type identity, including type arguments and annotations.
 */
export const typesEqual = (a: IlType, b: IlType): boolean => {
  switch (a.kind) {
    case "named":
      return (
        b.kind === "named" &&
        a.namespace === b.namespace &&
        a.name === b.name &&
        sameNullability(a, b) &&
        allTypesEqual(a.typeArguments, b.typeArguments)
      );

    case "typeParameter":
      return (
        b.kind === "typeParameter" &&
        a.owner === b.owner &&
        a.index === b.index &&
        sameNullability(a, b)
      );

    case "array":
      return (
        b.kind === "array" &&
        a.rank === b.rank &&
        sameNullability(a, b) &&
        typesEqual(a.elementType, b.elementType)
      );

    case "byReference":
      return b.kind === "byReference" && typesEqual(a.elementType, b.elementType);

    case "tuple": {
      if (b.kind !== "tuple") return false;
      if (!allTypesEqual(a.elementTypes, b.elementTypes)) return false;
      const namesA = a.elementNames ?? [];
      const namesB = b.elementNames ?? [];
      return a.elementTypes.every((_, i) => namesA[i] === namesB[i]);
    }

    case "nativeInteger":
      return b.kind === "nativeInteger" && a.unsigned === b.unsigned;

    case "dynamic":
      return b.kind === "dynamic" && sameNullability(a, b);

    default: {
      const exhaustiveCheck: never = a;
      throw new Error(
        `ICE: Unhandled type kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

// ValueTuple`8 nests the remaining elements in its last type argument
const MAX_TUPLE_ARITY = 7;

const valueTupleOf = (elementTypes: readonly IlType[]): IlNamedType => {
  if (elementTypes.length <= MAX_TUPLE_ARITY) {
    return {
      kind: "named",
      namespace: "System",
      name: "ValueTuple",
      typeArguments: elementTypes,
    };
  }
  return {
    kind: "named",
    namespace: "System",
    name: "ValueTuple",
    typeArguments: [
      ...elementTypes.slice(0, MAX_TUPLE_ARITY),
      valueTupleOf(elementTypes.slice(MAX_TUPLE_ARITY)),
    ],
  };
};

/**
 * Reduce a type to its runtime identity: nullability annotations and tuple
 * element names go away, `dynamic` becomes System.Object, `nint`/`nuint`
 * become System.IntPtr/System.UIntPtr, tuples become System.ValueTuple.
 */
export const eraseType = (type: IlType): IlType => {
  switch (type.kind) {
    case "named":
      return {
        kind: "named",
        namespace: type.namespace,
        name: type.name,
        typeArguments: type.typeArguments.map(eraseType),
      };

    case "typeParameter":
      return {
        kind: "typeParameter",
        owner: type.owner,
        index: type.index,
        name: type.name,
      };

    case "array":
      return {
        kind: "array",
        elementType: eraseType(type.elementType),
        rank: type.rank,
      };

    case "byReference":
      return { kind: "byReference", elementType: eraseType(type.elementType) };

    case "tuple":
      return valueTupleOf(type.elementTypes.map(eraseType));

    case "nativeInteger":
      return knownType(type.unsigned ? "UIntPtr" : "IntPtr");

    case "dynamic":
      return knownType("Object");

    default: {
      const exhaustiveCheck: never = type;
      throw new Error(
        `ICE: Unhandled type kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

/**
 * Do two types erase to the same runtime type?
 */
export const equivalentErasedTypes = (a: IlType, b: IlType): boolean =>
  typesEqual(eraseType(a), eraseType(b));

/**
 * The record type instantiated over its own type parameters (`R<T>` inside `R<T>`).
 */
export const selfTypeOf = (record: RecordTypeDefinition): IlNamedType => ({
  kind: "named",
  namespace: record.namespace,
  name: record.name,
  typeArguments: record.typeParameters.map((name, index) => ({
    kind: "typeParameter",
    owner: "type",
    index,
    name,
  })),
});

/**
 * Same generic definition, whatever the type arguments.
 */
export const sameTypeDefinition = (a: IlType, b: IlType): boolean =>
  a.kind === "named" &&
  b.kind === "named" &&
  a.namespace === b.namespace &&
  a.name === b.name &&
  a.typeArguments.length === b.typeArguments.length;

/**
 * Does a call site target this method definition?
 * Compares the member definitions, so `Point<int>.get_X` matches `Point<T>.get_X`.
 */
export const isCallTo = (
  reference: MethodReference,
  definition: MethodDefinition
): boolean =>
  reference.token !== undefined &&
  reference.token !== 0 &&
  reference.token === definition.token &&
  reference.name === definition.name &&
  sameTypeDefinition(reference.declaringType, definition.declaringType);

/**
 * Field identity: same definition on the same (instantiated) declaring type.
 */
export const fieldsEqual = (a: FieldReference, b: FieldReference): boolean =>
  a.name === b.name &&
  (a.token ?? 0) === (b.token ?? 0) &&
  typesEqual(a.declaringType, b.declaringType);

/**
 * Can a derived type override this method?
 */
export const isOverridable = (method: MethodDefinition): boolean =>
  !method.isStatic &&
  (method.isVirtual || method.isOverride || method.isAbstract) &&
  !method.isSealed;
