/**
 * Matching primitives shared by the record matchers
 */

import type {
  ILInstruction,
  ILVariable,
  NormalizedBody,
} from "../../il/instructions.js";
import { isLdLoc, matchLdFld, matchLogicAnd } from "../../il/patterns.js";
import { fieldsEqual } from "../../type-system/type-ops.js";
import type { DecompilerTypeSystem } from "../../type-system/type-system.js";
import type {
  FieldReference,
  IlType,
  MethodDefinition,
} from "../../type-system/types.js";

type Maybe = ILInstruction | undefined;

/**
 * Flatten a left-associated `&&` chain into its conditions, left to right.
 * A non-`&&` instruction is a chain of one.
 */
export const unpackLogicAndChain = (
  rootOfChain: ILInstruction
): readonly ILInstruction[] => {
  const result: ILInstruction[] = [];
  const visit = (inst: ILInstruction): void => {
    const and = matchLogicAnd(inst);
    if (and) {
      visit(and.left);
      visit(and.right);
    } else {
      result.push(inst);
    }
  };
  visit(rootOfChain);
  return result;
};

/**
 * `ldfld field(target)` for exactly this field: returns target.
 */
export const matchLdFldOf = (
  inst: Maybe,
  field: FieldReference
): ILInstruction | undefined => {
  const load = matchLdFld(inst);
  return load && fieldsEqual(load.field, field) ? load.target : undefined;
};

/**
 * `callvirt StringBuilder.Append(ldloc builder, value)`: returns value.
 */
export const matchStringBuilderAppend = (
  inst: Maybe,
  builder: ILVariable,
  typeSystem: DecompilerTypeSystem
): ILInstruction | undefined => {
  if (inst?.kind !== "callvirt") return undefined;
  if (inst.method.name !== "Append") return undefined;
  if (!typeSystem.isKnownType(inst.method.declaringType, "StringBuilder")) {
    return undefined;
  }
  if (inst.arguments.length !== 2) return undefined;
  const [receiver, value] = inst.arguments;
  return isLdLoc(receiver, builder) ? value : undefined;
};

/**
 * `callvirt get_EqualityContract(target)`: returns target.
 */
export const matchGetEqualityContract = (
  inst: Maybe
): ILInstruction | undefined => {
  if (inst?.kind !== "callvirt") return undefined;
  if (inst.method.name !== "get_EqualityContract") return undefined;
  if (inst.arguments.length !== 1) return undefined;
  return inst.arguments[0];
};

/**
 * `call EqualityComparer<T>.get_Default()` with T erasing to `type`.
 */
export const isEqualityComparerGetDefaultCall = (
  inst: Maybe,
  type: IlType,
  typeSystem: DecompilerTypeSystem
): boolean => {
  if (inst?.kind !== "call") return false;
  const { method } = inst;
  if (method.name !== "get_Default" || !method.isStatic) return false;
  if (!typeSystem.isKnownType(method.declaringType, "EqualityComparer")) {
    return false;
  }
  if (method.declaringType.kind !== "named") return false;
  const [comparedType] = method.declaringType.typeArguments;
  if (!comparedType || !typeSystem.equivalentErasedTypes(comparedType, type)) {
    return false;
  }
  return inst.arguments.length === 0;
};

/**
 * `call Type.GetTypeFromHandle(ldtypetoken T)`, i.e. `typeof(T)`: returns T.
 */
export const matchGetTypeFromHandle = (
  inst: Maybe,
  typeSystem: DecompilerTypeSystem
): IlType | undefined => {
  if (inst?.kind !== "call") return undefined;
  if (inst.method.name !== "GetTypeFromHandle") return undefined;
  if (!typeSystem.isKnownType(inst.method.declaringType, "Type")) {
    return undefined;
  }
  if (inst.arguments.length !== 1) return undefined;
  const [token] = inst.arguments;
  return token?.kind === "ldtypetoken" ? token.type : undefined;
};

/**
 * No custom attributes on the method or its return value.
 */
export const hasNoAttributes = (method: MethodDefinition): boolean =>
  method.attributes.length === 0 && method.returnTypeAttributes.length === 0;

/**
 * The variable for declared parameter `index`; undefined unless exactly one exists.
 */
export const findParameter = (
  body: NormalizedBody,
  index: number
): ILVariable | undefined => {
  const matches = body.variables.filter(
    (v) => v.kind === "parameter" && v.index === index
  );
  return matches.length === 1 ? matches[0] : undefined;
};
