/**
 * Instruction tree factories
 */

import type {
  FieldReference,
  IlType,
  MethodReference,
} from "../type-system/types.js";
import type {
  AddressOfInstruction,
  BlockInstruction,
  CallInstruction,
  CallVirtInstruction,
  ComparisonOperator,
  CompInstruction,
  IfInstruction,
  ILInstruction,
  ILVariable,
  LdcI4Instruction,
  LdFldaInstruction,
  LdFldInstruction,
  LdLocInstruction,
  LdNullInstruction,
  LdsFldInstruction,
  LdStrInstruction,
  LdTypeTokenInstruction,
  LeaveInstruction,
  LogicAndInstruction,
  NewObjInstruction,
  NopInstruction,
  StFldInstruction,
  StLocInstruction,
  StsFldInstruction,
  VariableKind,
} from "./instructions.js";

export const variable = (
  kind: VariableKind,
  index: number,
  name: string,
  type: IlType
): ILVariable => ({ kind, index, name, type });

export const thisParameter = (type: IlType): ILVariable =>
  variable("parameter", -1, "this", type);

export const nop = (): NopInstruction => ({ kind: "nop" });

/**
 * Return from the function: leave the body container with a value.
 */
export const ret = (value: ILInstruction = nop()): LeaveInstruction => ({
  kind: "leave",
  container: "body",
  value,
});

export const leave = (
  container: "body" | "nested",
  value: ILInstruction = nop()
): LeaveInstruction => ({ kind: "leave", container, value });

export const block = (
  ...instructions: readonly ILInstruction[]
): BlockInstruction => ({ kind: "block", instructions });

export const ifInst = (
  condition: ILInstruction,
  trueInst: ILInstruction,
  falseInst: ILInstruction = nop()
): IfInstruction => ({ kind: "if", condition, trueInst, falseInst });

export const call = (
  method: MethodReference,
  ...args: readonly ILInstruction[]
): CallInstruction => ({ kind: "call", method, arguments: args });

export const callvirt = (
  method: MethodReference,
  ...args: readonly ILInstruction[]
): CallVirtInstruction => ({ kind: "callvirt", method, arguments: args });

export const newobj = (
  method: MethodReference,
  ...args: readonly ILInstruction[]
): NewObjInstruction => ({ kind: "newobj", method, arguments: args });

export const ldfld = (
  target: ILInstruction,
  field: FieldReference
): LdFldInstruction => ({ kind: "ldfld", target, field });

export const ldflda = (
  target: ILInstruction,
  field: FieldReference
): LdFldaInstruction => ({ kind: "ldflda", target, field });

export const ldsfld = (field: FieldReference): LdsFldInstruction => ({
  kind: "ldsfld",
  field,
});

export const stfld = (
  target: ILInstruction,
  field: FieldReference,
  value: ILInstruction
): StFldInstruction => ({ kind: "stfld", target, field, value });

export const stsfld = (
  field: FieldReference,
  value: ILInstruction
): StsFldInstruction => ({ kind: "stsfld", field, value });

export const ldloc = (v: ILVariable): LdLocInstruction => ({
  kind: "ldloc",
  variable: v,
});

export const stloc = (v: ILVariable, value: ILInstruction): StLocInstruction => ({
  kind: "stloc",
  variable: v,
  value,
});

export const logicAnd = (
  left: ILInstruction,
  right: ILInstruction
): LogicAndInstruction => ({ kind: "logic.and", left, right });

/**
 * Left-associated `&&` chain: and(a, b, c) = (a && b) && c
 */
export const and = (
  first: ILInstruction,
  ...rest: readonly ILInstruction[]
): ILInstruction => rest.reduce<ILInstruction>(logicAnd, first);

export const comp = (
  operator: ComparisonOperator,
  left: ILInstruction,
  right: ILInstruction
): CompInstruction => ({ kind: "comp", operator, left, right });

export const ldnull = (): LdNullInstruction => ({ kind: "ldnull" });

export const ldstr = (value: string): LdStrInstruction => ({
  kind: "ldstr",
  value,
});

export const ldcI4 = (value: number): LdcI4Instruction => ({
  kind: "ldc.i4",
  value,
});

export const addressOf = (
  value: ILInstruction,
  type: IlType
): AddressOfInstruction => ({ kind: "addressof", value, type });

export const ldTypeToken = (type: IlType): LdTypeTokenInstruction => ({
  kind: "ldtypetoken",
  type,
});
