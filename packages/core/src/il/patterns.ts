/**
 * Instruction patterns
 *
 * Each matcher takes an instruction (or undefined, for an index past the end
 * of a block) and returns the matched operands, or undefined / false when the
 * shape differs.
 */

import type { FieldReference } from "../type-system/types.js";
import type {
  AnyCallInstruction,
  ILInstruction,
  ILVariable,
} from "./instructions.js";

type Maybe = ILInstruction | undefined;

export const matchNop = (inst: Maybe): boolean => inst?.kind === "nop";

/**
 * `leave <function body>(value)`: returns the value (nop for a void return).
 */
export const matchReturn = (inst: Maybe): ILInstruction | undefined =>
  inst?.kind === "leave" && inst.container === "body" ? inst.value : undefined;

export const matchLdLoc = (inst: Maybe): ILVariable | undefined =>
  inst?.kind === "ldloc" ? inst.variable : undefined;

/**
 * `ldloc v` for exactly this variable.
 */
export const isLdLoc = (inst: Maybe, v: ILVariable): boolean =>
  matchLdLoc(inst) === v;

export const matchLdThis = (inst: Maybe): boolean => {
  const v = matchLdLoc(inst);
  return v !== undefined && v.kind === "parameter" && v.index === -1;
};

export const matchStLoc = (
  inst: Maybe
): { readonly variable: ILVariable; readonly value: ILInstruction } | undefined =>
  inst?.kind === "stloc"
    ? { variable: inst.variable, value: inst.value }
    : undefined;

export const matchLdFld = (
  inst: Maybe
):
  | { readonly target: ILInstruction; readonly field: FieldReference }
  | undefined =>
  inst?.kind === "ldfld" ? { target: inst.target, field: inst.field } : undefined;

export const matchLdsFld = (inst: Maybe): FieldReference | undefined =>
  inst?.kind === "ldsfld" ? inst.field : undefined;

export const matchStFld = (
  inst: Maybe
):
  | {
      readonly target: ILInstruction;
      readonly field: FieldReference;
      readonly value: ILInstruction;
    }
  | undefined =>
  inst?.kind === "stfld"
    ? { target: inst.target, field: inst.field, value: inst.value }
    : undefined;

export const matchStsFld = (
  inst: Maybe
): { readonly field: FieldReference; readonly value: ILInstruction } | undefined =>
  inst?.kind === "stsfld" ? { field: inst.field, value: inst.value } : undefined;

export const matchLdStr = (inst: Maybe): string | undefined =>
  inst?.kind === "ldstr" ? inst.value : undefined;

export const matchLdcI4 = (inst: Maybe, value: number): boolean =>
  inst?.kind === "ldc.i4" && inst.value === value;

export const matchLdNull = (inst: Maybe): boolean => inst?.kind === "ldnull";

/**
 * `if (condition) trueInst` with no else branch.
 */
export const matchIfInstruction = (
  inst: Maybe
):
  | { readonly condition: ILInstruction; readonly trueInst: ILInstruction }
  | undefined =>
  inst?.kind === "if" && matchNop(inst.falseInst)
    ? { condition: inst.condition, trueInst: inst.trueInst }
    : undefined;

export const matchLogicAnd = (
  inst: Maybe
): { readonly left: ILInstruction; readonly right: ILInstruction } | undefined =>
  inst?.kind === "logic.and" ? { left: inst.left, right: inst.right } : undefined;

/**
 * `comp(x != ldnull)`: returns x.
 */
export const matchCompNotEqualsNull = (inst: Maybe): ILInstruction | undefined =>
  inst?.kind === "comp" && inst.operator === "!=" && matchLdNull(inst.right)
    ? inst.left
    : undefined;

export const isCallInstruction = (inst: Maybe): inst is AnyCallInstruction =>
  inst?.kind === "call" || inst?.kind === "callvirt" || inst?.kind === "newobj";

/**
 * A block holding a single instruction stands for that instruction.
 */
export const unwrapBlock = (inst: ILInstruction): ILInstruction => {
  if (inst.kind === "block" && inst.instructions.length === 1) {
    const [only] = inst.instructions;
    if (only) return only;
  }
  return inst;
};
