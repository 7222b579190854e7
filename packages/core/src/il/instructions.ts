/**
 * Normalized instruction tree
 *
 * The low-level, tree-shaped form of a decompiled method body after a minimal
 * normalization pass (stack slots inlined, trivial control flow collapsed into
 * one entry block). Matchers read it; nothing mutates it.
 *
 * Example - an automatic getter:
 *   leave IL_0000 (ldfld <X>k__BackingField(ldloc this))
 *   =>
 *   { kind: "leave", container: "body",
 *     value: { kind: "ldfld", target: { kind: "ldloc", variable: this }, field } }
 */

import type {
  FieldReference,
  IlType,
  MethodReference,
} from "../type-system/types.js";

export type VariableKind = "parameter" | "local" | "stackSlot";

/**
 * A parameter or local of the decompiled function. Compared by identity.
 * `this` is the parameter with index -1; declared parameters start at 0.
 */
export type ILVariable = {
  readonly kind: VariableKind;
  readonly index: number;
  readonly name: string;
  readonly type: IlType;
};

export type ILInstruction =
  | NopInstruction
  | LeaveInstruction
  | BlockInstruction
  | IfInstruction
  | CallInstruction
  | CallVirtInstruction
  | NewObjInstruction
  | LdFldInstruction
  | LdFldaInstruction
  | LdsFldInstruction
  | StFldInstruction
  | StsFldInstruction
  | LdLocInstruction
  | StLocInstruction
  | LogicAndInstruction
  | CompInstruction
  | LdNullInstruction
  | LdStrInstruction
  | LdcI4Instruction
  | AddressOfInstruction
  | LdTypeTokenInstruction;

export type NopInstruction = {
  readonly kind: "nop";
};

/**
 * Leaves a block container, producing `value`.
 * Leaving the function's body container is a return.
 */
export type LeaveInstruction = {
  readonly kind: "leave";
  readonly container: "body" | "nested";
  readonly value: ILInstruction;
};

export type BlockInstruction = {
  readonly kind: "block";
  readonly instructions: readonly ILInstruction[];
};

export type IfInstruction = {
  readonly kind: "if";
  readonly condition: ILInstruction;
  readonly trueInst: ILInstruction;
  readonly falseInst: ILInstruction;
};

export type CallInstruction = {
  readonly kind: "call";
  readonly method: MethodReference;
  readonly arguments: readonly ILInstruction[];
};

/**
 * Virtual call; `arguments[0]` is the receiver.
 */
export type CallVirtInstruction = {
  readonly kind: "callvirt";
  readonly method: MethodReference;
  readonly arguments: readonly ILInstruction[];
};

export type NewObjInstruction = {
  readonly kind: "newobj";
  readonly method: MethodReference;
  readonly arguments: readonly ILInstruction[];
};

export type LdFldInstruction = {
  readonly kind: "ldfld";
  readonly target: ILInstruction;
  readonly field: FieldReference;
};

export type LdFldaInstruction = {
  readonly kind: "ldflda";
  readonly target: ILInstruction;
  readonly field: FieldReference;
};

export type LdsFldInstruction = {
  readonly kind: "ldsfld";
  readonly field: FieldReference;
};

export type StFldInstruction = {
  readonly kind: "stfld";
  readonly target: ILInstruction;
  readonly field: FieldReference;
  readonly value: ILInstruction;
};

export type StsFldInstruction = {
  readonly kind: "stsfld";
  readonly field: FieldReference;
  readonly value: ILInstruction;
};

export type LdLocInstruction = {
  readonly kind: "ldloc";
  readonly variable: ILVariable;
};

export type StLocInstruction = {
  readonly kind: "stloc";
  readonly variable: ILVariable;
  readonly value: ILInstruction;
};

/**
 * Short-circuiting `left && right`.
 */
export type LogicAndInstruction = {
  readonly kind: "logic.and";
  readonly left: ILInstruction;
  readonly right: ILInstruction;
};

export type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type CompInstruction = {
  readonly kind: "comp";
  readonly operator: ComparisonOperator;
  readonly left: ILInstruction;
  readonly right: ILInstruction;
};

export type LdNullInstruction = {
  readonly kind: "ldnull";
};

export type LdStrInstruction = {
  readonly kind: "ldstr";
  readonly value: string;
};

export type LdcI4Instruction = {
  readonly kind: "ldc.i4";
  readonly value: number;
};

/**
 * Takes the address of a value-typed temporary (for constrained calls).
 */
export type AddressOfInstruction = {
  readonly kind: "addressof";
  readonly value: ILInstruction;
  readonly type: IlType;
};

/**
 * Runtime type handle of a static type (`ldtoken T`).
 */
export type LdTypeTokenInstruction = {
  readonly kind: "ldtypetoken";
  readonly type: IlType;
};

/**
 * Any of the three call forms.
 */
export type AnyCallInstruction =
  | CallInstruction
  | CallVirtInstruction
  | NewObjInstruction;

/**
 * A decompiled method body: the entry block's instructions and the
 * function's variables.
 */
export type NormalizedBody = {
  readonly instructions: readonly ILInstruction[];
  readonly variables: readonly ILVariable[];
};
