/**
 * Instruction tree printer
 *
 * Renders trees in the usual IL-listing notation:
 *   callvirt Append(ldloc builder, ldstr ", ")
 *   leave body (ldc.i4 1)
 */

import { formatType } from "../type-system/type-strings.js";
import type { IlType } from "../type-system/types.js";
import type { ILInstruction, NormalizedBody } from "./instructions.js";

const INDENT = "  ";

const shortTypeName = (type: IlType): string =>
  type.kind === "named" ? type.name : formatType(type);

const printArgs = (args: readonly ILInstruction[], indent: string): string =>
  args.map((a) => printInstruction(a, indent)).join(", ");

/**
 * Print one instruction. Blocks span several lines, continuing at `indent`.
 */
export const printInstruction = (inst: ILInstruction, indent = ""): string => {
  switch (inst.kind) {
    case "nop":
      return "nop";

    case "leave":
      return `leave ${inst.container} (${printInstruction(inst.value, indent)})`;

    case "block": {
      const inner = indent + INDENT;
      const lines = inst.instructions.map(
        (i) => `${inner}${printInstruction(i, inner)}`
      );
      return ["Block {", ...lines, `${indent}}`].join("\n");
    }

    case "if": {
      const head = `if (${printInstruction(inst.condition, indent)}) ${printInstruction(inst.trueInst, indent)}`;
      return inst.falseInst.kind === "nop"
        ? head
        : `${head} else ${printInstruction(inst.falseInst, indent)}`;
    }

    case "call":
    case "callvirt":
      return `${inst.kind} ${inst.method.name}(${printArgs(inst.arguments, indent)})`;

    case "newobj":
      return `newobj ${shortTypeName(inst.method.declaringType)}.${inst.method.name}(${printArgs(inst.arguments, indent)})`;

    case "ldfld":
    case "ldflda":
      return `${inst.kind} ${inst.field.name}(${printInstruction(inst.target, indent)})`;

    case "ldsfld":
      return `ldsfld ${inst.field.name}`;

    case "stfld":
      return `stfld ${inst.field.name}(${printArgs([inst.target, inst.value], indent)})`;

    case "stsfld":
      return `stsfld ${inst.field.name}(${printInstruction(inst.value, indent)})`;

    case "ldloc":
      return `ldloc ${inst.variable.name}`;

    case "stloc":
      return `stloc ${inst.variable.name}(${printInstruction(inst.value, indent)})`;

    case "logic.and":
      return `logic.and(${printArgs([inst.left, inst.right], indent)})`;

    case "comp":
      return `comp(${printInstruction(inst.left, indent)} ${inst.operator} ${printInstruction(inst.right, indent)})`;

    case "ldnull":
      return "ldnull";

    case "ldstr":
      return `ldstr ${JSON.stringify(inst.value)}`;

    case "ldc.i4":
      return `ldc.i4 ${inst.value}`;

    case "addressof":
      return `addressof ${formatType(inst.type)}(${printInstruction(inst.value, indent)})`;

    case "ldtypetoken":
      return `ldtypetoken ${formatType(inst.type)}`;

    default: {
      const exhaustiveCheck: never = inst;
      throw new Error(
        `ICE: Unhandled instruction kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};

/**
 * Print a whole body, one top-level instruction per line.
 */
export const printBody = (body: NormalizedBody): string =>
  body.instructions.map((inst) => printInstruction(inst)).join("\n");
