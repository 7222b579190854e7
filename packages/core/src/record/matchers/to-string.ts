/**
 * ToString matcher
 *
 *   stloc sb(newobj StringBuilder..ctor())
 *   callvirt Append(ldloc sb, ldstr "Point")
 *   callvirt Append(ldloc sb, ldstr " { ")
 *   if (callvirt PrintMembers(ldloc this, ldloc sb)) callvirt Append(ldloc sb, ldstr " ")
 *   callvirt Append(ldloc sb, ldstr "}")
 *   leave body (callvirt ToString(ldloc sb))
 *
 * The `if` is absent when there is nothing to print.
 */

import type { ILInstruction, ILVariable } from "../../il/instructions.js";
import {
  isLdLoc,
  matchIfInstruction,
  matchLdStr,
  matchLdThis,
  matchReturn,
  matchStLoc,
  unwrapBlock,
} from "../../il/patterns.js";
import type { MethodDefinition } from "../../type-system/types.js";
import type { RecordAnalysis } from "../analysis.js";
import { PRINT_MEMBERS } from "../names.js";
import { hasNoAttributes, matchStringBuilderAppend } from "./shared.js";

const appendsLiteral = (
  inst: ILInstruction | undefined,
  sb: ILVariable,
  text: string,
  analysis: RecordAnalysis
): boolean =>
  matchLdStr(matchStringBuilderAppend(inst, sb, analysis.typeSystem)) === text;

const isPrintMembersCall = (condition: ILInstruction, sb: ILVariable): boolean => {
  if (condition.kind !== "callvirt") return false;
  if (condition.method.name !== PRINT_MEMBERS) return false;
  if (condition.arguments.length !== 2) return false;
  const [self, builder] = condition.arguments;
  return matchLdThis(self) && isLdLoc(builder, sb);
};

export const isGeneratedToString = (
  method: MethodDefinition,
  analysis: RecordAnalysis
): boolean => {
  analysis.invariant(
    method.name === "ToString" && method.parameters.length === 0,
    `expected ToString(), got ${method.name}/${method.parameters.length}`
  );
  if (!method.isOverride) return false;
  if (method.isSealed) return false;
  if (!hasNoAttributes(method)) return false;

  const body = analysis.decompileBody(method);
  if (!body) return false;
  const { instructions } = body;

  const init = matchStLoc(instructions[0]);
  if (!init) return false;
  const sb = init.variable;
  if (
    init.value.kind !== "newobj" ||
    init.value.arguments.length !== 0 ||
    !analysis.typeSystem.isKnownType(
      init.value.method.declaringType,
      "StringBuilder"
    )
  ) {
    return false;
  }

  if (!appendsLiteral(instructions[1], sb, analysis.record.name, analysis)) {
    return false;
  }
  if (!appendsLiteral(instructions[2], sb, " { ", analysis)) return false;

  let pos = 3;
  const printMembers = matchIfInstruction(instructions[pos]);
  if (printMembers) {
    if (!isPrintMembersCall(printMembers.condition, sb)) return false;
    if (!appendsLiteral(unwrapBlock(printMembers.trueInst), sb, " ", analysis)) {
      return false;
    }
    pos++;
  }

  if (!appendsLiteral(instructions[pos], sb, "}", analysis)) return false;
  pos++;

  const result = matchReturn(instructions[pos]);
  if (result?.kind !== "callvirt" || result.method.name !== "ToString") {
    return false;
  }
  return result.arguments.length === 1 && isLdLoc(result.arguments[0], sb);
};
