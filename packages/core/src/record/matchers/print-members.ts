/**
 * PrintMembers matcher
 *
 * Generated shape for `record Point(int X, int Y)`:
 *
 *   callvirt Append(ldloc builder, ldstr "X = ")
 *   callvirt Append(ldloc builder, callvirt ToString(addressof Int32(call get_X(ldloc this))))
 *   callvirt Append(ldloc builder, ldstr ", Y = ")
 *   callvirt Append(ldloc builder, callvirt ToString(addressof Int32(call get_Y(ldloc this))))
 *   leave body (ldc.i4 1)
 *
 * A derived record first prints its base:
 *
 *   if (call PrintMembers(ldloc this, ldloc builder)) callvirt Append(ldloc builder, ldstr ", ")
 */

import type {
  ILInstruction,
  ILVariable,
  NormalizedBody,
} from "../../il/instructions.js";
import {
  isCallInstruction,
  isLdLoc,
  matchIfInstruction,
  matchLdcI4,
  matchLdStr,
  matchLdThis,
  matchReturn,
  unwrapBlock,
} from "../../il/patterns.js";
import { isCallTo, isOverridable } from "../../type-system/type-ops.js";
import type {
  MethodDefinition,
  RecordMember,
} from "../../type-system/types.js";
import type { RecordAnalysis } from "../analysis.js";
import { EQUALITY_CONTRACT, PRINT_MEMBERS } from "../names.js";
import {
  findParameter,
  hasNoAttributes,
  matchStringBuilderAppend,
} from "./shared.js";

type Cursor = {
  readonly body: NormalizedBody;
  readonly builder: ILVariable;
  readonly analysis: RecordAnalysis;
  pos: number;
};

const appendAt = (cursor: Cursor): ILInstruction | undefined =>
  matchStringBuilderAppend(
    cursor.body.instructions[cursor.pos],
    cursor.builder,
    cursor.analysis.typeSystem
  );

/**
 * Consume a run of `Append(ldstr ...)` calls; returns their concatenation,
 * or undefined when the run is empty.
 */
const consumeConstantAppends = (cursor: Cursor): string | undefined => {
  let text: string | undefined;
  for (;;) {
    const literal = matchLdStr(appendAt(cursor));
    if (literal === undefined) return text;
    text = (text ?? "") + literal;
    cursor.pos++;
  }
};

/**
 * `if (PrintMembers(this, builder)) Append(builder, ", ")`
 */
const matchBaseCall = (cursor: Cursor): boolean => {
  const branch = matchIfInstruction(cursor.body.instructions[cursor.pos]);
  if (!branch) return false;

  const { condition } = branch;
  if (condition.kind !== "call" && condition.kind !== "callvirt") return false;
  if (condition.method.name !== PRINT_MEMBERS) return false;
  if (condition.arguments.length !== 2) return false;
  const [self, builder] = condition.arguments;
  if (!matchLdThis(self) || !isLdLoc(builder, cursor.builder)) return false;

  const separator = matchStringBuilderAppend(
    unwrapBlock(branch.trueInst),
    cursor.builder,
    cursor.analysis.typeSystem
  );
  if (matchLdStr(separator) !== ", ") return false;

  cursor.pos++;
  return true;
};

/**
 * The printed value: `get_X(this)`, or `get_X(this).ToString()` with the
 * receiver optionally behind `addressof`.
 */
const isPrintedValue = (
  value: ILInstruction | undefined,
  member: RecordMember
): boolean => {
  let current = value;
  if (
    isCallInstruction(current) &&
    current.method.name === "ToString" &&
    !current.method.isStatic
  ) {
    if (current.arguments.length !== 1) return false;
    current = current.arguments[0];
    if (current?.kind === "addressof") {
      current = current.value;
    }
  }

  if (!isCallInstruction(current) || member.kind !== "property") return false;
  const { getter } = member;
  if (!getter || !isCallTo(current.method, getter)) return false;
  if (current.arguments.length !== 1) return false;
  return matchLdThis(current.arguments[0]);
};

const isPrintable = (member: RecordMember): boolean =>
  !member.isStatic &&
  member.name !== EQUALITY_CONTRACT &&
  !member.isExplicitInterfaceImplementation;

export const isGeneratedPrintMembers = (
  method: MethodDefinition,
  analysis: RecordAnalysis
): boolean => {
  analysis.invariant(
    method.name === PRINT_MEMBERS,
    `expected ${PRINT_MEMBERS}, got ${method.name}`
  );
  if (method.parameters.length !== 1) return false;
  if (!isOverridable(method)) return false;
  if (!hasNoAttributes(method)) return false;

  const { memberOrder } = analysis;
  if (!memberOrder) return false;

  const body = analysis.decompileBody(method);
  if (!body) return false;

  const builder = findParameter(body, 0);
  if (!builder) return false;
  if (!analysis.typeSystem.isKnownType(builder.type, "StringBuilder")) {
    return false;
  }

  const cursor: Cursor = { body, builder, analysis, pos: 0 };
  if (analysis.isInheritedRecord && !matchBaseCall(cursor)) {
    return false;
  }

  let needsComma = false;
  for (const member of memberOrder) {
    if (!isPrintable(member)) continue;
    analysis.signal?.throwIfAborted();

    const text = consumeConstantAppends(cursor);
    if (text === undefined) return false;
    if (text !== `${needsComma ? ", " : ""}${member.name} = `) return false;

    if (!isPrintedValue(appendAt(cursor), member)) return false;
    cursor.pos++;
    needsComma = true;
  }

  // leave body (ldc.i4 1)
  const result = matchReturn(body.instructions[cursor.pos]);
  return result !== undefined && matchLdcI4(result, needsComma ? 1 : 0);
};
