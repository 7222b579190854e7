/**
 * Equals(R) matcher
 *
 *   virtual bool Equals(R? other) =>
 *     other != null
 *     && EqualityContract == other.EqualityContract
 *     && EqualityComparer<int>.Default.Equals(<X>k__BackingField, other.<X>k__BackingField)
 *     && ...;
 */

import type { ILInstruction, ILVariable } from "../../il/instructions.js";
import {
  isLdLoc,
  matchCompNotEqualsNull,
  matchLdThis,
  matchReturn,
} from "../../il/patterns.js";
import { isOverridable } from "../../type-system/type-ops.js";
import type {
  FieldDefinition,
  MethodDefinition,
  RecordMember,
} from "../../type-system/types.js";
import type { RecordAnalysis } from "../analysis.js";
import { EQUALITY_CONTRACT, OP_EQUALITY } from "../names.js";
import {
  findParameter,
  hasNoAttributes,
  isEqualityComparerGetDefaultCall,
  matchGetEqualityContract,
  matchLdFldOf,
  unpackLogicAndChain,
} from "./shared.js";

/**
 * `Type.op_Equality(this.EqualityContract, other.EqualityContract)`
 */
const isContractComparison = (
  condition: ILInstruction | undefined,
  other: ILVariable,
  analysis: RecordAnalysis
): boolean => {
  if (condition?.kind !== "call") return false;
  const { method } = condition;
  if (!method.isOperator || method.name !== OP_EQUALITY) return false;
  if (!analysis.typeSystem.isKnownType(method.declaringType, "Type")) {
    return false;
  }
  if (condition.arguments.length !== 2) return false;
  const [left, right] = condition.arguments;
  return (
    matchLdThis(matchGetEqualityContract(left)) &&
    isLdLoc(matchGetEqualityContract(right), other)
  );
};

/**
 * `EqualityComparer<T>.Default.Equals(this.field, other.field)`
 */
const isFieldComparison = (
  condition: ILInstruction | undefined,
  field: FieldDefinition,
  other: ILVariable,
  analysis: RecordAnalysis
): boolean => {
  if (condition?.kind !== "callvirt") return false;
  if (condition.method.name !== "Equals") return false;
  if (condition.arguments.length !== 3) return false;
  const [comparer, left, right] = condition.arguments;
  if (!isEqualityComparerGetDefaultCall(comparer, field.type, analysis.typeSystem)) {
    return false;
  }
  return (
    matchLdThis(matchLdFldOf(left, field)) &&
    isLdLoc(matchLdFldOf(right, field), other)
  );
};

/**
 * The storage Equals compares for a member; undefined for members it skips.
 */
const comparedField = (
  member: RecordMember,
  analysis: RecordAnalysis
): FieldDefinition | undefined =>
  member.kind === "field" ? member : analysis.backingFields.fieldOf(member);

export const isGeneratedEquals = (
  method: MethodDefinition,
  analysis: RecordAnalysis
): boolean => {
  analysis.invariant(
    method.name === "Equals" && method.parameters.length === 1,
    `expected Equals(R), got ${method.name}/${method.parameters.length}`
  );
  if (method.parameters.length !== 1) return false;
  if (!isOverridable(method)) return false;
  if (!hasNoAttributes(method)) return false;

  const { memberOrder } = analysis;
  if (!memberOrder) return false;

  const body = analysis.decompileBody(method);
  if (!body) return false;

  const returned = matchReturn(body.instructions[0]);
  if (!returned) return false;

  const other = findParameter(body, 0);
  if (!other) return false;
  analysis.invariant(
    analysis.isRecordType(other.type),
    `Equals parameter is not ${analysis.record.name}`
  );

  // Derived records compare base.Equals first; that chain is not recognized.
  if (analysis.isInheritedRecord) return false;

  const conditions = unpackLogicAndChain(returned);
  let pos = 0;

  // comp(ldloc other != ldnull)
  if (!isLdLoc(matchCompNotEqualsNull(conditions[pos]), other)) return false;
  pos++;

  if (!isContractComparison(conditions[pos], other, analysis)) return false;
  pos++;

  for (const member of memberOrder) {
    if (member.isStatic) continue;
    if (member.name === EQUALITY_CONTRACT) continue;

    const field = comparedField(member, analysis);
    if (!field) continue;

    if (!isFieldComparison(conditions[pos], field, other, analysis)) {
      return false;
    }
    pos++;
  }
  return pos === conditions.length;
};
