/**
 * Signature-only matchers
 *
 * The compiler rejects user declarations with these signatures, so no body
 * inspection is needed.
 */

import type { MethodDefinition } from "../../type-system/types.js";
import type { RecordAnalysis } from "../analysis.js";

/**
 * `op_Equality(R, R)` / `op_Inequality(R, R)`
 */
export const isGeneratedComparisonOperator = (
  method: MethodDefinition,
  analysis: RecordAnalysis
): boolean =>
  method.parameters.length === 2 &&
  method.parameters.every((p) => analysis.isRecordType(p.type));

/**
 * `Equals(object)` is always synthesized for records.
 */
export const isObjectEqualsOverload = (
  method: MethodDefinition,
  analysis: RecordAnalysis
): boolean => {
  const [parameter] = method.parameters;
  return (
    method.parameters.length === 1 &&
    parameter !== undefined &&
    analysis.typeSystem.isKnownType(parameter.type, "Object")
  );
};
