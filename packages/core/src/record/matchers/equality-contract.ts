/**
 * EqualityContract matcher
 *
 * Generated shape:
 *   protected virtual Type EqualityContract {
 *     [CompilerGenerated] get => typeof(R);
 *   }
 */

import { matchReturn } from "../../il/patterns.js";
import type { PropertyDefinition } from "../../type-system/types.js";
import type { RecordAnalysis } from "../analysis.js";
import { EQUALITY_CONTRACT } from "../names.js";
import { matchGetTypeFromHandle } from "./shared.js";

export const isGeneratedEqualityContract = (
  property: PropertyDefinition,
  analysis: RecordAnalysis
): boolean => {
  analysis.invariant(
    property.name === EQUALITY_CONTRACT,
    `expected ${EQUALITY_CONTRACT}, got ${property.name}`
  );
  if (property.accessibility !== "protected") return false;
  if (!(property.isVirtual || property.isOverride)) return false;
  if (property.isSealed) return false;

  const { getter } = property;
  if (!getter || property.setter) return false;
  if (property.attributes.length > 0) return false;
  if (getter.returnTypeAttributes.length > 0) return false;

  const [marker, ...rest] = getter.attributes;
  if (!marker || rest.length > 0) return false;
  if (
    !analysis.typeSystem.isKnownAttribute(
      marker.attributeType,
      "CompilerGenerated"
    )
  ) {
    return false;
  }

  const body = analysis.decompileBody(getter);
  if (!body || body.instructions.length !== 1) return false;

  // leave body (call GetTypeFromHandle(ldtypetoken R))
  const value = matchReturn(body.instructions[0]);
  const type = matchGetTypeFromHandle(value, analysis.typeSystem);
  return type !== undefined && analysis.isRecordType(type);
};
