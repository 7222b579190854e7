/**
 * Per-record analysis state shared by the matchers
 */

import { strict as assert } from "node:assert";
import type { NormalizedBody } from "../il/instructions.js";
import { typesEqual } from "../type-system/type-ops.js";
import type { DecompilerTypeSystem } from "../type-system/type-system.js";
import type {
  IlNamedType,
  IlType,
  MethodDefinition,
  RecordMember,
  RecordTypeDefinition,
} from "../type-system/types.js";
import type { BackingFieldMap } from "./backing-field-map.js";

export type RecordAnalysis = {
  readonly record: RecordTypeDefinition;
  readonly selfType: IlNamedType;
  readonly typeSystem: DecompilerTypeSystem;
  readonly isInheritedRecord: boolean;
  readonly backingFields: BackingFieldMap;
  /** Canonical member order; undefined when it cannot be inferred */
  readonly memberOrder: readonly RecordMember[] | undefined;
  readonly signal: AbortSignal | undefined;
  readonly decompileBody: (
    method: MethodDefinition | undefined
  ) => NormalizedBody | undefined;
  readonly isRecordType: (type: IlType) => boolean;
  /** Checks an internal precondition when debug assertions are on */
  readonly invariant: (condition: boolean, message: string) => void;
};

/**
 * A record with a class base other than System.Object.
 */
export const detectInheritedRecord = (
  record: RecordTypeDefinition,
  typeSystem: DecompilerTypeSystem
): boolean =>
  record.baseType !== undefined &&
  !typeSystem.isKnownType(record.baseType, "Object");

/**
 * Is `type` the record itself, instantiated over its own type parameters?
 * The outer nullability annotation (`R?`) does not matter.
 */
export const createRecordTypeTest =
  (selfType: IlNamedType) =>
  (type: IlType): boolean =>
    type.kind === "named" && typesEqual({ ...type, nullable: false }, selfType);

/**
 * Body lookup guarded against nil tokens and bodiless methods.
 */
export const createBodyDecompiler =
  (
    typeSystem: DecompilerTypeSystem,
    record: RecordTypeDefinition,
    signal: AbortSignal | undefined
  ) =>
  (method: MethodDefinition | undefined): NormalizedBody | undefined => {
    if (!method || method.token === 0 || !method.hasBody) {
      return undefined;
    }
    return typeSystem.decompileBody(method, { record, signal });
  };

export const createInvariant =
  (enabled: boolean) =>
  (condition: boolean, message: string): void => {
    if (enabled) {
      assert.ok(condition, message);
    }
  };
