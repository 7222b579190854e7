/**
 * Type system and body decompiler boundary
 *
 * The classifier never reads metadata or IL itself. It asks this interface for
 * a method's normalized body and for the few type questions it needs answered.
 */

import type { NormalizedBody } from "../il/instructions.js";
import {
  isKnownAttribute,
  isKnownType,
  type KnownAttributeCode,
  type KnownTypeCode,
} from "./known-types.js";
import { equivalentErasedTypes } from "./type-ops.js";
import type {
  IlType,
  MethodDefinition,
  RecordTypeDefinition,
} from "./types.js";

export type DecompileContext = {
  /** Supplies the class type parameters for the generic context */
  readonly record: RecordTypeDefinition;
  readonly signal?: AbortSignal;
};

/**
 * Lower a method to its normalized body.
 * Returns undefined for methods without a body.
 */
export type BodyDecompiler = (
  method: MethodDefinition,
  context: DecompileContext
) => NormalizedBody | undefined;

export type DecompilerTypeSystem = {
  readonly decompileBody: BodyDecompiler;
  readonly isKnownType: (type: IlType, code: KnownTypeCode) => boolean;
  readonly isKnownAttribute: (
    type: IlType,
    code: KnownAttributeCode
  ) => boolean;
  readonly equivalentErasedTypes: (a: IlType, b: IlType) => boolean;
};

/**
 * Default type system over a body decompiler.
 */
export const createTypeSystem = (
  decompileBody: BodyDecompiler
): DecompilerTypeSystem => ({
  decompileBody,
  isKnownType,
  isKnownAttribute,
  equivalentErasedTypes,
});
