/**
 * Record dump model
 *
 * A record dump stands in for a module reader plus body decompiler: one record
 * type's members and the normalized bodies of its methods, read from YAML.
 */

import type { NormalizedBody } from "../il/instructions.js";
import type {
  FieldDefinition,
  IlNamedType,
  MethodDefinition,
  RecordTypeDefinition,
} from "../type-system/types.js";

export type RecordDump = {
  readonly fileName: string;
  readonly record: RecordTypeDefinition;
  /** Method bodies by method token */
  readonly bodies: ReadonlyMap<number, NormalizedBody>;
};

/**
 * Name resolution while reading members and bodies.
 */
export type DumpScope = {
  readonly selfType: IlNamedType;
  readonly typeParameters: readonly string[];
  readonly fields: ReadonlyMap<string, FieldDefinition>;
  readonly methods: ReadonlyMap<string, readonly MethodDefinition[]>;
};

// Metadata table prefixes for tokens not given in the dump
export const FIELD_TOKEN_BASE = 0x04000001;
export const METHOD_TOKEN_BASE = 0x06000001;
export const PROPERTY_TOKEN_BASE = 0x17000001;
