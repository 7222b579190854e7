/**
 * Automatic property detection
 *
 * A property is automatic when its accessors do nothing but read and write a
 * compiler-named backing field:
 *
 *   get_X: leave body (ldfld <X>k__BackingField(ldloc this))
 *   set_X: stfld <X>k__BackingField(ldloc this, ldloc value)
 *          leave body (nop)
 */

import type { ILInstruction, NormalizedBody } from "../il/instructions.js";
import {
  matchLdFld,
  matchLdLoc,
  matchLdsFld,
  matchLdThis,
  matchNop,
  matchReturn,
  matchStFld,
  matchStsFld,
} from "../il/patterns.js";
import { fieldsEqual } from "../type-system/type-ops.js";
import type {
  FieldDefinition,
  FieldReference,
  IlType,
  MethodDefinition,
  PropertyDefinition,
  RecordTypeDefinition,
} from "../type-system/types.js";
import { BackingFieldMap, type BackingFieldPair } from "./backing-field-map.js";
import { backingFieldName } from "./names.js";

export type AutoPropertyInput = {
  readonly record: RecordTypeDefinition;
  readonly decompileBody: (
    method: MethodDefinition | undefined
  ) => NormalizedBody | undefined;
  readonly isRecordType: (type: IlType) => boolean;
  readonly signal: AbortSignal | undefined;
};

/**
 * Getter body: exactly `return this.field` (`return field` when static).
 */
const matchAutoGetter = (
  method: MethodDefinition,
  input: AutoPropertyInput
): FieldReference | undefined => {
  const body = input.decompileBody(method);
  if (!body || body.instructions.length !== 1) return undefined;

  const value = matchReturn(body.instructions[0]);
  if (!value) return undefined;

  if (method.isStatic) {
    return matchLdsFld(value);
  }
  const load = matchLdFld(value);
  return load && matchLdThis(load.target) ? load.field : undefined;
};

const matchThisStore = (inst: ILInstruction | undefined) => {
  const store = matchStFld(inst);
  return store && matchLdThis(store.target) ? store : undefined;
};

/**
 * Setter body: exactly `this.field = value; return;`
 */
const matchAutoSetter = (
  method: MethodDefinition,
  input: AutoPropertyInput
): FieldReference | undefined => {
  const body = input.decompileBody(method);
  if (!body || body.instructions.length !== 2) return undefined;

  const [store, tail] = body.instructions;
  const assignment = method.isStatic
    ? matchStsFld(store)
    : matchThisStore(store);
  if (!assignment) return undefined;

  const source = matchLdLoc(assignment.value);
  if (!source || source.kind !== "parameter" || source.index !== 0) {
    return undefined;
  }

  const returned = matchReturn(tail);
  return returned && matchNop(returned) ? assignment.field : undefined;
};

const findBackingField = (
  property: PropertyDefinition,
  input: AutoPropertyInput
): FieldDefinition | undefined => {
  if (property.parameters.length !== 0) return undefined;

  let field: FieldReference | undefined;
  if (property.getter) {
    field = matchAutoGetter(property.getter, input);
    if (!field) return undefined;
  }
  if (property.setter) {
    const setterField = matchAutoSetter(property.setter, input);
    if (!setterField) return undefined;
    if (field && !fieldsEqual(field, setterField)) return undefined;
    field = setterField;
  }
  if (!field) return undefined;

  if (!input.isRecordType(field.declaringType)) return undefined;
  if (field.name !== backingFieldName(property.name)) return undefined;

  const accessed = field;
  return input.record.fields.find((f) => fieldsEqual(f, accessed));
};

/**
 * Pair every automatic property of the record with its backing field.
 */
export const detectAutomaticProperties = (
  input: AutoPropertyInput
): BackingFieldMap => {
  const pairs: BackingFieldPair[] = [];
  for (const property of input.record.properties) {
    input.signal?.throwIfAborted();
    const field = findBackingField(property, input);
    if (field) {
      pairs.push({ property, field });
    }
  }
  return new BackingFieldMap(pairs);
};
