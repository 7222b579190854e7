/**
 * Member names the compiler reserves or synthesizes for records
 */

export const EQUALITY_CONTRACT = "EqualityContract";
export const PRINT_MEMBERS = "PrintMembers";
export const CLONE_METHOD = "<Clone>$";
export const OP_EQUALITY = "op_Equality";
export const OP_INEQUALITY = "op_Inequality";

/**
 * Name of the field the compiler emits for an automatic property.
 */
export const backingFieldName = (propertyName: string): string =>
  `<${propertyName}>k__BackingField`;
