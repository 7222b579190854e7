/**
 * Canonical member order
 *
 * Equals, GetHashCode and PrintMembers must agree on one ordering of fields
 * and properties. Metadata lists fields and properties separately, so their
 * interleaving is only known when every field backs an automatic property:
 * the order is then the property order.
 */

import type {
  RecordMember,
  RecordTypeDefinition,
} from "../type-system/types.js";
import type { BackingFieldMap } from "./backing-field-map.js";

/**
 * Returns undefined when the order cannot be inferred.
 */
export const detectMemberOrder = (
  record: RecordTypeDefinition,
  backingFields: BackingFieldMap
): readonly RecordMember[] | undefined =>
  record.fields.every((field) => backingFields.hasField(field))
    ? Object.freeze([...record.properties])
    : undefined;
