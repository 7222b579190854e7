/**
 * Property ↔ backing field relation
 */

import type {
  FieldDefinition,
  PropertyDefinition,
} from "../type-system/types.js";

export type BackingFieldPair = {
  readonly property: PropertyDefinition;
  readonly field: FieldDefinition;
};

type Keyed = { readonly kind: "field" | "property"; readonly token: number; readonly name: string };

const keyOf = (member: Keyed): string =>
  `${member.kind}:${member.token}:${member.name}`;

/**
 * One-to-one map between automatic properties and their backing fields.
 *
 * Both directions read the same table, so they cannot disagree. Built once
 * by auto-property detection; read-only afterwards.
 */
export class BackingFieldMap {
  private readonly table: ReadonlyMap<string, BackingFieldPair>;
  private readonly pairs: readonly BackingFieldPair[];

  constructor(pairs: readonly BackingFieldPair[]) {
    const table = new Map<string, BackingFieldPair>();
    for (const pair of pairs) {
      const propertyKey = keyOf(pair.property);
      const fieldKey = keyOf(pair.field);
      if (table.has(propertyKey) || table.has(fieldKey)) {
        throw new Error(
          `ICE: ${pair.property.name} ↔ ${pair.field.name} is not one-to-one`
        );
      }
      table.set(propertyKey, pair);
      table.set(fieldKey, pair);
    }
    this.table = table;
    this.pairs = Object.freeze([...pairs]);
  }

  fieldOf(property: PropertyDefinition): FieldDefinition | undefined {
    return this.table.get(keyOf(property))?.field;
  }

  propertyOf(field: FieldDefinition): PropertyDefinition | undefined {
    return this.table.get(keyOf(field))?.property;
  }

  hasField(field: FieldDefinition): boolean {
    return this.table.has(keyOf(field));
  }

  get size(): number {
    return this.pairs.length;
  }

  /**
   * Pairs in property declaration order
   */
  entries(): readonly BackingFieldPair[] {
    return this.pairs;
  }
}
