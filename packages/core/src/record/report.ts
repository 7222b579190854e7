/**
 * Whole-record classification report
 */

import { formatType } from "../type-system/type-strings.js";
import type { DecompilerTypeSystem } from "../type-system/type-system.js";
import type {
  MethodDefinition,
  PropertyDefinition,
  RecordTypeDefinition,
} from "../type-system/types.js";
import { type ClassifierOptions, RecordClassifier } from "./classifier.js";

export type MemberVerdict = {
  readonly kind: "property" | "method";
  readonly name: string;
  readonly signature: string;
  readonly generated: boolean;
};

export type AutoPropertyEntry = {
  readonly property: string;
  readonly backingField: string;
};

export type RecordReport = {
  readonly record: string;
  readonly isInheritedRecord: boolean;
  readonly autoProperties: readonly AutoPropertyEntry[];
  /** Member names in canonical order; null when the order is unknown */
  readonly memberOrder: readonly string[] | null;
  readonly members: readonly MemberVerdict[];
};

export const qualifiedRecordName = (record: RecordTypeDefinition): string => {
  const name = record.namespace ? `${record.namespace}.${record.name}` : record.name;
  return record.typeParameters.length > 0
    ? `${name}<${record.typeParameters.join(", ")}>`
    : name;
};

export const methodSignature = (method: MethodDefinition): string =>
  `${method.isStatic ? "static " : ""}${formatType(method.returnType)} ${method.name}(${method.parameters
    .map((p) => formatType(p.type))
    .join(", ")})`;

export const propertySignature = (property: PropertyDefinition): string => {
  const accessors = [
    ...(property.getter ? ["get;"] : []),
    ...(property.setter ? ["set;"] : []),
  ];
  return `${property.isStatic ? "static " : ""}${formatType(property.type)} ${property.name} { ${accessors.join(" ")} }`;
};

/**
 * Classify every property and method of a record, in declaration order.
 */
export const classifyRecord = (
  record: RecordTypeDefinition,
  typeSystem: DecompilerTypeSystem,
  options: ClassifierOptions = {}
): RecordReport => {
  const classifier = new RecordClassifier(record, typeSystem, options);

  const properties = record.properties.map(
    (property): MemberVerdict => ({
      kind: "property",
      name: property.name,
      signature: propertySignature(property),
      generated: classifier.propertyIsGenerated(property),
    })
  );
  const methods = record.methods.map(
    (method): MemberVerdict => ({
      kind: "method",
      name: method.name,
      signature: methodSignature(method),
      generated: classifier.methodIsGenerated(method),
    })
  );

  return {
    record: qualifiedRecordName(record),
    isInheritedRecord: classifier.isInheritedRecord,
    autoProperties: classifier.autoProperties.entries().map((pair) => ({
      property: pair.property.name,
      backingField: pair.field.name,
    })),
    memberOrder: classifier.memberOrder?.map((m) => m.name) ?? null,
    members: [...properties, ...methods],
  };
};

/**
 * Render a report as plain text:
 *
 *   record Demo.Point
 *     auto-properties: X <- <X>k__BackingField, Y <- <Y>k__BackingField
 *     member order: EqualityContract, X, Y
 *     [generated] System.Type EqualityContract { get; }
 *     [user]      System.Int32 Sum()
 */
export const formatReport = (
  report: RecordReport,
  onlyGenerated = false
): string => {
  const lines = [`record ${report.record}`];
  if (report.isInheritedRecord) {
    lines.push("  inherited: yes");
  }
  const autos = report.autoProperties
    .map((a) => `${a.property} <- ${a.backingField}`)
    .join(", ");
  lines.push(`  auto-properties: ${autos || "(none)"}`);
  lines.push(
    `  member order: ${report.memberOrder ? report.memberOrder.join(", ") || "(empty)" : "(unknown)"}`
  );
  for (const member of report.members) {
    if (onlyGenerated && !member.generated) continue;
    const tag = member.generated ? "[generated]" : "[user]     ";
    lines.push(`  ${tag} ${member.signature}`);
  }
  return lines.join("\n");
};
