/**
 * Record header and member declarations
 */

import type {
  AttributeReference,
  FieldDefinition,
  IlNamedType,
  IlType,
  MethodDefinition,
  ParameterDefinition,
  PropertyDefinition,
} from "../type-system/types.js";
import { parseTypeString } from "../type-system/type-strings.js";
import type { DiagnosticCode } from "../types/diagnostic.js";
import {
  DumpError,
  type DumpObject,
  expectObject,
  isDumpObject,
  optionalAccessibility,
  optionalArray,
  optionalBoolean,
  optionalInteger,
  optionalString,
  optionalStringArray,
  requireString,
} from "./reader.js";
import {
  type DumpScope,
  FIELD_TOKEN_BASE,
  METHOD_TOKEN_BASE,
  PROPERTY_TOKEN_BASE,
} from "./types.js";

export type RecordHeader = {
  readonly namespace: string;
  readonly name: string;
  readonly typeParameters: readonly string[];
  readonly baseType?: IlNamedType;
  readonly interfaces: readonly IlNamedType[];
};

/**
 * Parse a type string in the record's generic context.
 */
export const parseDumpType = (
  text: string,
  path: string,
  typeParameters: readonly string[]
): IlType => {
  const type = parseTypeString(text, { typeParameters });
  if (!type) {
    throw new DumpError("RLN9009", path, `Invalid type string: ${text}`);
  }
  return type;
};

const parseNamedType = (
  text: string,
  path: string,
  typeParameters: readonly string[]
): IlNamedType => {
  const type = parseDumpType(text, path, typeParameters);
  if (type.kind !== "named") {
    throw new DumpError("RLN9009", path, `Expected a class or interface: ${text}`);
  }
  return type;
};

export const parseRecordHeader = (value: unknown): RecordHeader => {
  const path = "record";
  const obj = expectObject(value, path, "RLN9005", "'record'");
  const code: DiagnosticCode = "RLN9005";

  const name = requireString(obj, "name", path, code);
  const namespace = optionalString(obj, "namespace", path, code) ?? "";
  const typeParameters = optionalStringArray(obj, "typeParameters", path, code);
  const baseTypeText = optionalString(obj, "baseType", path, code);
  const interfaces = optionalStringArray(obj, "interfaces", path, code).map(
    (text, i) => parseNamedType(text, `${path}.interfaces[${i}]`, typeParameters)
  );

  return {
    namespace,
    name,
    typeParameters,
    baseType:
      baseTypeText === undefined
        ? undefined
        : parseNamedType(baseTypeText, `${path}.baseType`, typeParameters),
    interfaces,
  };
};

const parseAttributes = (
  obj: DumpObject,
  key: string,
  path: string,
  code: DiagnosticCode,
  typeParameters: readonly string[]
): readonly AttributeReference[] =>
  optionalStringArray(obj, key, path, code).map((text, i) => ({
    attributeType: parseDumpType(text, `${path}.${key}[${i}]`, typeParameters),
  }));

/**
 * Shared member flags; `code` tags errors with the member's kind.
 */
const parseMemberBase = (
  obj: DumpObject,
  path: string,
  code: DiagnosticCode,
  scope: Pick<DumpScope, "selfType" | "typeParameters">,
  defaultToken: number
) => ({
  name: requireString(obj, "name", path, code),
  token: optionalInteger(obj, "token", path, code) ?? defaultToken,
  declaringType: scope.selfType,
  isStatic: optionalBoolean(obj, "isStatic", path, code),
  attributes: parseAttributes(obj, "attributes", path, code, scope.typeParameters),
  isExplicitInterfaceImplementation: optionalBoolean(
    obj,
    "isExplicitInterfaceImplementation",
    path,
    code
  ),
});

export const parseField = (
  value: unknown,
  index: number,
  scope: Pick<DumpScope, "selfType" | "typeParameters">
): FieldDefinition => {
  const path = `fields[${index}]`;
  const obj = expectObject(value, path, "RLN9006", "Field");
  return {
    kind: "field",
    ...parseMemberBase(obj, path, "RLN9006", scope, FIELD_TOKEN_BASE + index),
    accessibility: optionalAccessibility(obj, path, "RLN9006", "private"),
    type: parseDumpType(
      requireString(obj, "type", path, "RLN9006"),
      `${path}.type`,
      scope.typeParameters
    ),
  };
};

/**
 * A parameter is `{ name, type }` or just its type string.
 */
const parseParameters = (
  obj: DumpObject,
  path: string,
  code: DiagnosticCode,
  typeParameters: readonly string[]
): readonly ParameterDefinition[] =>
  optionalArray(obj, "parameters", path, code).map((item, i) => {
    const itemPath = `${path}.parameters[${i}]`;
    if (typeof item === "string") {
      return { name: `arg${i}`, type: parseDumpType(item, itemPath, typeParameters) };
    }
    if (!isDumpObject(item)) {
      throw new DumpError(code, itemPath, "Parameter must be a type string or an object");
    }
    return {
      name: requireString(item, "name", itemPath, code),
      type: parseDumpType(
        requireString(item, "type", itemPath, code),
        `${itemPath}.type`,
        typeParameters
      ),
    };
  });

export const parseMethod = (
  value: unknown,
  index: number,
  scope: Pick<DumpScope, "selfType" | "typeParameters">
): MethodDefinition => {
  const path = `methods[${index}]`;
  const code: DiagnosticCode = "RLN9007";
  const obj = expectObject(value, path, code, "Method");
  const base = parseMemberBase(obj, path, code, scope, METHOD_TOKEN_BASE + index);
  const returnType = optionalString(obj, "returnType", path, code) ?? "void";
  if (obj.body !== undefined && obj.body !== null && !isDumpObject(obj.body)) {
    throw new DumpError("RLN9014", `${path}.body`, "Method body must be an object");
  }

  return {
    kind: "method",
    ...base,
    accessibility: optionalAccessibility(obj, path, code, "public"),
    parameters: parseParameters(obj, path, code, scope.typeParameters),
    returnType: parseDumpType(returnType, `${path}.returnType`, scope.typeParameters),
    returnTypeAttributes: parseAttributes(
      obj,
      "returnTypeAttributes",
      path,
      code,
      scope.typeParameters
    ),
    isVirtual: optionalBoolean(obj, "isVirtual", path, code),
    isOverride: optionalBoolean(obj, "isOverride", path, code),
    isSealed: optionalBoolean(obj, "isSealed", path, code),
    isAbstract: optionalBoolean(obj, "isAbstract", path, code),
    isOperator:
      optionalBoolean(obj, "isOperator", path, code) || base.name.startsWith("op_"),
    hasBody: isDumpObject(obj.body),
  };
};

/**
 * The one method declared under `name`; accessors are referenced this way.
 */
export const resolveMethodByName = (
  name: string,
  path: string,
  methods: DumpScope["methods"]
): MethodDefinition => {
  const candidates = methods.get(name) ?? [];
  const [only, ...rest] = candidates;
  if (!only) {
    throw new DumpError("RLN9010", path, `Unknown method: ${name}`);
  }
  if (rest.length > 0) {
    throw new DumpError(
      "RLN9010",
      path,
      `Ambiguous method reference: ${name}`,
      "Reference an overloaded method through an external 'Type::Name' reference"
    );
  }
  return only;
};

export const parseProperty = (
  value: unknown,
  index: number,
  scope: DumpScope
): PropertyDefinition => {
  const path = `properties[${index}]`;
  const code: DiagnosticCode = "RLN9008";
  const obj = expectObject(value, path, code, "Property");
  const accessor = (key: "getter" | "setter"): MethodDefinition | undefined => {
    const name = optionalString(obj, key, path, code);
    return name === undefined
      ? undefined
      : resolveMethodByName(name, `${path}.${key}`, scope.methods);
  };

  return {
    kind: "property",
    ...parseMemberBase(obj, path, code, scope, PROPERTY_TOKEN_BASE + index),
    accessibility: optionalAccessibility(obj, path, code, "public"),
    type: parseDumpType(
      requireString(obj, "type", path, code),
      `${path}.type`,
      scope.typeParameters
    ),
    parameters: parseParameters(obj, path, code, scope.typeParameters),
    getter: accessor("getter"),
    setter: accessor("setter"),
    isVirtual: optionalBoolean(obj, "isVirtual", path, code),
    isOverride: optionalBoolean(obj, "isOverride", path, code),
    isSealed: optionalBoolean(obj, "isSealed", path, code),
  };
};
