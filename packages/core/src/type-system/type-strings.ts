/**
 * CLR Type String Parsing and Formatting
 *
 * Type strings follow reflection notation with a few C# conveniences:
 * - "System.Int32", "int", "string", "object" → named types
 * - "System.Collections.Generic.EqualityComparer`1[[System.Int32]]" → instantiated generic
 * - "!0" / "!!0" → type parameter 0 of the type / of the method
 * - "T" → type parameter, when T is one of the type parameters in scope
 * - "T[]", "T[,]", "T&", "string?", "int?" (System.Nullable`1), "(int a, string b)"
 * - "dynamic", "nint", "nuint"
 */

import type { IlNamedType, IlType } from "./types.js";

export type TypeParameterScope = {
  readonly typeParameters?: readonly string[];
  readonly methodTypeParameters?: readonly string[];
};

const system = (name: string): IlNamedType => ({
  kind: "named",
  namespace: "System",
  name,
  typeArguments: [],
});

// C# keyword aliases; `valueType` decides whether a trailing `?` means System.Nullable`1
const KEYWORD_ALIASES: Readonly<
  Record<string, { readonly type: IlNamedType; readonly valueType: boolean }>
> = {
  object: { type: system("Object"), valueType: false },
  string: { type: system("String"), valueType: false },
  bool: { type: system("Boolean"), valueType: true },
  char: { type: system("Char"), valueType: true },
  sbyte: { type: system("SByte"), valueType: true },
  byte: { type: system("Byte"), valueType: true },
  short: { type: system("Int16"), valueType: true },
  ushort: { type: system("UInt16"), valueType: true },
  int: { type: system("Int32"), valueType: true },
  uint: { type: system("UInt32"), valueType: true },
  long: { type: system("Int64"), valueType: true },
  ulong: { type: system("UInt64"), valueType: true },
  float: { type: system("Single"), valueType: true },
  double: { type: system("Double"), valueType: true },
  decimal: { type: system("Decimal"), valueType: true },
  void: { type: system("Void"), valueType: false },
};

/**
 * Split type arguments handling nested brackets and tuple parentheses.
 */
export const splitTypeArguments = (str: string): string[] => {
  const result: string[] = [];
  let depth = 0;
  let current = "";

  for (const char of str) {
    if (char === "[" || char === "(") {
      depth++;
      current += char;
    } else if (char === "]" || char === ")") {
      depth--;
      current += char;
    } else if (char === "," && depth === 0) {
      result.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  if (current.trim()) {
    result.push(current.trim());
  }

  return result;
};

const withNullableAnnotation = (type: IlType): IlType | undefined => {
  switch (type.kind) {
    case "named":
    case "typeParameter":
    case "array":
    case "dynamic":
      return { ...type, nullable: true };
    default:
      return undefined;
  }
};

const parseTupleElement = (
  element: string,
  scope: TypeParameterScope
): { readonly type: IlType; readonly name: string | undefined } | undefined => {
  // "System.Int32 count" → type + element name; the name never contains brackets
  const match = element.match(/^(.*\S)\s+([A-Za-z_]\w*)$/);
  if (match && match[1] && match[2]) {
    const type = parseTypeString(match[1], scope);
    return type ? { type, name: match[2] } : undefined;
  }
  const type = parseTypeString(element, scope);
  return type ? { type, name: undefined } : undefined;
};

/**
 * Parse a type string. Returns undefined when the string is malformed.
 */
export const parseTypeString = (
  text: string,
  scope: TypeParameterScope = {}
): IlType | undefined => {
  const clrType = text.trim();
  if (clrType.length === 0) return undefined;

  // By-reference: T&
  if (clrType.endsWith("&")) {
    const elementType = parseTypeString(clrType.slice(0, -1), scope);
    return elementType ? { kind: "byReference", elementType } : undefined;
  }

  // Nullable: int? → System.Nullable`1[[System.Int32]], string? → annotation
  if (clrType.endsWith("?")) {
    const inner = clrType.slice(0, -1).trim();
    const alias = KEYWORD_ALIASES[inner];
    if (alias?.valueType) {
      return {
        kind: "named",
        namespace: "System",
        name: "Nullable",
        typeArguments: [alias.type],
      };
    }
    const innerType = parseTypeString(inner, scope);
    return innerType ? withNullableAnnotation(innerType) : undefined;
  }

  // Arrays: T[] / T[,]
  const arrayMatch = clrType.match(/^(.*)\[(,*)\]$/);
  if (arrayMatch && arrayMatch[1] !== undefined && arrayMatch[2] !== undefined) {
    const elementType = parseTypeString(arrayMatch[1], scope);
    return elementType
      ? { kind: "array", elementType, rank: arrayMatch[2].length + 1 }
      : undefined;
  }

  // Tuples: (int, string) / (int a, string b)
  if (clrType.startsWith("(") && clrType.endsWith(")")) {
    const elements = splitTypeArguments(clrType.slice(1, -1));
    if (elements.length < 2) return undefined;
    const parsed = elements.map((e) => parseTupleElement(e, scope));
    const elementTypes: IlType[] = [];
    const elementNames: (string | undefined)[] = [];
    for (const element of parsed) {
      if (!element) return undefined;
      elementTypes.push(element.type);
      elementNames.push(element.name);
    }
    return elementNames.some((n) => n !== undefined)
      ? { kind: "tuple", elementTypes, elementNames }
      : { kind: "tuple", elementTypes };
  }

  // Type parameters by position
  const methodParamMatch = clrType.match(/^!!(\d+)$/);
  if (methodParamMatch && methodParamMatch[1]) {
    const index = parseInt(methodParamMatch[1], 10);
    return {
      kind: "typeParameter",
      owner: "method",
      index,
      name: scope.methodTypeParameters?.[index] ?? clrType,
    };
  }
  const typeParamMatch = clrType.match(/^!(\d+)$/);
  if (typeParamMatch && typeParamMatch[1]) {
    const index = parseInt(typeParamMatch[1], 10);
    return {
      kind: "typeParameter",
      owner: "type",
      index,
      name: scope.typeParameters?.[index] ?? clrType,
    };
  }

  // Type parameters by name (method scope shadows type scope)
  const methodIndex = scope.methodTypeParameters?.indexOf(clrType) ?? -1;
  if (methodIndex >= 0) {
    return { kind: "typeParameter", owner: "method", index: methodIndex, name: clrType };
  }
  const typeIndex = scope.typeParameters?.indexOf(clrType) ?? -1;
  if (typeIndex >= 0) {
    return { kind: "typeParameter", owner: "type", index: typeIndex, name: clrType };
  }

  const alias = KEYWORD_ALIASES[clrType];
  if (alias) return alias.type;
  if (clrType === "dynamic") return { kind: "dynamic" };
  if (clrType === "nint") return { kind: "nativeInteger", unsigned: false };
  if (clrType === "nuint") return { kind: "nativeInteger", unsigned: true };

  // Generic instantiation: Name`N[[Arg1,Arg2]]
  const genericMatch = clrType.match(/^([A-Za-z_][\w.+]*)`(\d+)\[\[(.+)\]\]$/);
  if (genericMatch && genericMatch[1] && genericMatch[2] && genericMatch[3]) {
    const arity = parseInt(genericMatch[2], 10);
    const args = splitTypeArguments(genericMatch[3]);
    if (args.length !== arity) return undefined;
    const typeArguments: IlType[] = [];
    for (const arg of args) {
      const parsed = parseTypeString(arg, scope);
      if (!parsed) return undefined;
      typeArguments.push(parsed);
    }
    return { ...splitQualifiedName(genericMatch[1]), typeArguments };
  }

  if (/^[A-Za-z_][\w.+]*$/.test(clrType)) {
    return { ...splitQualifiedName(clrType), typeArguments: [] };
  }

  return undefined;
};

const splitQualifiedName = (
  qualifiedName: string
): { readonly kind: "named"; readonly namespace: string; readonly name: string } => {
  const lastDot = qualifiedName.lastIndexOf(".");
  return lastDot < 0
    ? { kind: "named", namespace: "", name: qualifiedName }
    : {
        kind: "named",
        namespace: qualifiedName.slice(0, lastDot),
        name: qualifiedName.slice(lastDot + 1),
      };
};

/**
 * Format a type in the notation parseTypeString reads.
 */
export const formatType = (type: IlType): string => {
  switch (type.kind) {
    case "named": {
      const qualified = type.namespace
        ? `${type.namespace}.${type.name}`
        : type.name;
      const args =
        type.typeArguments.length > 0
          ? `\`${type.typeArguments.length}[[${type.typeArguments.map(formatType).join(",")}]]`
          : "";
      return `${qualified}${args}${type.nullable ? "?" : ""}`;
    }

    case "typeParameter":
      return `${type.name}${type.nullable ? "?" : ""}`;

    case "array":
      return `${formatType(type.elementType)}[${",".repeat(type.rank - 1)}]${type.nullable ? "?" : ""}`;

    case "byReference":
      return `${formatType(type.elementType)}&`;

    case "tuple": {
      const elems = type.elementTypes
        .map((t, i) => {
          const name = type.elementNames?.[i];
          return name ? `${formatType(t)} ${name}` : formatType(t);
        })
        .join(", ");
      return `(${elems})`;
    }

    case "nativeInteger":
      return type.unsigned ? "nuint" : "nint";

    case "dynamic":
      return `dynamic${type.nullable ? "?" : ""}`;

    default: {
      const exhaustiveCheck: never = type;
      throw new Error(
        `ICE: Unhandled type kind: ${JSON.stringify(exhaustiveCheck)}`
      );
    }
  }
};
