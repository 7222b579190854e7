/**
 * Type and member model for compiled record types
 */

export type IlType =
  | IlNamedType
  | IlTypeParameterType
  | IlArrayType
  | IlByReferenceType
  | IlTupleType
  | IlNativeIntegerType
  | IlDynamicType;

/**
 * Class, struct, interface or enum, possibly instantiated.
 *
 * `name` never carries the generic arity suffix: `List`1[[T]]` is
 * `{ namespace: "System.Collections.Generic", name: "List", typeArguments: [T] }`.
 */
export type IlNamedType = {
  readonly kind: "named";
  readonly namespace: string;
  readonly name: string;
  readonly typeArguments: readonly IlType[];
  /** Reference-type nullability annotation (`string?`) */
  readonly nullable?: boolean;
};

/**
 * Type parameter, identified by position (`!0` on the type, `!!0` on a method).
 */
export type IlTypeParameterType = {
  readonly kind: "typeParameter";
  readonly owner: "type" | "method";
  readonly index: number;
  readonly name: string;
  readonly nullable?: boolean;
};

export type IlArrayType = {
  readonly kind: "array";
  readonly elementType: IlType;
  readonly rank: number;
  readonly nullable?: boolean;
};

export type IlByReferenceType = {
  readonly kind: "byReference";
  readonly elementType: IlType;
};

/**
 * C# tuple syntax; erases to System.ValueTuple`N.
 */
export type IlTupleType = {
  readonly kind: "tuple";
  readonly elementTypes: readonly IlType[];
  readonly elementNames?: readonly (string | undefined)[];
};

/**
 * `nint` / `nuint`; erase to System.IntPtr / System.UIntPtr.
 */
export type IlNativeIntegerType = {
  readonly kind: "nativeInteger";
  readonly unsigned: boolean;
};

/**
 * C# `dynamic`; erases to System.Object.
 */
export type IlDynamicType = {
  readonly kind: "dynamic";
  readonly nullable?: boolean;
};

export type Accessibility =
  | "private"
  | "privateProtected"
  | "protected"
  | "internal"
  | "protectedInternal"
  | "public";

export type AttributeReference = {
  readonly attributeType: IlType;
};

type MemberBase = {
  readonly name: string;
  /** Metadata token; 0 is a nil handle */
  readonly token: number;
  readonly declaringType: IlNamedType;
  readonly isStatic: boolean;
  readonly accessibility: Accessibility;
  readonly attributes: readonly AttributeReference[];
  readonly isExplicitInterfaceImplementation: boolean;
};

export type FieldDefinition = MemberBase & {
  readonly kind: "field";
  readonly type: IlType;
};

export type ParameterDefinition = {
  readonly name: string;
  readonly type: IlType;
};

export type MethodDefinition = MemberBase & {
  readonly kind: "method";
  readonly parameters: readonly ParameterDefinition[];
  readonly returnType: IlType;
  readonly returnTypeAttributes: readonly AttributeReference[];
  readonly isVirtual: boolean;
  readonly isOverride: boolean;
  readonly isSealed: boolean;
  readonly isAbstract: boolean;
  readonly isOperator: boolean;
  /** False for abstract and extern methods */
  readonly hasBody: boolean;
};

export type PropertyDefinition = MemberBase & {
  readonly kind: "property";
  readonly type: IlType;
  /** Indexer parameters; empty for ordinary properties */
  readonly parameters: readonly ParameterDefinition[];
  readonly getter?: MethodDefinition;
  readonly setter?: MethodDefinition;
  readonly isVirtual: boolean;
  readonly isOverride: boolean;
  readonly isSealed: boolean;
};

export type MemberDefinition =
  | FieldDefinition
  | MethodDefinition
  | PropertyDefinition;

/**
 * Fields and properties, the members generated record methods walk over.
 */
export type RecordMember = FieldDefinition | PropertyDefinition;

export type RecordTypeDefinition = {
  readonly namespace: string;
  readonly name: string;
  readonly typeParameters: readonly string[];
  /** Direct class base; absent (or System.Object) for a root record */
  readonly baseType?: IlNamedType;
  readonly interfaces: readonly IlNamedType[];
  readonly fields: readonly FieldDefinition[];
  readonly properties: readonly PropertyDefinition[];
  readonly methods: readonly MethodDefinition[];
};

/**
 * A method as seen from a call site inside a body.
 *
 * `token` is set when the target is defined in the analysed module, so that
 * call sites can be compared with member definitions.
 */
export type MethodReference = {
  readonly name: string;
  readonly declaringType: IlType;
  readonly isStatic: boolean;
  readonly isOperator?: boolean;
  readonly token?: number;
};

/**
 * A field as seen from a load or store inside a body.
 */
export type FieldReference = {
  readonly name: string;
  readonly declaringType: IlType;
  readonly type: IlType;
  readonly token?: number;
};
