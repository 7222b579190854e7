/**
 * In-process record fixtures for classifier tests
 *
 * Builds the members of `record Point(int X, int Y)` and their bodies the way
 * the compiler emits them. Tests swap single bodies in `bodies` to perturb one
 * member at a time.
 */

import * as il from "../il/builders.js";
import type {
  ILInstruction,
  ILVariable,
  NormalizedBody,
} from "../il/instructions.js";
import { knownAttribute, knownType } from "../type-system/known-types.js";
import { createTypeSystem, type DecompilerTypeSystem } from "../type-system/type-system.js";
import type {
  FieldDefinition,
  FieldReference,
  IlNamedType,
  IlType,
  MethodDefinition,
  MethodReference,
  PropertyDefinition,
  RecordTypeDefinition,
} from "../type-system/types.js";
import { backingFieldName } from "../record/names.js";

export type RecordFixtureOptions = {
  readonly namespace?: string;
  readonly name?: string;
  readonly autoProperties?: readonly string[];
  /** Hand-declared int fields */
  readonly manualFields?: readonly string[];
  /** Hand-declared int properties whose getter computes a value */
  readonly computedProperties?: readonly string[];
  readonly baseType?: IlNamedType;
  readonly printSeparator?: string;
};

export type RecordFixture = {
  readonly record: RecordTypeDefinition;
  readonly selfType: IlNamedType;
  readonly bodies: Map<number, NormalizedBody>;
  readonly typeSystem: DecompilerTypeSystem;
  /** Number of bodies handed out so far */
  readonly decompileCount: () => number;
  /** `Equals(R? other)`, as opposed to `Equals(object? obj)` */
  readonly typedEquals: MethodDefinition;
  readonly method: (name: string, parameterCount?: number) => MethodDefinition;
  readonly property: (name: string) => PropertyDefinition;
  readonly field: (name: string) => FieldDefinition;
};

export const INT32 = knownType("Int32");
export const BOOLEAN = knownType("Boolean");
export const STRING = knownType("String");
export const OBJECT = knownType("Object");
export const TYPE = knownType("Type");
export const STRING_BUILDER = knownType("StringBuilder");
export const COMPILER_GENERATED = { attributeType: knownAttribute("CompilerGenerated") };

export const equalityComparerOf = (type: IlType): IlNamedType => ({
  kind: "named",
  namespace: "System.Collections.Generic",
  name: "EqualityComparer",
  typeArguments: [type],
});

export const appendMethod: MethodReference = {
  name: "Append",
  declaringType: STRING_BUILDER,
  isStatic: false,
};

export const append = (builder: ILVariable, value: ILInstruction): ILInstruction =>
  il.callvirt(appendMethod, il.ldloc(builder), value);

export const appendText = (builder: ILVariable, text: string): ILInstruction =>
  append(builder, il.ldstr(text));

export const referenceTo = (method: MethodDefinition): MethodReference => ({
  name: method.name,
  declaringType: method.declaringType,
  isStatic: method.isStatic,
  isOperator: method.isOperator,
  token: method.token,
});

export const fieldReference = (field: FieldDefinition): FieldReference => ({
  name: field.name,
  declaringType: field.declaringType,
  type: field.type,
  token: field.token,
});

export const body = (
  variables: readonly ILVariable[],
  ...instructions: ILInstruction[]
): NormalizedBody => ({ instructions, variables });

type MethodShape = Partial<Omit<MethodDefinition, "kind" | "name" | "token">>;

export const createRecordFixture = (
  options: RecordFixtureOptions = {}
): RecordFixture => {
  const {
    namespace = "Demo",
    name = "Point",
    autoProperties = ["X", "Y"],
    manualFields = [],
    computedProperties = [],
    baseType,
    printSeparator = ", ",
  } = options;

  const selfType: IlNamedType = {
    kind: "named",
    namespace,
    name,
    typeArguments: [],
  };
  const nullableSelf: IlNamedType = { ...selfType, nullable: true };

  let nextField = 0x04000001;
  let nextMethod = 0x06000001;
  let nextProperty = 0x17000001;

  const fields: FieldDefinition[] = [];
  const properties: PropertyDefinition[] = [];
  const methods: MethodDefinition[] = [];
  const bodies = new Map<number, NormalizedBody>();

  const addField = (fieldName: string, generated: boolean): FieldDefinition => {
    const field: FieldDefinition = {
      kind: "field",
      name: fieldName,
      token: nextField++,
      declaringType: selfType,
      isStatic: false,
      accessibility: generated ? "private" : "public",
      attributes: generated ? [COMPILER_GENERATED] : [],
      isExplicitInterfaceImplementation: false,
      type: INT32,
    };
    fields.push(field);
    return field;
  };

  const addMethod = (
    methodName: string,
    shape: MethodShape,
    methodBody?: (self: ILVariable | undefined, params: readonly ILVariable[]) => NormalizedBody
  ): MethodDefinition => {
    const method: MethodDefinition = {
      kind: "method",
      name: methodName,
      token: nextMethod++,
      declaringType: selfType,
      isStatic: false,
      accessibility: "public",
      attributes: [],
      isExplicitInterfaceImplementation: false,
      parameters: [],
      returnType: { kind: "named", namespace: "System", name: "Void", typeArguments: [] },
      returnTypeAttributes: [],
      isVirtual: false,
      isOverride: false,
      isSealed: false,
      isAbstract: false,
      isOperator: false,
      hasBody: methodBody !== undefined,
      ...shape,
    };
    methods.push(method);
    if (methodBody) {
      const self = method.isStatic ? undefined : il.thisParameter(selfType);
      const params = method.parameters.map((p, i) =>
        il.variable("parameter", i, p.name, p.type)
      );
      bodies.set(method.token, methodBody(self, params));
    }
    return method;
  };

  const addProperty = (
    propertyName: string,
    shape: Partial<Omit<PropertyDefinition, "kind" | "name" | "token">>
  ): PropertyDefinition => {
    const property: PropertyDefinition = {
      kind: "property",
      name: propertyName,
      token: nextProperty++,
      declaringType: selfType,
      isStatic: false,
      accessibility: "public",
      attributes: [],
      isExplicitInterfaceImplementation: false,
      type: INT32,
      parameters: [],
      isVirtual: false,
      isOverride: false,
      isSealed: false,
      ...shape,
    };
    properties.push(property);
    return property;
  };

  const variablesOf = (
    self: ILVariable | undefined,
    params: readonly ILVariable[]
  ): readonly ILVariable[] => (self ? [self, ...params] : params);

  // EqualityContract
  const contractGetter = addMethod(
    "get_EqualityContract",
    {
      accessibility: "protected",
      isVirtual: true,
      returnType: TYPE,
      attributes: [COMPILER_GENERATED],
    },
    (self, params) =>
      body(
        variablesOf(self, params),
        il.ret(
          il.call(
            { name: "GetTypeFromHandle", declaringType: TYPE, isStatic: true },
            il.ldTypeToken(selfType)
          )
        )
      )
  );
  addProperty("EqualityContract", {
    accessibility: "protected",
    isVirtual: true,
    type: TYPE,
    getter: contractGetter,
  });

  // Automatic properties
  const backing = new Map<string, FieldDefinition>();
  for (const propertyName of autoProperties) {
    backing.set(propertyName, addField(backingFieldName(propertyName), true));
  }
  for (const propertyName of autoProperties) {
    const field = backing.get(propertyName);
    if (!field) throw new Error(`fixture: no backing field for ${propertyName}`);
    const ref = fieldReference(field);
    const getter = addMethod(
      `get_${propertyName}`,
      { returnType: INT32, attributes: [COMPILER_GENERATED] },
      (self, params) =>
        body(
          variablesOf(self, params),
          il.ret(il.ldfld(il.ldloc(requireThis(self)), ref))
        )
    );
    const setter = addMethod(
      `set_${propertyName}`,
      {
        parameters: [{ name: "value", type: INT32 }],
        attributes: [COMPILER_GENERATED],
      },
      (self, params) =>
        body(
          variablesOf(self, params),
          il.stfld(il.ldloc(requireThis(self)), ref, il.ldloc(requireParam(params, 0))),
          il.ret()
        )
    );
    addProperty(propertyName, { getter, setter });
  }

  // Hand-written members
  const manual = manualFields.map((fieldName) => addField(fieldName, false));
  for (const propertyName of computedProperties) {
    const getter = addMethod(
      `get_${propertyName}`,
      { returnType: INT32 },
      (self, params) => body(variablesOf(self, params), il.ret(il.ldcI4(42)))
    );
    addProperty(propertyName, { getter });
  }

  const printed = properties.filter((p) => p.name !== "EqualityContract");

  // PrintMembers
  const printMembers = addMethod(
    "PrintMembers",
    {
      accessibility: "protected",
      isVirtual: baseType === undefined,
      isOverride: baseType !== undefined,
      returnType: BOOLEAN,
      parameters: [{ name: "builder", type: STRING_BUILDER }],
    },
    (self, params) => {
      const builder = requireParam(params, 0);
      const thisVar = requireThis(self);
      const instructions: ILInstruction[] = [];
      if (baseType) {
        instructions.push(
          il.ifInst(
            il.call(
              { name: "PrintMembers", declaringType: baseType, isStatic: false },
              il.ldloc(thisVar),
              il.ldloc(builder)
            ),
            il.block(appendText(builder, ", "))
          )
        );
      }
      printed.forEach((property, i) => {
        if (i > 0) instructions.push(appendText(builder, printSeparator));
        instructions.push(appendText(builder, property.name));
        instructions.push(appendText(builder, " = "));
        const { getter } = property;
        if (!getter) throw new Error(`fixture: ${property.name} has no getter`);
        instructions.push(
          append(
            builder,
            il.callvirt(
              { name: "ToString", declaringType: INT32, isStatic: false },
              il.addressOf(il.call(referenceTo(getter), il.ldloc(thisVar)), INT32)
            )
          )
        );
      });
      instructions.push(il.ret(il.ldcI4(printed.length > 0 ? 1 : 0)));
      return body(variablesOf(self, params), ...instructions);
    }
  );

  // ToString
  addMethod(
    "ToString",
    { isOverride: true, returnType: STRING },
    (self, params) => {
      const sb = il.variable("local", 0, "builder", STRING_BUILDER);
      const thisVar = requireThis(self);
      return body(
        [...variablesOf(self, params), sb],
        il.stloc(
          sb,
          il.newobj({ name: ".ctor", declaringType: STRING_BUILDER, isStatic: false })
        ),
        appendText(sb, name),
        appendText(sb, " { "),
        il.ifInst(
          il.callvirt(referenceTo(printMembers), il.ldloc(thisVar), il.ldloc(sb)),
          il.block(appendText(sb, " "))
        ),
        appendText(sb, "}"),
        il.ret(
          il.callvirt(
            { name: "ToString", declaringType: OBJECT, isStatic: false },
            il.ldloc(sb)
          )
        )
      );
    }
  );

  // Operators, Equals overloads, Clone
  for (const operator of ["op_Inequality", "op_Equality"]) {
    addMethod(operator, {
      isStatic: true,
      isOperator: true,
      returnType: BOOLEAN,
      parameters: [
        { name: "left", type: nullableSelf },
        { name: "right", type: nullableSelf },
      ],
    });
  }
  addMethod("Equals", {
    isOverride: true,
    returnType: BOOLEAN,
    parameters: [{ name: "obj", type: { ...OBJECT, nullable: true } }],
  });

  const compared = [
    ...autoProperties.flatMap((p) => {
      const field = backing.get(p);
      return field ? [field] : [];
    }),
    ...manual,
  ];
  const typedEquals = addMethod(
    "Equals",
    {
      isVirtual: true,
      returnType: BOOLEAN,
      parameters: [{ name: "other", type: nullableSelf }],
    },
    (self, params) => {
      const thisVar = requireThis(self);
      const other = requireParam(params, 0);
      const contract = (target: ILVariable): ILInstruction =>
        il.callvirt(referenceTo(contractGetter), il.ldloc(target));
      return body(
        variablesOf(self, params),
        il.ret(
          il.and(
            il.comp("!=", il.ldloc(other), il.ldnull()),
            il.call(
              { name: "op_Equality", declaringType: TYPE, isStatic: true, isOperator: true },
              contract(thisVar),
              contract(other)
            ),
            ...compared.map((field) => fieldComparison(field, thisVar, other))
          )
        )
      );
    }
  );
  addMethod("<Clone>$", { isVirtual: true, returnType: selfType });

  const record: RecordTypeDefinition = {
    namespace,
    name,
    typeParameters: [],
    baseType,
    interfaces: [],
    fields,
    properties,
    methods,
  };

  let count = 0;
  const typeSystem = createTypeSystem((method) => {
    count++;
    return bodies.get(method.token);
  });

  return {
    record,
    selfType,
    bodies,
    typeSystem,
    decompileCount: () => count,
    typedEquals,
    method: (methodName, parameterCount) => {
      const found = methods.find(
        (m) =>
          m.name === methodName &&
          (parameterCount === undefined || m.parameters.length === parameterCount)
      );
      if (!found) throw new Error(`fixture: no method ${methodName}`);
      return found;
    },
    property: (propertyName) => {
      const found = properties.find((p) => p.name === propertyName);
      if (!found) throw new Error(`fixture: no property ${propertyName}`);
      return found;
    },
    field: (fieldName) => {
      const found = fields.find((f) => f.name === fieldName);
      if (!found) throw new Error(`fixture: no field ${fieldName}`);
      return found;
    },
  };
};

/**
 * `EqualityComparer<int>.Default.Equals(this.field, other.field)`
 */
export const fieldComparison = (
  field: FieldDefinition,
  self: ILVariable,
  other: ILVariable
): ILInstruction => {
  const comparer = equalityComparerOf(field.type);
  const ref = fieldReference(field);
  return il.callvirt(
    { name: "Equals", declaringType: comparer, isStatic: false },
    il.call({ name: "get_Default", declaringType: comparer, isStatic: true }),
    il.ldfld(il.ldloc(self), ref),
    il.ldfld(il.ldloc(other), ref)
  );
};

const requireThis = (self: ILVariable | undefined): ILVariable => {
  if (!self) throw new Error("fixture: static method has no this");
  return self;
};

const requireParam = (params: readonly ILVariable[], index: number): ILVariable => {
  const param = params[index];
  if (!param) throw new Error(`fixture: no parameter ${index}`);
  return param;
};

/**
 * Replace the instructions of one fixture body.
 */
export const editBody = (
  fixture: RecordFixture,
  method: MethodDefinition,
  edit: (instructions: readonly ILInstruction[]) => readonly ILInstruction[]
): void => {
  const current = fixture.bodies.get(method.token);
  if (!current) throw new Error(`fixture: ${method.name} has no body`);
  fixture.bodies.set(method.token, {
    ...current,
    instructions: edit(current.instructions),
  });
};

export const bodyVariable = (
  fixture: RecordFixture,
  method: MethodDefinition,
  variableName: string
): ILVariable => {
  const found = fixture.bodies
    .get(method.token)
    ?.variables.find((v) => v.name === variableName);
  if (!found) throw new Error(`fixture: ${method.name} has no ${variableName}`);
  return found;
};
