/**
 * Method body reader
 *
 * Instructions are written as `{ op, ...operands }`; operand-free ops may be
 * bare strings (`nop`, `ldnull`, `ldthis`).
 *
 *   - op: stloc
 *     var: sb
 *     value: { op: newobj, method: "System.Text.StringBuilder::.ctor" }
 *   - { op: leave, value: { op: ldfld, field: "<X>k__BackingField", target: ldthis } }
 *
 * Method references are the name of a method of the record, or
 * `[static ]Type::Name` for any other method.
 */

import * as b from "../il/builders.js";
import type {
  ComparisonOperator,
  ILInstruction,
  ILVariable,
  NormalizedBody,
} from "../il/instructions.js";
import type {
  FieldReference,
  MethodDefinition,
  MethodReference,
} from "../type-system/types.js";
import { resolveMethodByName, parseDumpType } from "./members.js";
import {
  DumpError,
  type DumpObject,
  expectObject,
  isDumpObject,
  optionalArray,
  optionalString,
  requireString,
} from "./reader.js";
import type { DumpScope } from "./types.js";

type BodyContext = {
  readonly scope: DumpScope;
  readonly variables: ReadonlyMap<string, ILVariable>;
};

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = [
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
];

const isComparisonOperator = (value: unknown): value is ComparisonOperator =>
  COMPARISON_OPERATORS.some((op) => op === value);

const invalid = (path: string, message: string): DumpError =>
  new DumpError("RLN9012", path, message);

export const parseMethodReference = (
  text: string,
  path: string,
  scope: DumpScope
): MethodReference => {
  const separator = text.lastIndexOf("::");
  if (separator < 0) {
    const method = resolveMethodByName(text, path, scope.methods);
    return {
      name: method.name,
      declaringType: method.declaringType,
      isStatic: method.isStatic,
      isOperator: method.isOperator,
      token: method.token,
    };
  }

  const staticPrefix = "static ";
  const isStatic = text.startsWith(staticPrefix);
  const typeText = text.slice(isStatic ? staticPrefix.length : 0, separator);
  const name = text.slice(separator + 2);
  if (name.length === 0) {
    throw invalid(path, `Missing method name in reference: ${text}`);
  }
  const isOperator = name.startsWith("op_");
  return {
    name,
    declaringType: parseDumpType(typeText, path, scope.typeParameters),
    isStatic: isStatic || isOperator,
    isOperator,
  };
};

/**
 * A field of the record by name, or `{ declaringType, name, type }` for any
 * other field.
 */
const parseFieldReference = (
  value: unknown,
  path: string,
  scope: DumpScope
): FieldReference => {
  if (typeof value === "string") {
    const field = scope.fields.get(value);
    if (!field) {
      throw new DumpError("RLN9010", path, `Unknown field: ${value}`);
    }
    return {
      name: field.name,
      declaringType: field.declaringType,
      type: field.type,
      token: field.token,
    };
  }
  const obj = expectObject(value, path, "RLN9012", "Field reference");
  return {
    name: requireString(obj, "name", path, "RLN9012"),
    declaringType: parseDumpType(
      requireString(obj, "declaringType", path, "RLN9012"),
      `${path}.declaringType`,
      scope.typeParameters
    ),
    type: parseDumpType(
      requireString(obj, "type", path, "RLN9012"),
      `${path}.type`,
      scope.typeParameters
    ),
  };
};

const lookupVariable = (
  name: string,
  path: string,
  context: BodyContext
): ILVariable => {
  const found = context.variables.get(name);
  if (!found) {
    throw new DumpError(
      "RLN9011",
      path,
      `Unknown variable: ${name}`,
      `Declared here: ${[...context.variables.keys()].join(", ")}`
    );
  }
  return found;
};

const operand = (
  obj: DumpObject,
  key: string,
  path: string,
  context: BodyContext
): ILInstruction => {
  if (obj[key] === undefined) {
    throw invalid(`${path}.${key}`, `Missing operand '${key}'`);
  }
  return parseInstruction(obj[key], `${path}.${key}`, context);
};

const operandList = (
  obj: DumpObject,
  key: string,
  path: string,
  context: BodyContext
): readonly ILInstruction[] =>
  optionalArray(obj, key, path, "RLN9012").map((item, i) =>
    parseInstruction(item, `${path}.${key}[${i}]`, context)
  );

const parseBareInstruction = (
  op: string,
  path: string,
  context: BodyContext
): ILInstruction => {
  switch (op) {
    case "nop":
      return b.nop();
    case "ldnull":
      return b.ldnull();
    case "ldthis":
      return b.ldloc(lookupVariable("this", path, context));
    default:
      throw invalid(path, `Instruction '${op}' needs operands`);
  }
};

export const parseInstruction = (
  value: unknown,
  path: string,
  context: BodyContext
): ILInstruction => {
  if (typeof value === "string") {
    return parseBareInstruction(value, path, context);
  }
  if (!isDumpObject(value)) {
    throw invalid(path, "Instruction must be an object or an op name");
  }
  const op = requireString(value, "op", path, "RLN9012");
  const { scope } = context;

  switch (op) {
    case "nop":
    case "ldnull":
    case "ldthis":
      return parseBareInstruction(op, path, context);

    case "leave": {
      const container = optionalString(value, "container", path, "RLN9012") ?? "body";
      if (container !== "body" && container !== "nested") {
        throw invalid(`${path}.container`, `Invalid container: ${container}`);
      }
      const result =
        value.value === undefined ? b.nop() : operand(value, "value", path, context);
      return b.leave(container, result);
    }

    case "block":
      return b.block(...operandList(value, "instructions", path, context));

    case "if":
      return b.ifInst(
        operand(value, "condition", path, context),
        operand(value, "then", path, context),
        value.else === undefined ? b.nop() : operand(value, "else", path, context)
      );

    case "call":
    case "callvirt":
    case "newobj": {
      const method = parseMethodReference(
        requireString(value, "method", path, "RLN9012"),
        `${path}.method`,
        scope
      );
      const args = operandList(value, "args", path, context);
      return op === "call"
        ? b.call(method, ...args)
        : op === "callvirt"
          ? b.callvirt(method, ...args)
          : b.newobj(method, ...args);
    }

    case "ldfld":
    case "ldflda": {
      const field = parseFieldReference(value.field, `${path}.field`, scope);
      const target = operand(value, "target", path, context);
      return op === "ldfld" ? b.ldfld(target, field) : b.ldflda(target, field);
    }

    case "ldsfld":
      return b.ldsfld(parseFieldReference(value.field, `${path}.field`, scope));

    case "stfld":
      return b.stfld(
        operand(value, "target", path, context),
        parseFieldReference(value.field, `${path}.field`, scope),
        operand(value, "value", path, context)
      );

    case "stsfld":
      return b.stsfld(
        parseFieldReference(value.field, `${path}.field`, scope),
        operand(value, "value", path, context)
      );

    case "ldloc":
      return b.ldloc(
        lookupVariable(requireString(value, "var", path, "RLN9012"), `${path}.var`, context)
      );

    case "stloc":
      return b.stloc(
        lookupVariable(requireString(value, "var", path, "RLN9012"), `${path}.var`, context),
        operand(value, "value", path, context)
      );

    case "logic.and": {
      const [first, ...rest] = operandList(value, "operands", path, context);
      if (!first || rest.length === 0) {
        throw invalid(`${path}.operands`, "logic.and needs at least two operands");
      }
      return b.and(first, ...rest);
    }

    case "comp": {
      const operator = value.operator;
      if (!isComparisonOperator(operator)) {
        throw invalid(
          `${path}.operator`,
          `Invalid comparison operator: ${JSON.stringify(operator)}`
        );
      }
      return b.comp(
        operator,
        operand(value, "left", path, context),
        operand(value, "right", path, context)
      );
    }

    case "ldstr": {
      if (typeof value.value !== "string") {
        throw invalid(`${path}.value`, "ldstr needs a string 'value'");
      }
      return b.ldstr(value.value);
    }

    case "ldc.i4": {
      if (typeof value.value !== "number" || !Number.isInteger(value.value)) {
        throw invalid(`${path}.value`, "ldc.i4 needs an integer 'value'");
      }
      return b.ldcI4(value.value);
    }

    case "addressof":
      return b.addressOf(
        operand(value, "value", path, context),
        parseDumpType(
          requireString(value, "type", path, "RLN9012"),
          `${path}.type`,
          scope.typeParameters
        )
      );

    case "ldtypetoken":
      return b.ldTypeToken(
        parseDumpType(
          requireString(value, "type", path, "RLN9012"),
          `${path}.type`,
          scope.typeParameters
        )
      );

    default:
      throw invalid(`${path}.op`, `Unknown instruction: ${op}`);
  }
};

/**
 * Variables of a method: `this` (instance methods), its parameters, then the
 * body's `locals`.
 */
const declareVariables = (
  method: MethodDefinition,
  body: DumpObject,
  path: string,
  scope: DumpScope
): ReadonlyMap<string, ILVariable> => {
  const variables = new Map<string, ILVariable>();
  const declare = (v: ILVariable, declPath: string): void => {
    if (variables.has(v.name)) {
      throw new DumpError("RLN9013", declPath, `Duplicate variable: ${v.name}`);
    }
    variables.set(v.name, v);
  };

  if (!method.isStatic) {
    declare(b.thisParameter(scope.selfType), path);
  }
  method.parameters.forEach((p, i) =>
    declare(b.variable("parameter", i, p.name, p.type), `${path}.parameters[${i}]`)
  );
  optionalArray(body, "locals", path, "RLN9014").forEach((item, i) => {
    const localPath = `${path}.locals[${i}]`;
    const local = expectObject(item, localPath, "RLN9014", "Local");
    declare(
      b.variable(
        "local",
        i,
        requireString(local, "name", localPath, "RLN9014"),
        parseDumpType(
          requireString(local, "type", localPath, "RLN9014"),
          `${localPath}.type`,
          scope.typeParameters
        )
      ),
      localPath
    );
  });
  return variables;
};

export const parseBody = (
  method: MethodDefinition,
  value: unknown,
  path: string,
  scope: DumpScope
): NormalizedBody => {
  const body = expectObject(value, path, "RLN9014", "Method body");
  const variables = declareVariables(method, body, path, scope);
  const context: BodyContext = { scope, variables };
  const instructions = optionalArray(body, "instructions", path, "RLN9014").map(
    (item, i) => parseInstruction(item, `${path}.instructions[${i}]`, context)
  );
  if (instructions.length === 0) {
    throw new DumpError("RLN9014", `${path}.instructions`, "Method body has no instructions");
  }
  return { instructions, variables: [...variables.values()] };
};
