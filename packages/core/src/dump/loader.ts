/**
 * Record dump loader
 *
 * Reads a YAML record dump and validates it into a record type definition
 * plus the normalized bodies of its methods.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import YAML from "yaml";
import type { NormalizedBody } from "../il/instructions.js";
import { selfTypeOf } from "../type-system/type-ops.js";
import type { BodyDecompiler } from "../type-system/type-system.js";
import type {
  FieldDefinition,
  MethodDefinition,
  PropertyDefinition,
  RecordTypeDefinition,
} from "../type-system/types.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { parseBody } from "./bodies.js";
import {
  parseField,
  parseMethod,
  parseProperty,
  parseRecordHeader,
} from "./members.js";
import {
  DumpError,
  type DumpObject,
  isDumpObject,
  optionalArray,
} from "./reader.js";
import type { DumpScope, RecordDump } from "./types.js";

const failure = (diagnostic: Diagnostic): Result<RecordDump, Diagnostic[]> => ({
  ok: false,
  error: [diagnostic],
});

const toDiagnostic = (err: DumpError, fileName: string): Diagnostic =>
  createDiagnostic(
    err.code,
    "error",
    err.message,
    { file: fileName, path: err.path },
    err.hint
  );

/**
 * Run `fn`, turning a DumpError into a diagnostic. Anything else propagates.
 */
const collect = <T>(
  diagnostics: Diagnostic[],
  fileName: string,
  fn: () => T
): T | undefined => {
  try {
    return fn();
  } catch (err) {
    if (err instanceof DumpError) {
      diagnostics.push(toDiagnostic(err, fileName));
      return undefined;
    }
    throw err;
  }
};

const duplicateDiagnostic = (
  fileName: string,
  memberPath: string,
  name: string
): Diagnostic =>
  createDiagnostic(
    "RLN9013",
    "error",
    `Duplicate member declaration: ${name}`,
    { file: fileName, path: memberPath }
  );

/**
 * Parse a record dump from YAML text. `fileName` only labels diagnostics.
 */
export const parseRecordDump = (
  text: string,
  fileName: string
): Result<RecordDump, Diagnostic[]> => {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (err) {
    return failure(
      createDiagnostic(
        "RLN9003",
        "error",
        `Invalid YAML in dump file: ${err instanceof Error ? err.message : String(err)}`,
        { file: fileName, path: "" }
      )
    );
  }

  if (!isDumpObject(parsed)) {
    return failure(
      createDiagnostic(
        "RLN9004",
        "error",
        `Dump document must be an object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`,
        { file: fileName, path: "" }
      )
    );
  }

  const root: DumpObject = parsed;
  const diagnostics: Diagnostic[] = [];
  const header = collect(diagnostics, fileName, () =>
    parseRecordHeader(root.record)
  );
  if (!header) {
    return { ok: false, error: diagnostics };
  }

  const scopeBase = {
    selfType: selfTypeOf({ ...header, fields: [], properties: [], methods: [] }),
    typeParameters: header.typeParameters,
  };

  const section = (key: string): readonly unknown[] =>
    collect(diagnostics, fileName, () =>
      optionalArray(root, key, "$", "RLN9004")
    ) ?? [];

  const fields: FieldDefinition[] = [];
  const fieldsByName = new Map<string, FieldDefinition>();
  section("fields").forEach((item, i) => {
    const field = collect(diagnostics, fileName, () => parseField(item, i, scopeBase));
    if (!field) return;
    if (fieldsByName.has(field.name)) {
      diagnostics.push(duplicateDiagnostic(fileName, `fields[${i}]`, field.name));
      return;
    }
    fieldsByName.set(field.name, field);
    fields.push(field);
  });

  const rawMethods = section("methods");
  const methods: MethodDefinition[] = [];
  const methodsByName = new Map<string, MethodDefinition[]>();
  const methodTokens = new Set<number>();
  const methodSources = new Map<MethodDefinition, number>();
  rawMethods.forEach((item, i) => {
    const method = collect(diagnostics, fileName, () => parseMethod(item, i, scopeBase));
    if (!method) return;
    if (methodTokens.has(method.token)) {
      diagnostics.push(
        duplicateDiagnostic(fileName, `methods[${i}].token`, `token 0x${method.token.toString(16)}`)
      );
      return;
    }
    methodTokens.add(method.token);
    methods.push(method);
    methodSources.set(method, i);
    methodsByName.set(method.name, [...(methodsByName.get(method.name) ?? []), method]);
  });

  const scope: DumpScope = {
    ...scopeBase,
    fields: fieldsByName,
    methods: methodsByName,
  };

  const properties: PropertyDefinition[] = [];
  const propertyNames = new Set<string>();
  section("properties").forEach((item, i) => {
    const property = collect(diagnostics, fileName, () => parseProperty(item, i, scope));
    if (!property) return;
    if (propertyNames.has(property.name)) {
      diagnostics.push(duplicateDiagnostic(fileName, `properties[${i}]`, property.name));
      return;
    }
    propertyNames.add(property.name);
    properties.push(property);
  });

  const bodies = new Map<number, NormalizedBody>();
  for (const [method, index] of methodSources) {
    const raw = rawMethods[index];
    if (!method.hasBody || !isDumpObject(raw)) continue;
    const body = collect(diagnostics, fileName, () =>
      parseBody(method, raw.body, `methods[${index}].body`, scope)
    );
    if (body) {
      bodies.set(method.token, body);
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  const record: RecordTypeDefinition = {
    ...header,
    fields,
    properties,
    methods,
  };
  return { ok: true, value: { fileName, record, bodies } };
};

/**
 * Load and validate a record dump file.
 */
export const loadRecordDump = (
  filePath: string
): Result<RecordDump, Diagnostic[]> => {
  const fileName = path.basename(filePath);

  if (!fs.existsSync(filePath)) {
    return failure(
      createDiagnostic("RLN9001", "error", `Dump file not found: ${filePath}`)
    );
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return failure(
      createDiagnostic(
        "RLN9002",
        "error",
        `Failed to read dump file: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }

  return parseRecordDump(content, fileName);
};

/**
 * Body decompiler answering from the dumped bodies.
 */
export const createDumpDecompiler =
  (dump: RecordDump): BodyDecompiler =>
  (method, context) => {
    context.signal?.throwIfAborted();
    return dump.bodies.get(method.token);
  };
