/**
 * Typed access to untyped dump documents
 *
 * Readers throw DumpError on the first problem in a node; the loader catches
 * it per member and turns it into a diagnostic.
 */

import type { DiagnosticCode } from "../types/diagnostic.js";
import type { Accessibility } from "../type-system/types.js";

export type DumpObject = Readonly<Record<string, unknown>>;

export class DumpError extends Error {
  constructor(
    readonly code: DiagnosticCode,
    readonly path: string,
    message: string,
    readonly hint?: string
  ) {
    super(message);
    this.name = "DumpError";
  }
}

export const isDumpObject = (value: unknown): value is DumpObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const expectObject = (
  value: unknown,
  path: string,
  code: DiagnosticCode,
  what: string
): DumpObject => {
  if (!isDumpObject(value)) {
    throw new DumpError(code, path, `${what} must be an object`);
  }
  return value;
};

export const requireString = (
  obj: DumpObject,
  key: string,
  path: string,
  code: DiagnosticCode
): string => {
  const value = obj[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new DumpError(
      code,
      `${path}.${key}`,
      `'${key}' must be a non-empty string`
    );
  }
  return value;
};

export const optionalString = (
  obj: DumpObject,
  key: string,
  path: string,
  code: DiagnosticCode
): string | undefined =>
  obj[key] === undefined || obj[key] === null
    ? undefined
    : requireString(obj, key, path, code);

export const optionalBoolean = (
  obj: DumpObject,
  key: string,
  path: string,
  code: DiagnosticCode
): boolean => {
  const value = obj[key];
  if (value === undefined || value === null) return false;
  if (typeof value !== "boolean") {
    throw new DumpError(code, `${path}.${key}`, `'${key}' must be a boolean`);
  }
  return value;
};

export const optionalInteger = (
  obj: DumpObject,
  key: string,
  path: string,
  code: DiagnosticCode
): number | undefined => {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new DumpError(code, `${path}.${key}`, `'${key}' must be an integer`);
  }
  return value;
};

export const optionalArray = (
  obj: DumpObject,
  key: string,
  path: string,
  code: DiagnosticCode
): readonly unknown[] => {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new DumpError(code, `${path}.${key}`, `'${key}' must be a list`);
  }
  return value;
};

export const optionalStringArray = (
  obj: DumpObject,
  key: string,
  path: string,
  code: DiagnosticCode
): readonly string[] =>
  optionalArray(obj, key, path, code).map((item, i) => {
    if (typeof item !== "string") {
      throw new DumpError(
        code,
        `${path}.${key}[${i}]`,
        `'${key}' must contain strings. Got: ${JSON.stringify(item)}`
      );
    }
    return item;
  });

const ACCESSIBILITIES: readonly Accessibility[] = [
  "private",
  "privateProtected",
  "protected",
  "internal",
  "protectedInternal",
  "public",
];

const isAccessibility = (value: unknown): value is Accessibility =>
  ACCESSIBILITIES.some((a) => a === value);

export const optionalAccessibility = (
  obj: DumpObject,
  path: string,
  code: DiagnosticCode,
  fallback: Accessibility
): Accessibility => {
  const value = obj.accessibility;
  if (value === undefined || value === null) return fallback;
  if (!isAccessibility(value)) {
    throw new DumpError(
      code,
      `${path}.accessibility`,
      `Invalid accessibility: ${JSON.stringify(value)}`,
      `Expected one of ${ACCESSIBILITIES.join(", ")}`
    );
  }
  return value;
};
