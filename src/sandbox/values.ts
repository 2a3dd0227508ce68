import type * as ts from "typescript";
import { isPlainRecord } from "../utils";

export type SandboxErrorKind = "syntax" | "forbidden" | "runtime" | "budget";

export class SandboxError extends Error {
  constructor(
    readonly kind: SandboxErrorKind,
    message: string
  ) {
    super(message);
    this.name = "SandboxError";
  }
}

/** Largest array length or string length a snippet may build. */
export const MAX_VALUE_SIZE = 1_000_000;

export function checkArrayLength(length: number): void {
  if (length > MAX_VALUE_SIZE) {
    throw new SandboxError("budget", `Array length exceeds the limit of ${MAX_VALUE_SIZE} elements`);
  }
}

export function checkStringLength(length: number): void {
  if (length > MAX_VALUE_SIZE) {
    throw new SandboxError("budget", `String length exceeds the limit of ${MAX_VALUE_SIZE} characters`);
  }
}

export type NativeImplementation = (args: unknown[]) => unknown;

export class NativeFunction {
  constructor(
    readonly name: string,
    readonly implementation: NativeImplementation
  ) {}
}

export class Namespace {
  constructor(
    readonly name: string,
    readonly members: ReadonlyMap<string, NativeFunction>
  ) {}
}

interface Binding {
  value: unknown;
  constant: boolean;
}

export class Scope {
  private readonly bindings = new Map<string, Binding>();

  constructor(readonly parent: Scope | null) {}

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  declare(name: string, value: unknown, constant: boolean): void {
    if (this.bindings.has(name)) {
      throw new SandboxError("runtime", `Identifier '${name}' has already been declared`);
    }
    this.bindings.set(name, { value, constant });
  }

  lookup(name: string): Binding | undefined {
    return this.bindings.get(name) ?? this.parent?.lookup(name);
  }

  /** Returns false when no scope in the chain declares `name`. */
  assign(name: string, value: unknown): boolean {
    const binding = this.bindings.get(name);
    if (binding) {
      if (binding.constant) {
        throw new SandboxError("runtime", `Assignment to constant variable '${name}'`);
      }
      binding.value = value;
      return true;
    }
    return this.parent ? this.parent.assign(name, value) : false;
  }
}

export class Closure {
  constructor(
    readonly parameters: readonly ts.ParameterDeclaration[],
    readonly body: ts.ConciseBody,
    readonly scope: Scope
  ) {}
}

export function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

export function isCallable(value: unknown): value is Closure | NativeFunction {
  return value instanceof Closure || value instanceof NativeFunction;
}

export function stringify(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isList(value)) return joinList(value, ",");
  if (isCallable(value)) return "[function]";
  if (isPlainRecord(value)) return "[object Object]";
  return "[value]";
}

/** Coerces a cell to a number the way aggregations expect; `null` means "skip". */
export function numericCell(value: unknown, fn: string): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isNaN(value) ? null : value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return null;
    const parsed = Number(trimmed.replace(/,/g, ""));
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new SandboxError("runtime", `${fn}() expects numeric values, received ${stringify(value)}`);
}

export function expectNumber(value: unknown, context: string): number {
  if (typeof value !== "number") {
    throw new SandboxError("runtime", `${context} expects a number, received ${describeType(value)}`);
  }
  return value;
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (isList(value)) return "array";
  if (isCallable(value)) return "function";
  if (value instanceof Namespace) return value.name;
  return typeof value;
}

/** Joins list items the way Array#join does, stopping once the text grows past the size limit. */
export function joinList(list: readonly unknown[], separator: string): string {
  const parts: string[] = [];
  let length = 0;
  for (const item of list) {
    const part = item === null || item === undefined ? "" : stringify(item);
    length += part.length + (parts.length > 0 ? separator.length : 0);
    checkStringLength(length);
    parts.push(part);
  }
  return parts.join(separator);
}
