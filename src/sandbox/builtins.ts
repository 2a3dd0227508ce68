import { isPlainRecord } from "../utils";
import {
  expectNumber,
  isCallable,
  isList,
  Namespace,
  NativeFunction,
  numericCell,
  SandboxError,
  stringify,
  type Closure,
  type NativeImplementation
} from "./values";

export type Invoke = (fn: Closure | NativeFunction, args: unknown[]) => unknown;

const MAX_RANGE_LENGTH = 100_000;

function native(name: string, implementation: NativeImplementation): NativeFunction {
  return new NativeFunction(name, implementation);
}

function expectList(value: unknown, fn: string): readonly unknown[] {
  if (!isList(value)) {
    throw new SandboxError("runtime", `${fn}() expects an array`);
  }
  return value;
}

function numbers(value: unknown, fn: string): number[] {
  const result: number[] = [];
  for (const item of expectList(value, fn)) {
    const numeric = numericCell(item, fn);
    if (numeric !== null) {
      result.push(numeric);
    }
  }
  return result;
}

/** Accepts either one array argument or a list of scalar arguments. */
function spreadNumbers(args: unknown[], fn: string): number[] {
  return args.length === 1 && isList(args[0]) ? numbers(args[0], fn) : numbers(args, fn);
}

function readCell(row: unknown, key: string): unknown {
  if (isPlainRecord(row) && Object.prototype.hasOwnProperty.call(row, key)) {
    return row[key];
  }
  return null;
}

function median(values: number[]): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function range(args: unknown[]): number[] {
  const [first, second, third] = args;
  const start = second === undefined ? 0 : expectNumber(first, "range()");
  const end = second === undefined ? expectNumber(first, "range()") : expectNumber(second, "range()");
  const step = third === undefined ? 1 : expectNumber(third, "range()");
  if (step === 0) {
    throw new SandboxError("runtime", "range() step must not be zero");
  }
  const values: number[] = [];
  for (let value = start; step > 0 ? value < end : value > end; value += step) {
    if (values.length >= MAX_RANGE_LENGTH) {
      throw new SandboxError("budget", `range() is limited to ${MAX_RANGE_LENGTH} values`);
    }
    values.push(value);
  }
  return values;
}

function ownEntries(value: unknown, fn: string): Array<[string, unknown]> {
  if (!isPlainRecord(value)) {
    throw new SandboxError("runtime", `${fn}() expects a plain object`);
  }
  return Object.entries(value);
}

/** Global bindings visible to every snippet. */
export function createGlobals(invoke: Invoke): Map<string, unknown> {
  const mathMembers = new Map<string, NativeFunction>([
    ["abs", native("abs", ([x]) => Math.abs(expectNumber(x, "Math.abs()")))],
    ["round", native("round", ([x]) => Math.round(expectNumber(x, "Math.round()")))],
    ["floor", native("floor", ([x]) => Math.floor(expectNumber(x, "Math.floor()")))],
    ["ceil", native("ceil", ([x]) => Math.ceil(expectNumber(x, "Math.ceil()")))],
    ["sqrt", native("sqrt", ([x]) => Math.sqrt(expectNumber(x, "Math.sqrt()")))],
    ["log", native("log", ([x]) => Math.log(expectNumber(x, "Math.log()")))],
    ["pow", native("pow", ([x, y]) => expectNumber(x, "Math.pow()") ** expectNumber(y, "Math.pow()"))],
    ["min", native("min", (args) => Math.min(...spreadNumbers(args, "Math.min")))],
    ["max", native("max", (args) => Math.max(...spreadNumbers(args, "Math.max")))]
  ]);

  const objectMembers = new Map<string, NativeFunction>([
    ["keys", native("keys", ([value]) => ownEntries(value, "Object.keys").map(([key]) => key))],
    ["values", native("values", ([value]) => ownEntries(value, "Object.values").map(([, item]) => item))],
    ["entries", native("entries", ([value]) => ownEntries(value, "Object.entries").map(([key, item]) => [key, item]))]
  ]);

  const arrayMembers = new Map<string, NativeFunction>([["isArray", native("isArray", ([value]) => isList(value))]]);

  return new Map<string, unknown>([
    ["Math", new Namespace("Math", mathMembers)],
    ["Object", new Namespace("Object", objectMembers)],
    ["Array", new Namespace("Array", arrayMembers)],
    ["Number", native("Number", ([value]) => (typeof value === "string" ? Number(value.replace(/,/g, "")) : Number(value)))],
    ["String", native("String", ([value]) => stringify(value))],
    ["Boolean", native("Boolean", ([value]) => Boolean(value))],
    ["parseFloat", native("parseFloat", ([value]) => Number.parseFloat(stringify(value)))],
    ["parseInt", native("parseInt", ([value]) => Number.parseInt(stringify(value), 10))],
    ["isNaN", native("isNaN", ([value]) => typeof value === "number" && Number.isNaN(value))],
    [
      "len",
      native("len", ([value]) => {
        if (isList(value) || typeof value === "string") return value.length;
        if (isPlainRecord(value)) return Object.keys(value).length;
        throw new SandboxError("runtime", "len() expects an array, string or object");
      })
    ],
    ["sum", native("sum", ([value]) => numbers(value, "sum").reduce((total, item) => total + item, 0))],
    [
      "mean",
      native("mean", ([value]) => {
        const values = numbers(value, "mean");
        return values.length === 0 ? Number.NaN : values.reduce((total, item) => total + item, 0) / values.length;
      })
    ],
    ["median", native("median", ([value]) => median(numbers(value, "median")))],
    ["min", native("min", (args) => Math.min(...spreadNumbers(args, "min")))],
    ["max", native("max", (args) => Math.max(...spreadNumbers(args, "max")))],
    [
      "round",
      native("round", ([value, digits]) =>
        roundTo(expectNumber(value, "round()"), digits === undefined ? 0 : expectNumber(digits, "round()"))
      )
    ],
    ["range", native("range", range)],
    [
      "zip",
      native("zip", (args) => {
        const lists = args.map((arg) => expectList(arg, "zip"));
        const length = lists.length === 0 ? 0 : Math.min(...lists.map((list) => list.length));
        return Array.from({ length }, (_, index) => lists.map((list) => list[index]));
      })
    ],
    [
      "column",
      native("column", ([rows, name]) => {
        if (typeof name !== "string") {
          throw new SandboxError("runtime", "column() expects a column name");
        }
        return expectList(rows, "column").map((row) => readCell(row, name));
      })
    ],
    [
      "countBy",
      native("countBy", ([rows, key]) => {
        const counts = new Map<string, number>();
        for (const row of expectList(rows, "countBy")) {
          let group: unknown;
          if (typeof key === "string") {
            group = readCell(row, key);
          } else if (isCallable(key)) {
            group = invoke(key, [row]);
          } else {
            throw new SandboxError("runtime", "countBy() expects a column name or a function");
          }
          const label = stringify(group);
          counts.set(label, (counts.get(label) ?? 0) + 1);
        }
        return Object.fromEntries(counts);
      })
    ]
  ]);
}
