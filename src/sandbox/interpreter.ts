import * as ts from "typescript";
import { isPlainRecord } from "../utils";
import { createGlobals } from "./builtins";
import {
  checkArrayLength,
  checkStringLength,
  Closure,
  describeType,
  expectNumber,
  isCallable,
  isList,
  joinList,
  Namespace,
  NativeFunction,
  SandboxError,
  Scope,
  stringify
} from "./values";

export const DEFAULT_STEP_BUDGET = 5_000_000;
const MAX_CALL_DEPTH = 200;

const BLOCKED_PROPERTIES = new Set([
  "__proto__",
  "constructor",
  "prototype",
  "__defineGetter__",
  "__defineSetter__",
  "__lookupGetter__",
  "__lookupSetter__"
]);

export interface SandboxOptions {
  /** Names bound as read-only inputs before the snippet runs. */
  inputs?: Record<string, unknown>;
  /** Variable read back once the snippet completes. */
  output?: string;
  stepBudget?: number;
}

export type SandboxOutcome =
  | { ok: true; value: unknown; defined: boolean }
  | { ok: false; kind: SandboxError["kind"]; error: string };

type Completion =
  | { type: "normal" }
  | { type: "break" }
  | { type: "continue" }
  | { type: "return"; value: unknown };

const NORMAL: Completion = { type: "normal" };

/**
 * Parses the snippet and reports the first syntax error, or null when it parses.
 */
export function checkSyntax(code: string): string | null {
  const output = ts.transpileModule(code, { fileName: "snippet.ts", reportDiagnostics: true });
  const diagnostic = output.diagnostics?.find((entry) => entry.category === ts.DiagnosticCategory.Error);
  if (!diagnostic) {
    return null;
  }
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `line ${line + 1}, column ${character + 1}: ${message}`;
  }
  return message;
}

/**
 * Runs an untrusted snippet over an allow-listed subset of the language. Only
 * the nodes handled below are evaluated; anything else is rejected before it
 * can touch host objects.
 */
export function runSandboxed(code: string, options: SandboxOptions = {}): SandboxOutcome {
  const syntaxError = checkSyntax(code);
  if (syntaxError) {
    return { ok: false, kind: "syntax", error: `Syntax error at ${syntaxError}` };
  }

  const source = ts.createSourceFile("snippet.ts", code, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
  const interpreter = new Interpreter(options.stepBudget ?? DEFAULT_STEP_BUDGET);
  const globals = interpreter.createProgramScope(options.inputs ?? {});

  try {
    interpreter.runProgram(source, globals);
  } catch (error) {
    if (error instanceof SandboxError) {
      return { ok: false, kind: error.kind, error: error.message };
    }
    if (error instanceof RangeError) {
      return { ok: false, kind: "budget", error: `Execution aborted: ${error.message}` };
    }
    return { ok: false, kind: "runtime", error: error instanceof Error ? error.message : String(error) };
  }

  const outputName = options.output ?? "result";
  const defined = globals.has(outputName);
  return { ok: true, value: defined ? globals.lookup(outputName)?.value : undefined, defined };
}

class Interpreter {
  private steps = 0;

  private callDepth = 0;

  private readonly root: Scope;

  constructor(private readonly stepBudget: number) {
    this.root = new Scope(null);
    for (const [name, value] of createGlobals((fn, args) => this.invoke(fn, args))) {
      this.root.declare(name, value, true);
    }
  }

  createProgramScope(inputs: Record<string, unknown>): Scope {
    const scope = new Scope(this.root);
    for (const [name, value] of Object.entries(inputs)) {
      scope.declare(name, value, true);
    }
    return scope;
  }

  runProgram(source: ts.SourceFile, scope: Scope): void {
    const completion = this.executeStatements(source.statements, scope);
    if (completion.type !== "normal") {
      throw new SandboxError("forbidden", `'${completion.type}' is not allowed at the top level`);
    }
  }

  invoke(fn: Closure | NativeFunction, args: unknown[]): unknown {
    this.tick();
    if (fn instanceof NativeFunction) {
      return fn.implementation(args);
    }
    if (this.callDepth >= MAX_CALL_DEPTH) {
      throw new SandboxError("budget", `Maximum call depth of ${MAX_CALL_DEPTH} exceeded`);
    }

    const scope = new Scope(fn.scope);
    fn.parameters.forEach((parameter, index) => {
      if (parameter.dotDotDotToken || parameter.initializer) {
        throw new SandboxError("forbidden", "Rest and default parameters are not supported");
      }
      this.bind(parameter.name, args[index], scope, false);
    });

    this.callDepth += 1;
    try {
      if (ts.isBlock(fn.body)) {
        const completion = this.executeStatements(fn.body.statements, scope);
        if (completion.type === "return") {
          return completion.value;
        }
        if (completion.type !== "normal") {
          throw new SandboxError("runtime", `Illegal '${completion.type}' outside of a loop`);
        }
        return undefined;
      }
      return this.evaluate(fn.body, scope);
    } finally {
      this.callDepth -= 1;
    }
  }

  private tick(): void {
    this.steps += 1;
    if (this.steps > this.stepBudget) {
      throw new SandboxError("budget", `Execution exceeded the step budget of ${this.stepBudget}`);
    }
  }

  private executeStatements(statements: ts.NodeArray<ts.Statement>, scope: Scope): Completion {
    for (const statement of statements) {
      const completion = this.execute(statement, scope);
      if (completion.type !== "normal") {
        return completion;
      }
    }
    return NORMAL;
  }

  private execute(node: ts.Statement, scope: Scope): Completion {
    this.tick();

    if (ts.isExpressionStatement(node)) {
      this.evaluate(node.expression, scope);
      return NORMAL;
    }
    if (ts.isVariableStatement(node)) {
      this.declareList(node.declarationList, scope);
      return NORMAL;
    }
    if (ts.isIfStatement(node)) {
      if (this.evaluate(node.expression, scope)) {
        return this.execute(node.thenStatement, scope);
      }
      return node.elseStatement ? this.execute(node.elseStatement, scope) : NORMAL;
    }
    if (ts.isBlock(node)) {
      return this.executeStatements(node.statements, new Scope(scope));
    }
    if (ts.isForOfStatement(node)) {
      return this.executeForOf(node, scope);
    }
    if (ts.isReturnStatement(node)) {
      if (this.callDepth === 0) {
        throw new SandboxError("forbidden", "'return' is only allowed inside a function");
      }
      return { type: "return", value: node.expression ? this.evaluate(node.expression, scope) : undefined };
    }
    if (ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
      if (node.label) {
        throw new SandboxError("forbidden", "Labelled jumps are not supported");
      }
      return { type: ts.isBreakStatement(node) ? "break" : "continue" };
    }
    if (ts.isEmptyStatement(node)) {
      return NORMAL;
    }

    throw new SandboxError("forbidden", `Unsupported statement: ${ts.SyntaxKind[node.kind]}`);
  }

  private executeForOf(node: ts.ForOfStatement, scope: Scope): Completion {
    if (node.awaitModifier) {
      throw new SandboxError("forbidden", "'for await' is not supported");
    }
    const iterable = this.evaluate(node.expression, scope);
    let items: readonly unknown[];
    if (isList(iterable)) {
      items = iterable;
    } else if (typeof iterable === "string") {
      items = Array.from(iterable);
    } else {
      throw new SandboxError("runtime", `Cannot iterate over ${describeType(iterable)}`);
    }

    for (const item of items) {
      const iterationScope = new Scope(scope);
      const initializer = node.initializer;
      if (ts.isVariableDeclarationList(initializer)) {
        const [declaration] = initializer.declarations;
        this.bind(declaration.name, item, iterationScope, (initializer.flags & ts.NodeFlags.Const) !== 0);
      } else if (ts.isIdentifier(initializer)) {
        this.assignIdentifier(initializer.text, item, scope);
      } else {
        throw new SandboxError("forbidden", "Unsupported for-of target");
      }

      const completion = this.execute(node.statement, iterationScope);
      if (completion.type === "break") break;
      if (completion.type === "return") return completion;
    }
    return NORMAL;
  }

  private declareList(list: ts.VariableDeclarationList, scope: Scope): void {
    const constant = (list.flags & ts.NodeFlags.Const) !== 0;
    for (const declaration of list.declarations) {
      const value = declaration.initializer ? this.evaluate(declaration.initializer, scope) : undefined;
      this.bind(declaration.name, value, scope, constant);
    }
  }

  private bind(name: ts.BindingName, value: unknown, scope: Scope, constant: boolean): void {
    if (ts.isIdentifier(name)) {
      scope.declare(name.text, value, constant);
      return;
    }

    if (ts.isArrayBindingPattern(name)) {
      if (!isList(value)) {
        throw new SandboxError("runtime", `Cannot destructure ${describeType(value)} as an array`);
      }
      name.elements.forEach((element, index) => {
        if (ts.isOmittedExpression(element)) return;
        if (element.dotDotDotToken || element.initializer) {
          throw new SandboxError("forbidden", "Rest and default bindings are not supported");
        }
        this.bind(element.name, value[index], scope, constant);
      });
      return;
    }

    for (const element of name.elements) {
      if (element.dotDotDotToken || element.initializer) {
        throw new SandboxError("forbidden", "Rest and default bindings are not supported");
      }
      const property = element.propertyName ?? element.name;
      if (!ts.isIdentifier(property) && !ts.isStringLiteral(property)) {
        throw new SandboxError("forbidden", "Computed destructuring keys are not supported");
      }
      this.bind(element.name, this.readProperty(value, property.text, false), scope, constant);
    }
  }

  private assignIdentifier(name: string, value: unknown, scope: Scope): void {
    if (!scope.assign(name, value)) {
      // Undeclared assignment creates a program-level variable, which is how `result = ...` is written.
      this.programScope(scope).declare(name, value, false);
    }
  }

  private programScope(scope: Scope): Scope {
    let current = scope;
    while (current.parent && current.parent !== this.root) {
      current = current.parent;
    }
    return current;
  }

  private evaluate(node: ts.Expression, scope: Scope): unknown {
    this.tick();

    if (ts.isNumericLiteral(node)) return Number(node.text);
    if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return node.text;
    if (ts.isTemplateExpression(node)) {
      let text = node.head.text;
      for (const span of node.templateSpans) {
        text += stringify(this.evaluate(span.expression, scope)) + span.literal.text;
        checkStringLength(text.length);
      }
      return text;
    }
    if (node.kind === ts.SyntaxKind.TrueKeyword) return true;
    if (node.kind === ts.SyntaxKind.FalseKeyword) return false;
    if (node.kind === ts.SyntaxKind.NullKeyword) return null;
    if (ts.isIdentifier(node)) return this.readIdentifier(node.text, scope);
    if (ts.isParenthesizedExpression(node)) return this.evaluate(node.expression, scope);
    if (ts.isAsExpression(node) || ts.isNonNullExpression(node) || ts.isSatisfiesExpression(node)) {
      return this.evaluate(node.expression, scope);
    }
    if (ts.isBinaryExpression(node)) return this.evaluateBinary(node, scope);
    if (ts.isPrefixUnaryExpression(node)) return this.evaluatePrefix(node, scope);
    if (ts.isPostfixUnaryExpression(node)) return this.evaluateUpdate(node.operand, node.operator, false, scope);
    if (ts.isConditionalExpression(node)) {
      return this.evaluate(node.condition, scope)
        ? this.evaluate(node.whenTrue, scope)
        : this.evaluate(node.whenFalse, scope);
    }
    if (ts.isTypeOfExpression(node)) return typeOf(this.evaluate(node.expression, scope));
    if (ts.isArrayLiteralExpression(node)) return this.evaluateArray(node, scope);
    if (ts.isObjectLiteralExpression(node)) return this.evaluateObject(node, scope);
    if (ts.isPropertyAccessExpression(node)) {
      const target = this.evaluate(node.expression, scope);
      if (node.questionDotToken && (target === null || target === undefined)) return undefined;
      if (ts.isPrivateIdentifier(node.name)) {
        throw new SandboxError("forbidden", "Private names are not supported");
      }
      return this.readProperty(target, node.name.text, false);
    }
    if (ts.isElementAccessExpression(node)) {
      const target = this.evaluate(node.expression, scope);
      if (node.questionDotToken && (target === null || target === undefined)) return undefined;
      return this.readProperty(target, this.propertyKey(this.evaluate(node.argumentExpression, scope)), false);
    }
    if (ts.isCallExpression(node)) return this.evaluateCall(node, scope);
    if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
      if (node.asteriskToken || node.modifiers?.length) {
        throw new SandboxError("forbidden", "Async and generator functions are not supported");
      }
      return new Closure(node.parameters, node.body, scope);
    }

    throw new SandboxError("forbidden", `Unsupported expression: ${ts.SyntaxKind[node.kind]}`);
  }

  private readIdentifier(name: string, scope: Scope): unknown {
    if (name === "undefined") return undefined;
    if (name === "NaN") return Number.NaN;
    if (name === "Infinity") return Number.POSITIVE_INFINITY;
    const binding = scope.lookup(name);
    if (!binding) {
      throw new SandboxError("runtime", `${name} is not defined`);
    }
    return binding.value;
  }

  private propertyKey(value: unknown): string | number {
    if (typeof value === "string" || typeof value === "number") {
      return value;
    }
    throw new SandboxError("runtime", `Invalid property key of type ${describeType(value)}`);
  }

  private readProperty(target: unknown, key: string | number, forCall: boolean): unknown {
    if (typeof key === "string" && BLOCKED_PROPERTIES.has(key)) {
      throw new SandboxError("forbidden", `Access to '${key}' is not allowed`);
    }
    if (target === null || target === undefined) {
      throw new SandboxError("runtime", `Cannot read properties of ${String(target)} (reading '${key}')`);
    }
    if (target instanceof Namespace) {
      const member = target.members.get(String(key));
      if (!member) {
        throw new SandboxError("forbidden", `${target.name}.${key} is not available`);
      }
      return member;
    }
    if (isList(target) || typeof target === "string") {
      if (key === "length") return target.length;
      const index = typeof key === "number" ? key : /^\d+$/.test(key) ? Number(key) : null;
      if (index !== null) return target[index];
      throw new SandboxError(
        forCall ? "forbidden" : "runtime",
        forCall ? `Method '${key}' is not available on ${describeType(target)}` : `Property '${key}' must be called`
      );
    }
    if (isPlainRecord(target)) {
      const name = String(key);
      return Object.prototype.hasOwnProperty.call(target, name) ? target[name] : undefined;
    }
    if (typeof target === "number" && forCall) {
      throw new SandboxError("forbidden", `Method '${key}' is not available on number`);
    }
    throw new SandboxError("runtime", `Cannot read property '${key}' of ${describeType(target)}`);
  }

  private writeProperty(target: unknown, key: string | number, value: unknown): void {
    if (typeof key === "string" && BLOCKED_PROPERTIES.has(key)) {
      throw new SandboxError("forbidden", `Access to '${key}' is not allowed`);
    }
    if (isMutableList(target)) {
      assertWritable(target);
      const index = typeof key === "number" ? key : Number.NaN;
      if (!Number.isInteger(index) || index < 0 || index > target.length) {
        throw new SandboxError("runtime", `Invalid array index ${String(key)}`);
      }
      target[index] = value;
      return;
    }
    if (isPlainRecord(target)) {
      assertWritable(target);
      target[String(key)] = value;
      return;
    }
    throw new SandboxError("runtime", `Cannot set property '${key}' on ${describeType(target)}`);
  }

  private evaluateArray(node: ts.ArrayLiteralExpression, scope: Scope): unknown[] {
    const values: unknown[] = [];
    for (const element of node.elements) {
      if (ts.isSpreadElement(element)) {
        const spread = this.evaluate(element.expression, scope);
        if (!isList(spread)) {
          throw new SandboxError("runtime", `Cannot spread ${describeType(spread)} into an array`);
        }
        checkArrayLength(values.length + spread.length);
        appendAll(values, spread);
      } else if (ts.isOmittedExpression(element)) {
        values.push(undefined);
      } else {
        values.push(this.evaluate(element, scope));
      }
    }
    checkArrayLength(values.length);
    return values;
  }

  private evaluateObject(node: ts.ObjectLiteralExpression, scope: Scope): Record<string, unknown> {
    const entries: Array<[string, unknown]> = [];
    for (const property of node.properties) {
      if (ts.isPropertyAssignment(property)) {
        entries.push([this.objectKey(property.name, scope), this.evaluate(property.initializer, scope)]);
      } else if (ts.isShorthandPropertyAssignment(property)) {
        entries.push([property.name.text, this.readIdentifier(property.name.text, scope)]);
      } else if (ts.isSpreadAssignment(property)) {
        const spread = this.evaluate(property.expression, scope);
        if (!isPlainRecord(spread)) {
          throw new SandboxError("runtime", `Cannot spread ${describeType(spread)} into an object`);
        }
        entries.push(...Object.entries(spread));
      } else {
        throw new SandboxError("forbidden", "Methods and accessors are not supported in object literals");
      }
    }
    for (const [key] of entries) {
      if (BLOCKED_PROPERTIES.has(key)) {
        throw new SandboxError("forbidden", `Access to '${key}' is not allowed`);
      }
    }
    return Object.fromEntries(entries);
  }

  private objectKey(name: ts.PropertyName, scope: Scope): string {
    if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
      return name.text;
    }
    if (ts.isComputedPropertyName(name)) {
      return String(this.propertyKey(this.evaluate(name.expression, scope)));
    }
    throw new SandboxError("forbidden", "Unsupported property name");
  }

  private evaluateCall(node: ts.CallExpression, scope: Scope): unknown {
    const callee = node.expression;
    if (ts.isPropertyAccessExpression(callee) && ts.isIdentifier(callee.name)) {
      const receiver = this.evaluate(callee.expression, scope);
      if (callee.questionDotToken && (receiver === null || receiver === undefined)) return undefined;
      const args = this.evaluateArguments(node.arguments, scope);
      const method = callee.name.text;

      if (isList(receiver)) return this.callArrayMethod(receiver, method, args);
      if (typeof receiver === "string") return this.callStringMethod(receiver, method, args);
      if (typeof receiver === "number") return this.callNumberMethod(receiver, method, args);
      return this.callValue(this.readProperty(receiver, method, true), args, method);
    }

    const fn = this.evaluate(callee, scope);
    if (node.questionDotToken && (fn === null || fn === undefined)) return undefined;
    return this.callValue(fn, this.evaluateArguments(node.arguments, scope), callee.getText());
  }

  private evaluateArguments(nodes: ts.NodeArray<ts.Expression>, scope: Scope): unknown[] {
    const args: unknown[] = [];
    for (const node of nodes) {
      if (ts.isSpreadElement(node)) {
        const spread = this.evaluate(node.expression, scope);
        if (!isList(spread)) {
          throw new SandboxError("runtime", `Cannot spread ${describeType(spread)} into arguments`);
        }
        checkArrayLength(args.length + spread.length);
        appendAll(args, spread);
      } else {
        args.push(this.evaluate(node, scope));
      }
    }
    return args;
  }

  private callValue(fn: unknown, args: unknown[], label: string): unknown {
    if (!isCallable(fn)) {
      throw new SandboxError("runtime", `${label} is not a function`);
    }
    return this.invoke(fn, args);
  }

  private callback(value: unknown, method: string): (...args: unknown[]) => unknown {
    if (!isCallable(value)) {
      throw new SandboxError("runtime", `${method}() expects a function argument`);
    }
    return (...args: unknown[]) => this.invoke(value, args);
  }

  private callArrayMethod(list: readonly unknown[], method: string, args: unknown[]): unknown {
    switch (method) {
      case "filter": {
        const predicate = this.callback(args[0], method);
        return list.filter((item, index) => Boolean(predicate(item, index)));
      }
      case "map": {
        const mapper = this.callback(args[0], method);
        return list.map((item, index) => mapper(item, index));
      }
      case "flatMap": {
        const mapper = this.callback(args[0], method);
        const flattened: unknown[] = [];
        list.forEach((item, index) => {
          const mapped = mapper(item, index);
          const items = isList(mapped) ? mapped : [mapped];
          checkArrayLength(flattened.length + items.length);
          appendAll(flattened, items);
        });
        return flattened;
      }
      case "forEach": {
        const visit = this.callback(args[0], method);
        list.forEach((item, index) => {
          visit(item, index);
        });
        return undefined;
      }
      case "reduce": {
        const reducer = this.callback(args[0], method);
        if (args.length < 2 && list.length === 0) {
          throw new SandboxError("runtime", "Reduce of empty array with no initial value");
        }
        let accumulator = args.length >= 2 ? args[1] : list[0];
        for (let index = args.length >= 2 ? 0 : 1; index < list.length; index += 1) {
          accumulator = reducer(accumulator, list[index], index);
        }
        return accumulator;
      }
      case "some": {
        const predicate = this.callback(args[0], method);
        return list.some((item, index) => Boolean(predicate(item, index)));
      }
      case "every": {
        const predicate = this.callback(args[0], method);
        return list.every((item, index) => Boolean(predicate(item, index)));
      }
      case "find": {
        const predicate = this.callback(args[0], method);
        return list.find((item, index) => Boolean(predicate(item, index)));
      }
      case "findIndex": {
        const predicate = this.callback(args[0], method);
        return list.findIndex((item, index) => Boolean(predicate(item, index)));
      }
      case "includes":
        return list.includes(args[0]);
      case "indexOf":
        return list.indexOf(args[0]);
      case "slice":
        return list.slice(optionalNumber(args[0], "slice()"), optionalNumber(args[1], "slice()"));
      case "concat": {
        const parts = args.map((arg) => (isList(arg) ? [...arg] : [arg]));
        checkArrayLength(parts.reduce((total, part) => total + part.length, list.length));
        return list.concat(...parts);
      }
      case "join":
        return joinList(list, args[0] === undefined ? "," : stringify(args[0]));
      case "sort": {
        // Sorting returns a copy so frozen inputs stay untouched.
        const copy = [...list];
        if (args[0] === undefined) {
          return copy.sort((left, right) => compareDefault(left, right));
        }
        const comparator = this.callback(args[0], method);
        return copy.sort((left, right) => {
          const order = comparator(left, right);
          return typeof order === "number" && !Number.isNaN(order) ? order : 0;
        });
      }
      case "reverse":
        return [...list].reverse();
      case "push": {
        if (!isMutableList(list)) {
          throw new SandboxError("runtime", "push() expects an array");
        }
        assertWritable(list);
        checkArrayLength(list.length + args.length);
        appendAll(list, args);
        return list.length;
      }
      default:
        throw new SandboxError("forbidden", `Method '${method}' is not available on array`);
    }
  }

  private callStringMethod(text: string, method: string, args: unknown[]): unknown {
    switch (method) {
      case "toLowerCase":
        return text.toLowerCase();
      case "toUpperCase":
        return text.toUpperCase();
      case "trim":
        return text.trim();
      case "includes":
        return text.includes(stringify(args[0]));
      case "startsWith":
        return text.startsWith(stringify(args[0]));
      case "endsWith":
        return text.endsWith(stringify(args[0]));
      case "split":
        return text.split(args[0] === undefined ? "," : stringify(args[0]));
      case "slice":
        return text.slice(optionalNumber(args[0], "slice()"), optionalNumber(args[1], "slice()"));
      case "replace": {
        const search = stringify(args[0]);
        const pieces = text.split(search);
        const replacement = stringify(args[1]);
        checkStringLength(text.length + (pieces.length - 1) * (replacement.length - search.length));
        return pieces.join(replacement);
      }
      default:
        throw new SandboxError("forbidden", `Method '${method}' is not available on string`);
    }
  }

  private callNumberMethod(value: number, method: string, args: unknown[]): unknown {
    if (method === "toFixed") {
      const digits = optionalNumber(args[0], "toFixed()") ?? 0;
      if (!Number.isInteger(digits) || digits < 0 || digits > 20) {
        throw new SandboxError("runtime", "toFixed() digits must be between 0 and 20");
      }
      return value.toFixed(digits);
    }
    if (method === "toString") {
      return String(value);
    }
    throw new SandboxError("forbidden", `Method '${method}' is not available on number`);
  }

  private evaluateBinary(node: ts.BinaryExpression, scope: Scope): unknown {
    const operator = node.operatorToken.kind;

    switch (operator) {
      case ts.SyntaxKind.EqualsToken:
        return this.assign(node.left, this.evaluate(node.right, scope), scope);
      case ts.SyntaxKind.PlusEqualsToken:
      case ts.SyntaxKind.MinusEqualsToken:
      case ts.SyntaxKind.AsteriskEqualsToken:
      case ts.SyntaxKind.SlashEqualsToken:
      case ts.SyntaxKind.PercentEqualsToken: {
        const current = this.evaluate(node.left, scope);
        const next = arithmetic(compoundOperator(operator), current, this.evaluate(node.right, scope));
        return this.assign(node.left, next, scope);
      }
      case ts.SyntaxKind.AmpersandAmpersandToken: {
        const left = this.evaluate(node.left, scope);
        return left ? this.evaluate(node.right, scope) : left;
      }
      case ts.SyntaxKind.BarBarToken: {
        const left = this.evaluate(node.left, scope);
        return left ? left : this.evaluate(node.right, scope);
      }
      case ts.SyntaxKind.QuestionQuestionToken: {
        const left = this.evaluate(node.left, scope);
        return left === null || left === undefined ? this.evaluate(node.right, scope) : left;
      }
      default:
        break;
    }

    const left = this.evaluate(node.left, scope);
    const right = this.evaluate(node.right, scope);

    switch (operator) {
      case ts.SyntaxKind.PlusToken:
      case ts.SyntaxKind.MinusToken:
      case ts.SyntaxKind.AsteriskToken:
      case ts.SyntaxKind.SlashToken:
      case ts.SyntaxKind.PercentToken:
      case ts.SyntaxKind.AsteriskAsteriskToken:
        return arithmetic(operator, left, right);
      case ts.SyntaxKind.EqualsEqualsEqualsToken:
        return left === right;
      case ts.SyntaxKind.ExclamationEqualsEqualsToken:
        return left !== right;
      case ts.SyntaxKind.EqualsEqualsToken:
        return looseEquals(left, right);
      case ts.SyntaxKind.ExclamationEqualsToken:
        return !looseEquals(left, right);
      case ts.SyntaxKind.LessThanToken:
        return compare(left, right, (order) => order < 0);
      case ts.SyntaxKind.LessThanEqualsToken:
        return compare(left, right, (order) => order <= 0);
      case ts.SyntaxKind.GreaterThanToken:
        return compare(left, right, (order) => order > 0);
      case ts.SyntaxKind.GreaterThanEqualsToken:
        return compare(left, right, (order) => order >= 0);
      default:
        throw new SandboxError("forbidden", `Unsupported operator: ${ts.tokenToString(operator) ?? ts.SyntaxKind[operator]}`);
    }
  }

  private evaluatePrefix(node: ts.PrefixUnaryExpression, scope: Scope): unknown {
    switch (node.operator) {
      case ts.SyntaxKind.ExclamationToken:
        return !this.evaluate(node.operand, scope);
      case ts.SyntaxKind.MinusToken:
        return -expectNumber(this.evaluate(node.operand, scope), "Unary '-'");
      case ts.SyntaxKind.PlusToken: {
        const value = this.evaluate(node.operand, scope);
        return typeof value === "number" ? value : Number(stringify(value));
      }
      case ts.SyntaxKind.PlusPlusToken:
      case ts.SyntaxKind.MinusMinusToken:
        return this.evaluateUpdate(node.operand, node.operator, true, scope);
      default:
        throw new SandboxError("forbidden", `Unsupported operator: ${ts.tokenToString(node.operator) ?? ""}`);
    }
  }

  private evaluateUpdate(operand: ts.Expression, operator: ts.SyntaxKind, prefix: boolean, scope: Scope): unknown {
    if (operator !== ts.SyntaxKind.PlusPlusToken && operator !== ts.SyntaxKind.MinusMinusToken) {
      throw new SandboxError("forbidden", "Unsupported update operator");
    }
    const current = expectNumber(this.evaluate(operand, scope), "Increment");
    const next = operator === ts.SyntaxKind.PlusPlusToken ? current + 1 : current - 1;
    this.assign(operand, next, scope);
    return prefix ? next : current;
  }

  private assign(target: ts.Expression, value: unknown, scope: Scope): unknown {
    if (ts.isIdentifier(target)) {
      this.assignIdentifier(target.text, value, scope);
      return value;
    }
    if (ts.isPropertyAccessExpression(target) && ts.isIdentifier(target.name)) {
      this.writeProperty(this.evaluate(target.expression, scope), target.name.text, value);
      return value;
    }
    if (ts.isElementAccessExpression(target)) {
      const object = this.evaluate(target.expression, scope);
      this.writeProperty(object, this.propertyKey(this.evaluate(target.argumentExpression, scope)), value);
      return value;
    }
    if (ts.isParenthesizedExpression(target)) {
      return this.assign(target.expression, value, scope);
    }
    throw new SandboxError("forbidden", "Unsupported assignment target");
  }
}

function isMutableList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function appendAll(target: unknown[], items: readonly unknown[]): void {
  for (const item of items) {
    target.push(item);
  }
}

function assertWritable(target: object): void {
  if (Object.isFrozen(target)) {
    throw new SandboxError("runtime", "Input data is read-only; copy it before modifying");
  }
}

function typeOf(value: unknown): string {
  if (isCallable(value)) return "function";
  if (value === null || typeof value === "object") return "object";
  return typeof value;
}

function optionalNumber(value: unknown, context: string): number | undefined {
  return value === undefined ? undefined : expectNumber(value, context);
}

function compoundOperator(operator: ts.SyntaxKind): ts.SyntaxKind {
  switch (operator) {
    case ts.SyntaxKind.PlusEqualsToken:
      return ts.SyntaxKind.PlusToken;
    case ts.SyntaxKind.MinusEqualsToken:
      return ts.SyntaxKind.MinusToken;
    case ts.SyntaxKind.AsteriskEqualsToken:
      return ts.SyntaxKind.AsteriskToken;
    case ts.SyntaxKind.SlashEqualsToken:
      return ts.SyntaxKind.SlashToken;
    default:
      return ts.SyntaxKind.PercentToken;
  }
}

function arithmetic(operator: ts.SyntaxKind, left: unknown, right: unknown): unknown {
  if (operator === ts.SyntaxKind.PlusToken && (typeof left === "string" || typeof right === "string")) {
    const leftText = stringify(left);
    const rightText = stringify(right);
    checkStringLength(leftText.length + rightText.length);
    return leftText + rightText;
  }
  const symbol = ts.tokenToString(operator) ?? "?";
  const a = expectNumber(left, `Operator '${symbol}'`);
  const b = expectNumber(right, `Operator '${symbol}'`);
  switch (operator) {
    case ts.SyntaxKind.PlusToken:
      return a + b;
    case ts.SyntaxKind.MinusToken:
      return a - b;
    case ts.SyntaxKind.AsteriskToken:
      return a * b;
    case ts.SyntaxKind.SlashToken:
      return a / b;
    case ts.SyntaxKind.PercentToken:
      return a % b;
    default:
      return a ** b;
  }
}

function looseEquals(left: unknown, right: unknown): boolean {
  const leftMissing = left === null || left === undefined;
  const rightMissing = right === null || right === undefined;
  if (leftMissing || rightMissing) {
    return leftMissing && rightMissing;
  }
  if (typeof left === "number" && typeof right === "string") return left === Number(right);
  if (typeof left === "string" && typeof right === "number") return Number(left) === right;
  return left === right;
}

/** Missing operands never satisfy an ordering comparison. */
function compare(left: unknown, right: unknown, test: (order: number) => boolean): boolean {
  if (left === null || left === undefined || right === null || right === undefined) {
    return false;
  }
  if (typeof left === "string" && typeof right === "string") {
    return test(left < right ? -1 : left > right ? 1 : 0);
  }
  const a = typeof left === "string" ? Number(left) : left;
  const b = typeof right === "string" ? Number(right) : right;
  if (typeof a !== "number" || typeof b !== "number") {
    throw new SandboxError("runtime", `Cannot compare ${describeType(left)} with ${describeType(right)}`);
  }
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return false;
  }
  return test(a - b);
}

function compareDefault(left: unknown, right: unknown): number {
  if (left === undefined) return right === undefined ? 0 : 1;
  if (right === undefined) return -1;
  const a = stringify(left);
  const b = stringify(right);
  return a < b ? -1 : a > b ? 1 : 0;
}
