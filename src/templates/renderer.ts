/**
 * Boot template renderer.
 *
 * Evaluates a CompiledTemplate against a data value (normally a render
 * context built by the boot-environment context builder) and produces the
 * final text.
 *
 * Binding is strict: referencing a field or map key that does not exist is a
 * TemplateEvaluationError, never an empty substitution. A boot artifact with
 * a silently blank kernel argument or install URL is worse than no artifact.
 *
 * Functions found in the data are callable from templates. Errors they throw
 * that are already ProvisionerErrors (e.g. a missing machine parameter)
 * propagate unchanged; anything else is wrapped in TemplateEvaluationError.
 */

import { ProvisionerError, describeError } from "../errors.js";
import type {
  BlockKind,
  BuiltinName,
  CompiledTemplate,
  Expr,
  FieldExpr,
  TemplateNode,
} from "./template.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateEvaluationError extends ProvisionerError {
  readonly code = "TEMPLATE_EVALUATION_FAILED";

  constructor(
    public readonly templateName: string,
    public readonly reason: string,
    public readonly line?: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Error rendering template ${templateName}` +
        (line !== undefined ? ` (line ${line})` : "") +
        `: ${reason}`,
      options
    );
  }
}

// ---------------------------------------------------------------------------
// Value helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Template truthiness: false, 0, "", null/undefined, empty lists and empty
 * objects are false; everything else is true.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * Convert an evaluated value to output text.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return value.map(formatValue).join(" ");
  if (typeof value === "function") return "";
  return JSON.stringify(value);
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

class Evaluation {
  private readonly out: string[] = [];

  constructor(
    private readonly template: CompiledTemplate,
    private readonly root: unknown
  ) {}

  run(): string {
    this.renderList(this.template.nodes, this.root);
    return this.out.join("");
  }

  private fail(reason: string, line: number, cause?: unknown): never {
    throw new TemplateEvaluationError(
      this.template.name,
      reason,
      line,
      cause === undefined ? undefined : { cause }
    );
  }

  private renderList(nodes: readonly TemplateNode[], dot: unknown): void {
    for (const node of nodes) {
      switch (node.kind) {
        case "text":
          this.out.push(node.text);
          break;
        case "output":
          this.out.push(formatValue(this.evalExpr(node.expr, dot, node.line)));
          break;
        case "if": {
          const cond = this.evalExpr(node.expr, dot, node.line);
          this.renderList(isTruthy(cond) ? node.body : node.otherwise, dot);
          break;
        }
        case "with": {
          const value = this.evalExpr(node.expr, dot, node.line);
          if (isTruthy(value)) this.renderList(node.body, value);
          else this.renderList(node.otherwise, dot);
          break;
        }
        case "range":
          this.renderRange(node, dot);
          break;
      }
    }
  }

  private renderRange(
    node: Extract<TemplateNode, { kind: BlockKind }>,
    dot: unknown
  ): void {
    const value = this.evalExpr(node.expr, dot, node.line);
    let items: unknown[];

    if (value === null || value === undefined) {
      items = [];
    } else if (Array.isArray(value)) {
      items = value;
    } else if (isRecord(value)) {
      items = Object.keys(value)
        .sort()
        .map((key) => value[key]);
    } else {
      this.fail(`range can't iterate over ${formatValue(value)}`, node.line);
    }

    if (items.length === 0) {
      this.renderList(node.otherwise, dot);
      return;
    }
    for (const item of items) {
      this.renderList(node.body, item);
    }
  }

  private evalExpr(expr: Expr, dot: unknown, line: number): unknown {
    switch (expr.kind) {
      case "literal":
        return expr.value;
      case "field": {
        const value = this.resolveField(expr, dot, line);
        return typeof value === "function" ? this.invoke(value, [], expr.text, line) : value;
      }
      case "call": {
        const target = this.resolveField(expr.target, dot, line);
        if (typeof target !== "function") {
          this.fail(`${expr.target.text} is not a function`, line);
        }
        const args = expr.args.map((arg) => this.evalExpr(arg, dot, line));
        return this.invoke(target, args, expr.target.text, line);
      }
      case "builtin":
        return this.evalBuiltin(expr.name, expr.args, dot, line);
    }
  }

  private resolveField(expr: FieldExpr, dot: unknown, line: number): unknown {
    let current = expr.scope === "root" ? this.root : dot;
    const walked: string[] = [];

    for (const key of expr.path) {
      if (typeof current === "function") {
        current = this.invoke(current, [], walked.join("."), line);
      }
      if (current === null || typeof current !== "object") {
        this.fail(
          `can't evaluate field ${key} in ${walked.length > 0 ? "." + walked.join(".") : "."} ` +
            `(value is ${current === null ? "null" : typeof current})`,
          line
        );
      }
      if (!Object.hasOwn(current, key)) {
        this.fail(`map has no entry for key "${key}" (evaluating ${expr.text})`, line);
      }
      current = Reflect.get(current, key);
      walked.push(key);
    }

    return current;
  }

  private invoke(fn: Function, args: unknown[], label: string, line: number): unknown {
    try {
      const result: unknown = Reflect.apply(fn, undefined, args);
      return result;
    } catch (err) {
      if (err instanceof ProvisionerError) throw err;
      this.fail(`error calling ${label}: ${describeError(err)}`, line, err);
    }
  }

  private evalBuiltin(
    name: BuiltinName,
    argExprs: readonly Expr[],
    dot: unknown,
    line: number
  ): unknown {
    // and/or short-circuit, so evaluate lazily
    if (name === "and" || name === "or") {
      let last: unknown;
      for (const argExpr of argExprs) {
        last = this.evalExpr(argExpr, dot, line);
        if (name === "and" && !isTruthy(last)) return last;
        if (name === "or" && isTruthy(last)) return last;
      }
      return last;
    }

    const args = argExprs.map((arg) => this.evalExpr(arg, dot, line));
    switch (name) {
      case "eq":
        return args[0] === args[1];
      case "ne":
        return args[0] !== args[1];
      case "not":
        return !isTruthy(args[0]);
      case "len": {
        const [value] = args;
        if (typeof value === "string" || Array.isArray(value)) return value.length;
        if (isRecord(value)) return Object.keys(value).length;
        return this.fail(`len of ${typeof value}`, line);
      }
      case "index": {
        let [current, ...keys] = args;
        for (const key of keys) {
          if (Array.isArray(current)) {
            if (typeof key !== "number" || !Number.isInteger(key) || key < 0 || key >= current.length) {
              this.fail(`index ${formatValue(key)} out of range`, line);
            }
            current = current[key];
          } else if (isRecord(current)) {
            const field = formatValue(key);
            if (!Object.hasOwn(current, field)) {
              this.fail(`map has no entry for key "${field}"`, line);
            }
            current = current[field];
          } else {
            this.fail(`can't index item of type ${current === null ? "null" : typeof current}`, line);
          }
        }
        return current;
      }
      case "join": {
        const [list, sep] = args;
        if (!Array.isArray(list)) {
          this.fail("join expects a list as its first argument", line);
        }
        return list.map(formatValue).join(formatValue(sep));
      }
    }
  }
}

/**
 * Render a compiled template against a data value.
 *
 * @throws TemplateEvaluationError on a strict-binding violation or a failing
 *         function call
 * @throws ProvisionerError        subclasses thrown by functions in `data`
 */
export function renderTemplate(template: CompiledTemplate, data: unknown): string {
  return new Evaluation(template, data).run();
}
