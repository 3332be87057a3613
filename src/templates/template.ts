/**
 * Boot template parsing.
 *
 * A boot template is plain text (a pxelinux config, an iPXE script, a
 * kickstart or preseed file, a path expression) containing `{{ … }}` actions.
 * This module compiles the source once into an immutable node tree that the
 * renderer evaluates per machine.
 *
 * TEMPLATE FORMAT:
 *
 *   OUTPUT:
 *     {{ .Machine.HexAddress }}         field path from the current value
 *     {{ $.Env.Name }}                  field path from the root context
 *     {{ .Param "dns-domain" }}         function call with arguments
 *     {{ .BootParams }}                 function call without arguments
 *     {{ index .Machine.Params "ntp" }} builtin call
 *
 *   CONTROL:
 *     {{ if .Env.OS.IsoUrl }}…{{ else if … }}…{{ else }}…{{ end }}
 *     {{ range .Env.Initrds }}initrd {{ . }}{{ end }}
 *     {{ with .Machine.Params }}…{{ end }}
 *     {{/* comment *\/}}
 *
 *   WHITESPACE:
 *     `{{- ` trims whitespace before the action, ` -}}` trims after it.
 *
 * Rules:
 *   - Field names are identifiers; keys that are not identifiers are read
 *     with `index` or the `Param` helper
 *   - String literals use double quotes (with JSON escapes) or backticks
 *   - Builtins: eq, ne, not, and, or, len, index, join
 *   - Binding is strict; a missing field is an evaluation error, never an
 *     empty substitution (see renderer.ts)
 */

import { ProvisionerError } from "../errors.js";

// ---------------------------------------------------------------------------
// Node tree
// ---------------------------------------------------------------------------

export interface FieldExpr {
  kind: "field";
  /** `dot` resolves against the current value, `root` against `$`. */
  scope: "dot" | "root";
  path: readonly string[];
  /** Source text of the field, for messages. */
  text: string;
}

export type BuiltinName =
  | "eq"
  | "ne"
  | "not"
  | "and"
  | "or"
  | "len"
  | "index"
  | "join";

export type Expr =
  | FieldExpr
  | { kind: "literal"; value: string | number | boolean }
  | { kind: "builtin"; name: BuiltinName; args: readonly Expr[] }
  | { kind: "call"; target: FieldExpr; args: readonly Expr[] };

export type BlockKind = "if" | "range" | "with";

export type TemplateNode =
  | { kind: "text"; text: string }
  | { kind: "output"; expr: Expr; line: number }
  | {
      kind: BlockKind;
      expr: Expr;
      body: readonly TemplateNode[];
      otherwise: readonly TemplateNode[];
      line: number;
    };

/**
 * A compiled template. Immutable, so one instance can be rendered for many
 * machines at once.
 */
export interface CompiledTemplate {
  readonly name: string;
  /** The raw template source string. */
  readonly source: string;
  readonly nodes: readonly TemplateNode[];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateCompileError extends ProvisionerError {
  readonly code = "TEMPLATE_COMPILE_FAILED";

  constructor(
    public readonly templateName: string,
    public readonly templateSource: string,
    public readonly reason: string,
    public readonly line?: number
  ) {
    super(
      `Error compiling template ${templateName}` +
        (line !== undefined ? ` (line ${line})` : "") +
        `: ${reason}\n---template---\n${templateSource}`
    );
  }
}

// ---------------------------------------------------------------------------
// Lexing
// ---------------------------------------------------------------------------

type RawItem =
  | { type: "text"; text: string }
  | { type: "action"; body: string; line: number };

type Token =
  | { t: "field"; expr: FieldExpr }
  | { t: "literal"; value: string | number | boolean }
  | { t: "ident"; value: string }
  | { t: "lparen" }
  | { t: "rparen" };

const BUILTIN_ARITY: Record<BuiltinName, { min: number; max: number }> = {
  eq: { min: 2, max: 2 },
  ne: { min: 2, max: 2 },
  not: { min: 1, max: 1 },
  and: { min: 1, max: Infinity },
  or: { min: 1, max: Infinity },
  len: { min: 1, max: 1 },
  index: { min: 2, max: Infinity },
  join: { min: 2, max: 2 },
};

function isBlockKind(word: string): word is BlockKind {
  return word === "if" || word === "range" || word === "with";
}

function isBuiltin(name: string): name is BuiltinName {
  return Object.hasOwn(BUILTIN_ARITY, name);
}

const WHITESPACE_RE = /\s+/y;
const FIELD_RE = /\$(?:\.[A-Za-z_]\w*)*|(?:\.[A-Za-z_]\w*)+|\./y;
const STRING_RE = /"((?:[^"\\]|\\.)*)"/y;
const RAW_STRING_RE = /`([^`]*)`/y;
const NUMBER_RE = /-?\d+(?:\.\d+)?/y;
const IDENT_RE = /[A-Za-z_]\w*/y;

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function lineAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Find the `}}` closing an action that opens at `from`, skipping quoted text.
 */
function findClose(source: string, from: number): number {
  let quote: string | null = null;
  for (let i = from; i < source.length; i++) {
    const ch = source[i];
    if (quote) {
      if (ch === "\\" && quote === '"') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "`") quote = ch;
    else if (ch === "}" && source[i + 1] === "}") return i;
  }
  return -1;
}

/**
 * Split a source into text runs and action bodies, applying trim markers
 * and dropping comments.
 */
function splitSource(source: string, fail: (reason: string, line?: number) => never): RawItem[] {
  const items: RawItem[] = [];
  let pos = 0;
  let trimNext = false;

  const pushText = (text: string, trimEnd: boolean): void => {
    let value = trimNext ? text.trimStart() : text;
    if (trimEnd) value = value.trimEnd();
    if (value !== "") items.push({ type: "text", text: value });
  };

  while (pos < source.length) {
    const open = source.indexOf("{{", pos);
    if (open === -1) {
      pushText(source.slice(pos), false);
      break;
    }

    const line = lineAt(source, open);
    let start = open + 2;
    const trimLeft = source[start] === "-" && isSpace(source[start + 1]);
    if (trimLeft) start++;

    pushText(source.slice(pos, open), trimLeft);

    const close = findClose(source, start);
    if (close === -1) {
      fail("unclosed action", line);
    }

    let end = close;
    const trimRight = source[close - 1] === "-" && isSpace(source[close - 2]);
    if (trimRight) end--;

    const body = source.slice(start, end).trim();
    if (!(body.startsWith("/*") && body.endsWith("*/"))) {
      items.push({ type: "action", body, line });
    }

    trimNext = trimRight;
    pos = close + 2;
  }

  return items;
}

function parseField(text: string): FieldExpr {
  if (text === ".") return { kind: "field", scope: "dot", path: [], text };
  if (text.startsWith("$")) {
    return { kind: "field", scope: "root", path: text.slice(1).split(".").filter(Boolean), text };
  }
  return { kind: "field", scope: "dot", path: text.slice(1).split("."), text };
}

function tokenize(body: string, fail: (reason: string) => never): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const match = (re: RegExp): RegExpExecArray | null => {
    re.lastIndex = pos;
    const m = re.exec(body);
    if (m) pos = re.lastIndex;
    return m;
  };

  while (pos < body.length) {
    if (match(WHITESPACE_RE)) continue;

    const ch = body[pos];
    if (ch === "(" || ch === ")") {
      tokens.push({ t: ch === "(" ? "lparen" : "rparen" });
      pos++;
      continue;
    }

    let m = match(STRING_RE);
    if (m) {
      let value: unknown;
      try {
        value = JSON.parse(`"${m[1]}"`);
      } catch {
        fail(`invalid string literal ${m[0]}`);
      }
      tokens.push({ t: "literal", value: String(value) });
      continue;
    }

    m = match(RAW_STRING_RE);
    if (m) {
      tokens.push({ t: "literal", value: m[1] });
      continue;
    }

    m = match(NUMBER_RE);
    if (m) {
      tokens.push({ t: "literal", value: Number(m[0]) });
      continue;
    }

    m = match(FIELD_RE);
    if (m) {
      tokens.push({ t: "field", expr: parseField(m[0]) });
      continue;
    }

    m = match(IDENT_RE);
    if (m) {
      if (m[0] === "true" || m[0] === "false") {
        tokens.push({ t: "literal", value: m[0] === "true" });
      } else {
        tokens.push({ t: "ident", value: m[0] });
      }
      continue;
    }

    fail(`unexpected "${ch}" in action`);
  }

  return tokens;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface Terminator {
  keyword: "end" | "else";
  tokens: Token[];
  line: number;
}

type Term = Expr | { kind: "ident"; name: string };

class Parser {
  private index = 0;

  constructor(
    private readonly items: RawItem[],
    private readonly templateName: string,
    private readonly source: string
  ) {}

  fail(reason: string, line?: number): never {
    throw new TemplateCompileError(this.templateName, this.source, reason, line);
  }

  parse(): TemplateNode[] {
    const { nodes, terminator } = this.parseList();
    if (terminator) {
      this.fail(`unexpected {{${terminator.keyword}}}`, terminator.line);
    }
    return nodes;
  }

  /** Parse nodes up to an `end`/`else` action or the end of input. */
  private parseList(): { nodes: TemplateNode[]; terminator?: Terminator } {
    const nodes: TemplateNode[] = [];

    while (this.index < this.items.length) {
      const item = this.items[this.index++];
      if (item.type === "text") {
        nodes.push({ kind: "text", text: item.text });
        continue;
      }

      const tokens = tokenize(item.body, (reason) => this.fail(reason, item.line));
      if (tokens.length === 0) {
        this.fail("missing value for command", item.line);
      }

      const head = tokens[0];
      if (head.t === "ident") {
        const word = head.value;
        if (word === "end") {
          if (tokens.length > 1) this.fail("unexpected tokens after end", item.line);
          return { nodes, terminator: { keyword: "end", tokens: [], line: item.line } };
        }
        if (word === "else") {
          return {
            nodes,
            terminator: { keyword: "else", tokens: tokens.slice(1), line: item.line },
          };
        }
        if (isBlockKind(word)) {
          nodes.push(this.parseBlock(word, tokens.slice(1), item.line));
          continue;
        }
      }

      nodes.push({ kind: "output", expr: this.parseExpr(tokens, item.line), line: item.line });
    }

    return { nodes };
  }

  private parseBlock(kind: BlockKind, tokens: Token[], line: number): TemplateNode {
    if (tokens.length === 0) {
      this.fail(`missing value for ${kind}`, line);
    }
    const expr = this.parseExpr(tokens, line);

    const body = this.parseList();
    if (!body.terminator) {
      this.fail(`{{${kind}}} opened on line ${line} has no matching {{end}}`, line);
    }

    let otherwise: TemplateNode[] = [];
    if (body.terminator.keyword === "else") {
      const elseTokens = body.terminator.tokens;
      if (elseTokens.length > 0) {
        const chained = elseTokens[0];
        if (chained.t !== "ident" || !isBlockKind(chained.value) || chained.value === "range") {
          this.fail("expected if or with after else", body.terminator.line);
        }
        // The chained block consumes the {{end}} shared by the whole chain.
        otherwise = [this.parseBlock(chained.value, elseTokens.slice(1), body.terminator.line)];
      } else {
        const rest = this.parseList();
        if (!rest.terminator || rest.terminator.keyword !== "end") {
          this.fail(`{{else}} on line ${body.terminator.line} has no matching {{end}}`, line);
        }
        otherwise = rest.nodes;
      }
    }

    return { kind, expr, body: body.nodes, otherwise, line };
  }

  private parseExpr(tokens: Token[], line: number): Expr {
    const [expr, next] = this.parseCommand(tokens, 0, false, line);
    if (next !== tokens.length) {
      this.fail("unexpected )", line);
    }
    return expr;
  }

  private parseCommand(
    tokens: Token[],
    start: number,
    nested: boolean,
    line: number
  ): [Expr, number] {
    const terms: Term[] = [];
    let pos = start;

    while (pos < tokens.length) {
      const tok = tokens[pos];
      if (tok.t === "rparen") {
        if (!nested) this.fail("unexpected )", line);
        break;
      }
      if (tok.t === "lparen") {
        const [inner, after] = this.parseCommand(tokens, pos + 1, true, line);
        if (tokens[after]?.t !== "rparen") this.fail("unclosed (", line);
        terms.push(inner);
        pos = after + 1;
        continue;
      }
      if (tok.t === "field") terms.push(tok.expr);
      else if (tok.t === "literal") terms.push({ kind: "literal", value: tok.value });
      else terms.push({ kind: "ident", name: tok.value });
      pos++;
    }

    if (terms.length === 0) {
      this.fail("missing value for command", line);
    }

    const [head, ...rest] = terms;
    const args = rest.map((term): Expr => {
      if (term.kind === "ident") {
        this.fail(`function "${term.name}" must be called in parentheses when used as an argument`, line);
      }
      return term;
    });

    if (head.kind === "ident") {
      if (!isBuiltin(head.name)) {
        this.fail(`function "${head.name}" not defined`, line);
      }
      const arity = BUILTIN_ARITY[head.name];
      if (args.length < arity.min || args.length > arity.max) {
        this.fail(`wrong number of arguments for ${head.name}: ${args.length}`, line);
      }
      return [{ kind: "builtin", name: head.name, args }, pos];
    }

    if (args.length === 0) {
      return [head, pos];
    }
    if (head.kind !== "field") {
      this.fail("can't give argument to non-function", line);
    }
    return [{ kind: "call", target: head, args }, pos];
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Compile a template source.
 *
 * @param source - The raw template text
 * @param name   - Template name, used in every error message
 * @throws TemplateCompileError on any syntax error
 */
export function compileTemplate(source: string, name: string): CompiledTemplate {
  const fail = (reason: string, line?: number): never => {
    throw new TemplateCompileError(name, source, reason, line);
  };
  const parser = new Parser(splitSource(source, fail), name, source);
  return Object.freeze({ name, source, nodes: parser.parse() });
}
