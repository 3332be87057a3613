/**
 * Boot template language.
 *
 * ```typescript
 * import { compileTemplate, renderTemplate } from "./templates/index.js";
 *
 * const tmpl = compileTemplate("pxelinux.cfg/{{ .Machine.HexAddress }}", "pxelinux");
 * const path = renderTemplate(tmpl, context);
 * ```
 *
 * Compile once, render per machine: compiled templates are immutable.
 * See template.ts for the syntax.
 */

export {
  compileTemplate,
  TemplateCompileError,
  type CompiledTemplate,
  type TemplateNode,
  type Expr,
  type FieldExpr,
  type BuiltinName,
  type BlockKind,
} from "./template.js";

export {
  renderTemplate,
  formatValue,
  isTruthy,
  TemplateEvaluationError,
} from "./renderer.js";

export {
  DirectoryTemplateStore,
  InMemoryTemplateStore,
  TemplateNotFoundError,
  type TemplateStore,
} from "./store.js";
