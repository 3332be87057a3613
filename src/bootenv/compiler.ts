/**
 * Boot environment compilation.
 *
 * Turns a BootEnvironment into a CompiledBootEnvironment: every template's
 * path expression and content template, plus the boot-parameter template,
 * parsed and ready to render.
 *
 * Content templates come from the TemplateStore and are cached per
 * (template name, content id) once they compile. The lifecycle controller
 * calls invalidate() whenever a definition is re-validated, so an updated
 * environment always recompiles from the store.
 *
 * The compiled value is immutable. Machine-specific results (rendered
 * destination paths) are returned by each render and never stored here, so
 * renders for different machines can share one CompiledBootEnvironment.
 */

import { compileTemplate, type CompiledTemplate } from "../templates/template.js";
import type { TemplateStore } from "../templates/store.js";
import type { BootEnvironment, TemplateSpec } from "./schema.js";

export interface CompiledTemplateSpec {
  readonly spec: TemplateSpec;
  /** Compiled path expression */
  readonly path: CompiledTemplate;
  readonly content: CompiledTemplate;
}

export interface CompiledBootEnvironment {
  readonly env: BootEnvironment;
  readonly templates: readonly CompiledTemplateSpec[];
  /** Undefined when the environment defines no boot parameters */
  readonly bootParams?: CompiledTemplate;
}

export const BOOT_PARAMS_TEMPLATE_NAME = "bootparams";

export class BootEnvCompiler {
  private readonly contentCache = new Map<string, CompiledTemplate>();

  constructor(private readonly store: TemplateStore) {}

  /**
   * @throws TemplateCompileError  if any path, content or boot-parameter
   *                               template fails to parse
   * @throws TemplateNotFoundError if a content id is unknown to the store
   */
  async compile(env: BootEnvironment): Promise<CompiledBootEnvironment> {
    const templates: CompiledTemplateSpec[] = [];

    for (const spec of env.templates) {
      const path = compileTemplate(spec.path, spec.name);
      const content = await this.compileContent(spec);
      templates.push(Object.freeze({ spec, path, content }));
    }

    const bootParams =
      env.bootParams !== ""
        ? compileTemplate(env.bootParams, BOOT_PARAMS_TEMPLATE_NAME)
        : undefined;

    return Object.freeze({ env, templates: Object.freeze(templates), bootParams });
  }

  /** Drop cached content templates so the next compile reloads them. */
  invalidate(): void {
    this.contentCache.clear();
    this.store.invalidate?.();
  }

  private async compileContent(spec: TemplateSpec): Promise<CompiledTemplate> {
    const key = `${spec.name}\u0000${spec.contentId}`;
    const cached = this.contentCache.get(key);
    if (cached) return cached;

    const source = await this.store.load(spec.contentId);
    const compiled = compileTemplate(source, spec.name);
    this.contentCache.set(key, compiled);
    return compiled;
  }
}
