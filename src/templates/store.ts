/**
 * Content template stores.
 *
 * Boot environments reference their content templates by identifier (the
 * `UUID` field of a template entry). A TemplateStore resolves an identifier
 * to the template source text.
 *
 * USAGE:
 *
 *   const store = new DirectoryTemplateStore("templates/");
 *   const source = await store.load("default-pxelinux.tmpl");
 *
 * Sources are read once and cached until invalidate() is called.
 */

import { readFile } from "node:fs/promises";
import { join, relative, resolve, isAbsolute } from "node:path";

import { ProvisionerError } from "../errors.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateNotFoundError extends ProvisionerError {
  readonly code = "TEMPLATE_NOT_FOUND";

  constructor(
    public readonly templateId: string,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? `Template not found: ${templateId}`, options);
  }
}

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export interface TemplateStore {
  /**
   * @throws TemplateNotFoundError if no template has this identifier
   */
  load(id: string): Promise<string>;
  /** Forget cached sources so the next load sees the current text. */
  invalidate?(): void;
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

export class InMemoryTemplateStore implements TemplateStore {
  private readonly sources: Map<string, string>;

  constructor(sources: Record<string, string> = {}) {
    this.sources = new Map(Object.entries(sources));
  }

  set(id: string, source: string): void {
    this.sources.set(id, source);
  }

  async load(id: string): Promise<string> {
    const source = this.sources.get(id);
    if (source === undefined) {
      throw new TemplateNotFoundError(id);
    }
    return source;
  }
}

export class DirectoryTemplateStore implements TemplateStore {
  private readonly baseDir: string;
  private readonly cache = new Map<string, string>();

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  async load(id: string): Promise<string> {
    const cached = this.cache.get(id);
    if (cached !== undefined) return cached;

    const filePath = join(this.baseDir, id);
    const rel = relative(this.baseDir, filePath);
    if (id === "" || rel.startsWith("..") || isAbsolute(rel)) {
      throw new TemplateNotFoundError(id, `Template id escapes the template directory: ${id}`);
    }

    let source: string;
    try {
      source = await readFile(filePath, "utf-8");
    } catch (err) {
      throw new TemplateNotFoundError(id, `Template file not found: ${filePath}`, {
        cause: err,
      });
    }

    this.cache.set(id, source);
    return source;
  }

  invalidate(): void {
    this.cache.clear();
  }
}
