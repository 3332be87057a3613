/**
 * Rendering pipeline.
 *
 * Writes every template of a compiled boot environment for one machine:
 *
 *   1. required-parameter check (nothing is rendered for a machine that
 *      lacks one)
 *   2. pass 1: render every path expression to a disk destination
 *   3. pass 2: per template, create the parent directory, open the
 *      destination, render content into it, fsync, close
 *
 * A failure in pass 2 removes that template's destination before the error
 * propagates. Templates already written in the same call are left as they
 * are.
 *
 * The destinations are returned per call and never stored on the shared
 * compiled environment.
 */

import { mkdir, open, rm, type FileHandle } from "node:fs/promises";
import { posix } from "node:path";

import { ProgrammingError, ProvisionerError, describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { Machine } from "../machines/schema.js";
import { renderTemplate, TemplateEvaluationError } from "../templates/renderer.js";
import type { CompiledBootEnvironment, CompiledTemplateSpec } from "./compiler.js";
import { buildRenderContext, type RenderConfig, type RenderContext } from "./context.js";
import { statIfExists } from "./fsutil.js";
import { pathFor } from "./paths.js";
import { assertRequiredParams } from "./validator.js";

export interface RenderDeps {
  config: RenderConfig;
  logger?: Logger;
}

/** Template name → absolute destination path, in template order. */
export type RenderedPaths = Map<string, string>;

function resolveDestination(
  compiled: CompiledBootEnvironment,
  template: CompiledTemplateSpec,
  context: RenderContext,
  config: RenderConfig
): string {
  const partial = renderTemplate(template.path, context).trim();
  if (partial === "") {
    throw new TemplateEvaluationError(template.spec.name, "path expression rendered empty");
  }
  return pathFor(compiled.env, "disk", partial, config);
}

/**
 * Close a half-written artifact and remove it. The file is removed even when
 * closing fails.
 */
export async function discardArtifact(
  handle: Pick<FileHandle, "close"> | undefined,
  destination: string
): Promise<void> {
  try {
    await handle?.close();
  } finally {
    await rm(destination, { force: true });
  }
}

async function writeArtifact(
  template: CompiledTemplateSpec,
  destination: string,
  context: RenderContext
): Promise<void> {
  await mkdir(posix.dirname(destination), { recursive: true });

  let handle: FileHandle | undefined;
  try {
    handle = await open(destination, "w");
    const content = renderTemplate(template.content, context);
    await handle.writeFile(content, "utf8");
    await handle.sync();
    await handle.close();
    handle = undefined;
  } catch (err) {
    await discardArtifact(handle, destination);
    throw err;
  }
}

/**
 * Render every template of `compiled` for `machine`.
 *
 * @throws MissingRequiredParamsError before anything is written
 * @throws TemplateEvaluationError    (or a helper's error) from either pass
 */
export async function renderMachine(
  compiled: CompiledBootEnvironment,
  machine: Machine,
  deps: RenderDeps
): Promise<RenderedPaths> {
  const logger = (deps.logger ?? silentLogger).child({
    bootEnv: compiled.env.name,
    machine: machine.name,
  });

  assertRequiredParams(compiled.env, machine);

  const context = buildRenderContext({ machine, compiled, config: deps.config });

  const resolved = compiled.templates.map((template) => ({
    template,
    destination: resolveDestination(compiled, template, context, deps.config),
  }));

  const destinations: RenderedPaths = new Map();
  for (const { template, destination } of resolved) {
    await writeArtifact(template, destination, context);
    destinations.set(template.spec.name, destination);
    logger.debug("Rendered template", { template: template.spec.name, destination });
  }

  logger.info("Rendered machine", { templates: destinations.size });
  return destinations;
}

/**
 * Remove the artifacts a render of `compiled` for `machine` would produce.
 * Templates whose path does not resolve for this machine are skipped, as
 * are files that are already gone.
 *
 * @returns the paths actually removed
 */
export async function deleteRendered(
  compiled: CompiledBootEnvironment,
  machine: Machine,
  deps: RenderDeps
): Promise<string[]> {
  const logger = (deps.logger ?? silentLogger).child({
    bootEnv: compiled.env.name,
    machine: machine.name,
  });

  const context = buildRenderContext({ machine, compiled, config: deps.config });
  const removed: string[] = [];

  for (const template of compiled.templates) {
    let destination: string;
    try {
      destination = resolveDestination(compiled, template, context, deps.config);
    } catch (err) {
      if (err instanceof ProgrammingError || !(err instanceof ProvisionerError)) throw err;
      logger.warn("Delete: skipping template with unresolvable path", {
        template: template.spec.name,
        error: describeError(err),
      });
      continue;
    }

    if ((await statIfExists(destination)) === undefined) continue;
    await rm(destination, { force: true });
    removed.push(destination);
  }

  return removed;
}
