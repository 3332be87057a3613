/**
 * Boot environment lifecycle.
 *
 * States per environment name:
 *
 *   draft ──onChange──▶ active ──onDelete──▶ retired
 *                        │  ▲
 *                        └──┘ onChange (update, cascades to bound machines)
 *
 * onChange runs strictly in sequence:
 *
 *   1. structure check
 *   2. media preparation (ISO checksum and extraction)
 *   3. auxiliary OS files
 *   4. template compilation (cache invalidated first)
 *   5. kernel is a regular file on disk
 *   6. every initrd is a regular file on disk
 *   7. on update: identity unchanged, then every bound machine re-rendered
 *
 * Steps 1-6 are validateAndPrepare(), step 7 is cascadeRender(). Any failure
 * before step 7 leaves every machine's artifacts untouched. The cascade
 * stops at the first machine that fails; machines after it keep the
 * artifacts of the previous definition until onChange is called again.
 */

import type { EngineConfig } from "../config/schema.js";
import { ProvisionerError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { Machine } from "../machines/schema.js";
import type { MachineStore } from "../machines/store.js";
import type { TemplateStore } from "../templates/store.js";
import { BootEnvCompiler, type CompiledBootEnvironment } from "./compiler.js";
import { ensureOsFiles, type FileFetcher, type FileOutcome } from "./files.js";
import { statIfExists } from "./fsutil.js";
import {
  CommandMediaExtractor,
  prepareMedia,
  type MediaExtractor,
  type MediaOutcome,
} from "./media.js";
import { pathFor } from "./paths.js";
import { deleteRendered, renderMachine, type RenderedPaths } from "./pipeline.js";
import type { BootEnvironment } from "./schema.js";
import { validateBootEnvStructure } from "./validator.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class MissingKernelError extends ProvisionerError {
  readonly code = "MISSING_KERNEL";

  constructor(
    public readonly bootEnv: string,
    public readonly path: string
  ) {
    super(`Boot environment ${bootEnv}: kernel ${path} is missing or not a regular file`);
  }
}

export class MissingInitrdError extends ProvisionerError {
  readonly code = "MISSING_INITRD";

  constructor(
    public readonly bootEnv: string,
    public readonly path: string
  ) {
    super(`Boot environment ${bootEnv}: initrd ${path} is missing or not a regular file`);
  }
}

export class ImmutableIdentityError extends ProvisionerError {
  readonly code = "IMMUTABLE_IDENTITY";

  constructor(
    public readonly previousName: string,
    public readonly nextName: string
  ) {
    super(`Cannot rename boot environment ${previousName} to ${nextName}`);
  }
}

export class EnvironmentInUseError extends ProvisionerError {
  readonly code = "ENVIRONMENT_IN_USE";

  constructor(
    public readonly bootEnv: string,
    public readonly machines: string[]
  ) {
    super(`Boot environment ${bootEnv} is still in use by: ${machines.join(", ")}`);
  }
}

export class CascadeRenderError extends ProvisionerError {
  readonly code = "CASCADE_RENDER_FAILED";

  constructor(
    public readonly bootEnv: string,
    public readonly failedMachine: string,
    /** Machines re-rendered against the new definition before the failure */
    public readonly rendered: string[],
    /** Machines not attempted; their artifacts predate the new definition */
    public readonly stale: string[],
    options: { cause: unknown }
  ) {
    super(
      `Boot environment ${bootEnv}: re-rendering machine ${failedMachine} failed` +
        (stale.length > 0 ? `; not re-rendered: ${stale.join(", ")}` : ""),
      options
    );
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BootEnvState = "draft" | "active" | "retired";

export interface LifecycleDeps {
  config: Readonly<EngineConfig>;
  templates: TemplateStore;
  machines: MachineStore;
  fetcher: FileFetcher;
  /** Defaults to running `config.extractCommand` */
  extractor?: MediaExtractor;
  logger?: Logger;
}

export interface PreparedBootEnvironment {
  compiled: CompiledBootEnvironment;
  media: MediaOutcome;
  files: Map<string, FileOutcome>;
}

export interface CascadeResult {
  /** Destinations per re-rendered machine name */
  rendered: Map<string, RenderedPaths>;
}

export interface ChangeResult extends PreparedBootEnvironment, CascadeResult {}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export class BootEnvLifecycle {
  private readonly compiler: BootEnvCompiler;
  private readonly extractor: MediaExtractor;
  private readonly logger: Logger;
  private readonly states = new Map<string, BootEnvState>();
  private readonly active = new Map<string, CompiledBootEnvironment>();

  constructor(private readonly deps: LifecycleDeps) {
    this.compiler = new BootEnvCompiler(deps.templates);
    this.extractor = deps.extractor ?? new CommandMediaExtractor(deps.config.extractCommand);
    this.logger = deps.logger ?? silentLogger;
  }

  stateOf(name: string): BootEnvState | undefined {
    return this.states.get(name);
  }

  /**
   * Everything short of touching machine artifacts.
   */
  async validateAndPrepare(env: BootEnvironment): Promise<PreparedBootEnvironment> {
    const logger = this.logger.child({ bootEnv: env.name });
    if (!this.states.has(env.name) || this.states.get(env.name) === "retired") {
      this.states.set(env.name, "draft");
    }

    validateBootEnvStructure(env);

    const media = await prepareMedia(env, {
      config: this.deps.config,
      extractor: this.extractor,
      logger,
    });

    const files = await ensureOsFiles(env, {
      config: this.deps.config,
      fetcher: this.deps.fetcher,
      logger,
    });

    this.compiler.invalidate();
    const compiled = await this.compiler.compile(env);

    if (env.kernel !== "") {
      const kernel = pathFor(env, "disk", env.kernel, this.deps.config);
      if (!(await this.isRegularFile(kernel))) {
        throw new MissingKernelError(env.name, kernel);
      }
    }

    for (const initrd of env.initrds) {
      const path = pathFor(env, "disk", initrd, this.deps.config);
      if (!(await this.isRegularFile(path))) {
        throw new MissingInitrdError(env.name, path);
      }
    }

    logger.info("Boot environment validated", { templates: compiled.templates.length });
    return { compiled, media, files };
  }

  /**
   * Re-render every machine bound to the environment, one at a
   * time in store order.
   *
   * @throws ImmutableIdentityError if `previous` has a different name
   * @throws CascadeRenderError     for the first machine that fails
   */
  async cascadeRender(
    compiled: CompiledBootEnvironment,
    previous?: BootEnvironment
  ): Promise<CascadeResult> {
    const { env } = compiled;
    if (previous !== undefined && previous.name !== env.name) {
      throw new ImmutableIdentityError(previous.name, env.name);
    }

    const rendered = new Map<string, RenderedPaths>();
    const isUpdate = previous !== undefined || this.states.get(env.name) === "active";
    if (!isUpdate) {
      return { rendered };
    }

    const machines = await this.deps.machines.listByBootEnv(env.name);
    const logger = this.logger.child({ bootEnv: env.name });
    logger.info("Cascading render", { machines: machines.length });

    for (const [index, machine] of machines.entries()) {
      try {
        rendered.set(machine.name, await this.renderWith(compiled, machine));
      } catch (err) {
        throw new CascadeRenderError(
          env.name,
          machine.name,
          [...rendered.keys()],
          machines.slice(index + 1).map((m) => m.name),
          { cause: err }
        );
      }
    }

    return { rendered };
  }

  /**
   * Validate, prepare and, for an update, cascade. The environment becomes
   * active only when every step succeeds.
   */
  async onChange(env: BootEnvironment, previous?: BootEnvironment): Promise<ChangeResult> {
    const prepared = await this.validateAndPrepare(env);
    const cascade = await this.cascadeRender(prepared.compiled, previous);

    this.states.set(env.name, "active");
    this.active.set(env.name, prepared.compiled);
    return { ...prepared, ...cascade };
  }

  /**
   * @throws EnvironmentInUseError while any machine is bound to `env`
   */
  async guardDelete(env: BootEnvironment): Promise<void> {
    const bound = await this.deps.machines.listByBootEnv(env.name);
    if (bound.length > 0) {
      throw new EnvironmentInUseError(
        env.name,
        bound.map((m) => m.name)
      );
    }
  }

  async onDelete(env: BootEnvironment): Promise<void> {
    await this.guardDelete(env);
    this.states.set(env.name, "retired");
    this.active.delete(env.name);
    this.logger.info("Boot environment retired", { bootEnv: env.name });
  }

  /** Render the environment's artifacts for one machine. */
  async apply(env: BootEnvironment, machine: Machine): Promise<RenderedPaths> {
    return this.renderWith(await this.compiledFor(env), machine);
  }

  /** Remove the environment's artifacts for one machine. */
  async remove(env: BootEnvironment, machine: Machine): Promise<string[]> {
    return deleteRendered(await this.compiledFor(env), machine, {
      config: this.deps.config,
      logger: this.logger,
    });
  }

  private renderWith(compiled: CompiledBootEnvironment, machine: Machine): Promise<RenderedPaths> {
    return renderMachine(compiled, machine, { config: this.deps.config, logger: this.logger });
  }

  private async compiledFor(env: BootEnvironment): Promise<CompiledBootEnvironment> {
    const cached = this.active.get(env.name);
    if (cached !== undefined && cached.env === env) return cached;
    validateBootEnvStructure(env);
    return this.compiler.compile(env);
  }

  private async isRegularFile(path: string): Promise<boolean> {
    const stats = await statIfExists(path);
    return stats !== undefined && stats.isFile();
  }
}
