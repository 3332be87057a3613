/**
 * Boot environment command-line front end.
 *
 * Usage:
 *   bootenv validate <bootenv.json> [--prepare]
 *   bootenv render   <bootenv.json> <machine.json>
 *   bootenv delete   <bootenv.json> <machine.json>
 *
 * Options:
 *   --templates <dir>   Content template directory (default: templates)
 *   --root <dir>        Install root, overrides INSTALL_ROOT
 *   --prepare           validate: also extract media, fetch OS files and
 *                       check kernel/initrds on disk
 *   --json              Print the result as JSON
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Command succeeded
 *   1 - Validation, rendering or usage error
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  EngineConfigError,
  loadEngineConfig,
  type EngineConfig,
  type EnvSource,
} from "../config/index.js";
import { ProvisionerError, describeError } from "../errors.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import {
  InMemoryMachineStore,
  MachineValidationError,
  parseMachine,
  type Machine,
} from "../machines/index.js";
import { DirectoryTemplateStore } from "../templates/index.js";
import {
  BootEnvCompiler,
  BootEnvLifecycle,
  BootEnvValidationError,
  CommandMediaExtractor,
  HttpFileFetcher,
  parseBootEnv,
  validateBootEnvStructure,
  type BootEnvironment,
} from "../bootenv/index.js";

// ============================================================
// Types
// ============================================================

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliOptions {
  io?: CliIo;
  /** Environment variables the engine configuration is read from */
  env?: EnvSource;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const USAGE = `
Usage: bootenv <command> [options]

Commands:
  validate <bootenv.json>                  Check structure and compile templates
  render   <bootenv.json> <machine.json>   Render artifacts for one machine
  delete   <bootenv.json> <machine.json>   Remove artifacts for one machine

Options:
  --templates <dir>   Content template directory (default: templates)
  --root <dir>        Install root, overrides INSTALL_ROOT
  --prepare           validate: also prepare media and OS files, check kernel/initrds
  --json              Print the result as JSON
  -h, --help          Show this help message
`;

class UsageError extends ProvisionerError {
  readonly code = "CLI_USAGE";
}

// ============================================================
// Helpers
// ============================================================

async function readJson(path: string): Promise<unknown> {
  const raw = await readFile(path, "utf8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new UsageError(`${path}: invalid JSON: ${describeError(err)}`, { cause: err });
  }
}

function formatError(err: unknown): string {
  if (
    err instanceof EngineConfigError ||
    err instanceof BootEnvValidationError ||
    err instanceof MachineValidationError
  ) {
    return err.format();
  }
  let message = describeError(err);
  if (err instanceof Error && err.cause !== undefined) {
    message += `\n  caused by: ${describeError(err.cause)}`;
  }
  return message;
}

interface Session {
  config: Readonly<EngineConfig>;
  logger: Logger;
  templates: DirectoryTemplateStore;
}

function openSession(templatesDir: string, root: string | undefined, env: EnvSource): Session {
  const config = loadEngineConfig(root !== undefined ? { installRoot: resolve(root) } : {}, env);
  const logger = createLogger({
    level: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
  });
  return { config, logger, templates: new DirectoryTemplateStore(templatesDir) };
}

function lifecycleFor(session: Session, machines: Machine[] = []): BootEnvLifecycle {
  return new BootEnvLifecycle({
    config: session.config,
    templates: session.templates,
    machines: new InMemoryMachineStore(machines),
    fetcher: new HttpFileFetcher(),
    extractor: new CommandMediaExtractor(session.config.extractCommand),
    logger: session.logger,
  });
}

async function loadMachineFor(path: string, env: BootEnvironment): Promise<Machine> {
  const machine = parseMachine(await readJson(path));
  if (machine.bootEnv !== env.name) {
    throw new UsageError(
      `Machine ${machine.name} is bound to ${machine.bootEnv}, not ${env.name}`
    );
  }
  return machine;
}

// ============================================================
// Commands
// ============================================================

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      templates: { type: "string", default: "templates" },
      root: { type: "string" },
      prepare: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/**
 * Run one CLI invocation.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;
  const envSource = options.env ?? process.env;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.err(describeError(err));
    io.err(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, envPath, machinePath] = positionals;

  if (values.help || command === undefined) {
    io.out(USAGE);
    return values.help ? 0 : 1;
  }

  const print = (result: Record<string, unknown>, text: string[]): void => {
    if (values.json) io.out(JSON.stringify(result, null, 2));
    else for (const line of text) io.out(line);
  };

  initRunId();

  try {
    if (envPath === undefined) {
      throw new UsageError(`${command}: missing <bootenv.json>`);
    }
    const session = openSession(values.templates ?? "templates", values.root, envSource);
    const env = parseBootEnv(await readJson(envPath));

    switch (command) {
      case "validate": {
        if (values.prepare) {
          await lifecycleFor(session).validateAndPrepare(env);
        } else {
          validateBootEnvStructure(env);
          await new BootEnvCompiler(session.templates).compile(env);
        }
        print(
          { bootEnv: env.name, valid: true, templates: env.templates.map((t) => t.name) },
          [`✓ ${env.name}: ${env.templates.length} template(s) valid`]
        );
        return 0;
      }

      case "render": {
        if (machinePath === undefined) throw new UsageError("render: missing <machine.json>");
        const machine = await loadMachineFor(machinePath, env);
        const rendered = await lifecycleFor(session, [machine]).apply(env, machine);
        print(
          { bootEnv: env.name, machine: machine.name, rendered: Object.fromEntries(rendered) },
          [...rendered].map(([name, path]) => `✓ ${name}: ${path}`)
        );
        return 0;
      }

      case "delete": {
        if (machinePath === undefined) throw new UsageError("delete: missing <machine.json>");
        const machine = await loadMachineFor(machinePath, env);
        const removed = await lifecycleFor(session, [machine]).remove(env, machine);
        print(
          { bootEnv: env.name, machine: machine.name, removed },
          removed.length > 0 ? removed.map((path) => `✓ removed ${path}`) : ["Nothing to remove"]
        );
        return 0;
      }

      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (err) {
    io.err(`✗ ${formatError(err)}`);
    return 1;
  }
}
