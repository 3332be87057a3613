/**
 * Boot environment validators.
 *
 * Two checks, both pure and run before anything touches the filesystem:
 *
 * 1. STRUCTURE (per definition): every template entry has a name, a path
 *    expression and a content id, and the set of templates can boot both
 *    BIOS and UEFI machines: an "ipxe" template, or both "pxelinux" and
 *    "elilo".
 *
 * 2. REQUIRED PARAMETERS (per machine): every name in `requiredParams` is a
 *    key of the machine's params. A machine that fails this check gets no
 *    artifacts at all.
 */

import { ProvisionerError } from "../errors.js";
import type { Machine } from "../machines/schema.js";
import type { BootEnvironment, TemplateSpec } from "./schema.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class IllegalTemplateError extends ProvisionerError {
  readonly code = "ILLEGAL_TEMPLATE";

  constructor(
    public readonly bootEnv: string,
    public readonly index: number,
    public readonly template: TemplateSpec,
    public readonly emptyFields: string[]
  ) {
    super(
      `Boot environment ${bootEnv}: illegal template #${index} ` +
        `(${JSON.stringify(template)}): empty ${emptyFields.join(", ")}`
    );
  }
}

export class DuplicateTemplateError extends ProvisionerError {
  readonly code = "DUPLICATE_TEMPLATE";

  constructor(
    public readonly bootEnv: string,
    public readonly templateName: string
  ) {
    super(`Boot environment ${bootEnv}: template name ${templateName} is used more than once`);
  }
}

export class IncompleteBootSupportError extends ProvisionerError {
  readonly code = "INCOMPLETE_BOOT_SUPPORT";

  constructor(
    public readonly bootEnv: string,
    public readonly templateNames: string[]
  ) {
    super(
      `Boot environment ${bootEnv}: missing elilo or pxelinux template ` +
        `(needs "ipxe", or both "pxelinux" and "elilo"; has: ${templateNames.join(", ") || "none"})`
    );
  }
}

export class MissingRequiredParamsError extends ProvisionerError {
  readonly code = "MISSING_REQUIRED_PARAMS";

  constructor(
    public readonly bootEnv: string,
    public readonly machine: string,
    public readonly missing: string[]
  ) {
    super(
      `Boot environment ${bootEnv}: machine ${machine} is missing required params: ${missing.join(", ")}`
    );
  }
}

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

/**
 * @throws IllegalTemplateError       for the first template with an empty field
 * @throws DuplicateTemplateError     if two templates share a name
 * @throws IncompleteBootSupportError if no bootloader combination is covered
 */
export function validateBootEnvStructure(env: BootEnvironment): void {
  const names = new Set<string>();

  env.templates.forEach((template, index) => {
    const empty: string[] = [];
    if (template.name === "") empty.push("name");
    if (template.path === "") empty.push("path");
    if (template.contentId === "") empty.push("content id");
    if (empty.length > 0) {
      throw new IllegalTemplateError(env.name, index, template, empty);
    }
    if (names.has(template.name)) {
      throw new DuplicateTemplateError(env.name, template.name);
    }
    names.add(template.name);
  });

  if (!names.has("ipxe") && !(names.has("pxelinux") && names.has("elilo"))) {
    throw new IncompleteBootSupportError(env.name, [...names]);
  }
}

// ---------------------------------------------------------------------------
// Required parameters
// ---------------------------------------------------------------------------

/**
 * Required parameter names the machine does not supply, in declaration
 * order, without duplicates.
 */
export function missingRequiredParams(env: BootEnvironment, machine: Machine): string[] {
  const missing = new Set<string>();
  for (const key of env.requiredParams) {
    if (!Object.hasOwn(machine.params, key)) missing.add(key);
  }
  return [...missing];
}

/**
 * @throws MissingRequiredParamsError naming every missing key
 */
export function assertRequiredParams(env: BootEnvironment, machine: Machine): void {
  const missing = missingRequiredParams(env, machine);
  if (missing.length > 0) {
    throw new MissingRequiredParamsError(env.name, machine.name, missing);
  }
}
