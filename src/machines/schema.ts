/**
 * Machine record schema.
 *
 * Machines are owned by an external record store; the engine only reads
 * them. The wire format is PascalCase JSON:
 *
 *   {"Name":"node-01","Uuid":"…","Address":"192.168.124.21",
 *    "BootEnv":"ubuntu-16.04-install","Params":{"dns-domain":"example.com"}}
 */

import { z } from "zod";

import { ProvisionerError } from "../errors.js";
import { formatZodIssues, type ConfigValidationIssue } from "../config/loader.js";

export const MachineRecordSchema = z
  .object({
    Name: z.string().min(1),
    Uuid: z.string().min(1),
    Address: z.string().ip({ version: "v4" }),
    BootEnv: z.string().min(1),
    Params: z.record(z.unknown()).default({}),
  })
  .transform((record) => ({
    name: record.Name,
    uuid: record.Uuid,
    address: record.Address,
    bootEnv: record.BootEnv,
    params: record.Params,
  }));

export type MachineRecord = z.input<typeof MachineRecordSchema>;

export interface Machine {
  readonly name: string;
  readonly uuid: string;
  /** IPv4 address the machine boots from. */
  readonly address: string;
  /** Name of the boot environment the machine is bound to. */
  readonly bootEnv: string;
  readonly params: Readonly<Record<string, unknown>>;
}

export class MachineValidationError extends ProvisionerError {
  readonly code = "MACHINE_INVALID";

  constructor(
    message: string,
    public readonly issues: ConfigValidationIssue[]
  ) {
    super(message);
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Validate a machine record and map it to the domain shape.
 *
 * @throws MachineValidationError
 */
export function parseMachine(input: unknown): Machine {
  const result = MachineRecordSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new MachineValidationError(
      `Invalid machine record: ${issues.length} validation error(s)`,
      issues
    );
  }
  return Object.freeze(result.data);
}

/**
 * The IPv4 address as eight upper-case hex digits, the name PXELINUX looks
 * for under pxelinux.cfg/ (192.168.124.21 → C0A87C15).
 */
export function hexAddress(address: string): string {
  return address
    .split(".")
    .map((octet) => Number(octet).toString(16).toUpperCase().padStart(2, "0"))
    .join("");
}

/**
 * Per-machine base URL on the provisioner, e.g. for preseed and kickstart
 * files fetched during install.
 */
export function machineUrl(machine: Machine, provisionerUrl: string): string {
  return `${provisionerUrl}/machines/${machine.uuid}`;
}
