/**
 * Machine store contract.
 *
 * The engine consults machine records for two things only: re-rendering
 * every machine bound to a changed boot environment, and refusing to delete
 * a boot environment that machines still reference.
 */

import type { Machine } from "./schema.js";

export interface MachineStore {
  /** Machines whose `bootEnv` equals `name`, in store order. */
  listByBootEnv(name: string): Promise<readonly Machine[]>;
}

/**
 * Machine store held in memory, keyed by machine name. Iteration order is
 * insertion order.
 */
export class InMemoryMachineStore implements MachineStore {
  private readonly machines = new Map<string, Machine>();

  constructor(machines: Iterable<Machine> = []) {
    for (const machine of machines) this.put(machine);
  }

  put(machine: Machine): void {
    this.machines.set(machine.name, machine);
  }

  remove(name: string): boolean {
    return this.machines.delete(name);
  }

  async listByBootEnv(name: string): Promise<readonly Machine[]> {
    return [...this.machines.values()].filter((m) => m.bootEnv === name);
  }
}
