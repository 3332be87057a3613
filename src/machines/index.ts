export {
  MachineRecordSchema,
  MachineValidationError,
  parseMachine,
  hexAddress,
  machineUrl,
  type Machine,
  type MachineRecord,
} from "./schema.js";

export { InMemoryMachineStore, type MachineStore } from "./store.js";
