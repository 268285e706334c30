/**
 * Shared test helpers for shelter-records packages
 */

export type { CliResult, CliExecOptions } from "./cli.js";
export { runCli, parseJsonOutput } from "./cli.js";
export {
  createTempDir,
  removeDir,
  writeDataFile,
  withTempDataFile,
  withTempStore,
} from "./fs.js";
export { animalRecord, animalRecords, shelterRecords } from "./fixtures.js";
