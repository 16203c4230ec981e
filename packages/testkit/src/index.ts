export { assert, describe, test } from "./nodeTest.js";
export {
  type RecordedInput,
  type RecordingBackend,
  createRecordingBackend,
} from "./recordingBackend.js";
export {
  type ManualTimers,
  type RecordingSleep,
  createManualTimers,
  createRecordingSleep,
} from "./timers.js";
export {
  type MemoryPersistence,
  type MemoryPersistenceOptions,
  createMemoryPersistence,
} from "./memoryPersistence.js";
