export { assert, describe, test } from "./nodeTest.js";
export {
  type LogCapture,
  type RecordingDetachedRunner,
  type RecordingSink,
  type ScriptedRunner,
  createLogCapture,
  createRecordingDetachedRunner,
  createRecordingSink,
  createScriptedRunner,
  waitFor,
  withTempDir,
} from "./standIns.js";
