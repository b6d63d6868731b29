/**
 * @barline/core
 *
 * Runtime-agnostic status-bar dispatch core: field buffers, the action table,
 * request dispatch and status line rendering.
 * This package MUST NOT use Node-specific APIs (Buffer, child_process, node:* imports).
 */

export {
  BarlineError,
  type BarlineErrorCode,
  describeThrown,
  isBarlineError,
} from "./errors.js";

export { type LogEvent, type LogLevel, type LogSink, makeLogSink } from "./log.js";

export {
  DEFAULT_FIELD_NAMES,
  MAX_FIELD_LEN,
  type FieldId,
  type FieldStore,
  type FieldView,
  createFieldStore,
  storedLength,
} from "./fields/fieldStore.js";

export type {
  Action,
  ActionDef,
  ActionKind,
  ActionTableDefinition,
  CommandRunner,
  CompositeAction,
  CompositeActionDef,
  DetachedRunner,
  ExternalAction,
  ExternalActionDef,
  FieldWriter,
  ToggleAction,
  ToggleActionDef,
  ToggleProcedure,
} from "./actions/types.js";

export {
  type ToggleState,
  type TwoStateToggleOptions,
  createTwoStateToggle,
} from "./actions/toggle.js";

export { type ActionRegistry, createActionRegistry } from "./actions/registry.js";

export {
  type ActionContext,
  type RunState,
  createRunState,
  executeAction,
} from "./actions/execute.js";

export {
  type DispatchOutcome,
  type Dispatcher,
  type DispatcherOptions,
  createDispatcher,
} from "./dispatch/dispatcher.js";

export {
  STATUS_CLOSE,
  STATUS_OPEN,
  STATUS_SEPARATOR,
  type PublishSink,
  type StatusRenderer,
  type StatusRendererOptions,
  createRenderer,
  formatStatusBytes,
  formatStatusLine,
  statusLineMaxBytes,
} from "./render/statusLine.js";

export {
  MAX_REQUEST_ID,
  REQUEST_BYTES,
  decodeRequest,
  encodeRequest,
  isRequestId,
  parseRequestId,
} from "./protocol/request.js";
