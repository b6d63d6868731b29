export {
  type RequestChannel,
  type RequestChannelOptions,
  type RequestChannelStats,
  type RequestVerdict,
  openRequestChannel,
  probeSocket,
} from "./channel/requestChannel.js";
export {
  type DaemonConfig,
  type DaemonConfigOverrides,
  type SinkKind,
  SOCKET_FILE_NAME,
  defaultSocketPath,
  resolveDaemonConfig,
} from "./config/daemonConfig.js";
export {
  type DetachedRunnerOptions,
  type ShellRunnerOptions,
  createCaptureRunner,
  createDetachedRunner,
} from "./exec/shellRunner.js";
export {
  type Logger,
  type LoggerFormat,
  type LoggerLevel,
  type LoggerOptions,
  createLogger,
  formatTextLine,
  isLoggerLevel,
} from "./log/logger.js";
export * from "./sinks/index.js";
export { createDefaultActionTable } from "./daemon/defaultTable.js";
export {
  type DaemonState,
  EXIT_FATAL,
  EXIT_OK,
  type ProcessHooks,
  type StatusDaemon,
  type StatusDaemonOptions,
  TERMINATION_SIGNALS,
  createStatusDaemon,
  nodeProcessHooks,
} from "./daemon/statusDaemon.js";
export { DAEMON_USAGE, type DaemonMainDeps, parseDaemonArgs, runDaemon } from "./daemon/daemonMain.js";
export { sendRequest } from "./client/sendRequest.js";
export {
  CLIENT_USAGE,
  type ClientDeps,
  EXIT_SEND_FAILED,
  EXIT_SENT,
  EXIT_USAGE,
  resolveClientSocketPath,
  runClient,
} from "./client/clientMain.js";
