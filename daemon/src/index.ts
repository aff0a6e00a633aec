export { DaemonConfigSchema, loadConfig, type DaemonConfig } from "./config.js";
export { SessionMonitor } from "./session-monitor.js";
export {
  REQUEST_KINDS,
  handleRequest,
  type DaemonServices,
  type HandleRequestParams,
  type RequestKind,
  type RequestResponse,
} from "./handle-request.js";
export { QosRequestServer, requestSubjects, type QosRequestServerParams } from "./request-server.js";
