export * from "./types";
export * from "./errors";
export * from "./collaborators";
export { MotionGate } from "./motion-gate";
export type { MotionGateConfig, GateReason } from "./motion-gate";
export { Tracker } from "./tracker";
export type { TrackerConfig } from "./tracker";
export { LingerMonitor } from "./linger-monitor";
export type { LingerMonitorConfig } from "./linger-monitor";
export { CameraWorker } from "./camera-worker";
export type {
  CameraSettings,
  CameraWorkerOptions,
  FrameUpdate,
  ReconnectPolicy,
  StopReason,
  WorkerState,
  WorkerStats,
} from "./camera-worker";
export { CameraSupervisor } from "./supervisor";
export type { CameraStatus, RestartPolicy, ShutdownResult, SupervisorOptions } from "./supervisor";
