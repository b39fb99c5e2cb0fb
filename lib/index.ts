export * from "./camera-pipeline";
export * from "./detectors";
export { FfmpegFrameSource, RawFrameAssembler, buildFfmpegArgs } from "./frame-sources/ffmpeg-source";
export type { FfmpegSourceOptions } from "./frame-sources/ffmpeg-source";
export { VoiceAlertNotifier, buildAlertText } from "./linger-alerts/voice";
export { EmailNotifier, buildAlertEmail, createSmtpTransport } from "./linger-alerts/email";
export type { EmailSettings, MailTransport } from "./linger-alerts/email";
export { IncidentLogNotifier, toIncidentLogEntry } from "./linger-alerts/incident-log";
export type { IncidentLogEntry } from "./linger-alerts/incident-log";
export { NotificationManager } from "./linger-alerts/notification-manager";
export type { DeliveryReport } from "./linger-alerts/notification-manager";
export { OverlayRenderer } from "./overlay/renderer";
export { PngSnapshotStore, snapshotFileName } from "./overlay/snapshot";
export { encodePng, toPngDataUrl } from "./overlay/png";
export { loadMonitorConfig, buildMonitorConfig, validateCameraConfig } from "./config";
export type { AlertingConfig, CameraConfig, DetectionDefaults, FrameSize, MonitorConfig } from "./config";
