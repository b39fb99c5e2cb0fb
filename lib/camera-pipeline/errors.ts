/**
 * Pipeline error kinds. Only AcquisitionError and ConfigurationError ever change
 * worker lifecycle; the rest are logged and the cycle moves on.
 */

export class AcquisitionError extends Error {
  readonly fatal: boolean;

  constructor(message: string, options: { fatal?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AcquisitionError";
    this.fatal = options.fatal ?? false;
  }
}

export class DetectionError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "DetectionError";
  }
}

export class ConfigurationError extends Error {
  readonly camera: string | null;

  constructor(message: string, camera: string | null = null) {
    super(camera ? `camera "${camera}": ${message}` : message);
    this.name = "ConfigurationError";
    this.camera = camera;
  }
}

export class NotificationError extends Error {
  readonly notifier: string;

  constructor(notifier: string, message: string, options: { cause?: unknown } = {}) {
    super(`${notifier}: ${message}`, { cause: options.cause });
    this.name = "NotificationError";
    this.notifier = notifier;
  }
}

export class RenderError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "RenderError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
