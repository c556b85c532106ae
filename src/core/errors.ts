export class VoxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VoxError';
  }
}

export class ConfigError extends VoxError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when a command fails while performing its side effect.
 * The message is prefixed with the failing command's name.
 */
export class CommandExecutionError extends VoxError {
  constructor(
    public readonly commandName: string,
    public readonly detail: string,
    cause?: Error,
  ) {
    super(`${commandName}: ${detail}`, 'COMMAND_EXECUTION_ERROR', 'execute', cause);
    this.name = 'CommandExecutionError';
  }
}

export class OverlayError extends VoxError {
  constructor(message: string, public readonly overlay: string, cause?: Error) {
    super(message, 'OVERLAY_ERROR', 'render', cause);
    this.name = 'OverlayError';
  }
}

export class TranscriptionError extends VoxError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSCRIPTION_ERROR', 'transcribe', cause);
    this.name = 'TranscriptionError';
  }
}

/** Coerce an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
