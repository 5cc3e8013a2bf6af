export class ProcessorError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

export class ConfigError extends ProcessorError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", cause });
  }
}

export class InputError extends ProcessorError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "INPUT_ERROR", cause });
  }
}

export class OutputError extends ProcessorError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "OUTPUT_ERROR", cause });
  }
}

export class ReportValidationError extends ProcessorError {
  public readonly messages: string[];

  constructor(message: string, messages: string[]) {
    super(message, { code: "VALIDATION_ERROR" });
    this.messages = messages;
  }
}
