export class LlmFactoryError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "LlmFactoryError";
  }
}

export class ConfigLoadError extends LlmFactoryError {
  readonly location: string;
  readonly line?: number;
  readonly column?: number;

  constructor(
    message: string,
    options: { location: string; line?: number; column?: number; cause?: Error },
  ) {
    super(message, { cause: options.cause });
    this.name = "ConfigLoadError";
    this.location = options.location;
    this.line = options.line;
    this.column = options.column;
  }
}

export interface ValidationIssue {
  /** Catalog key of the offending definition */
  model: string;
  /** Dotted wire field path, empty for whole-record problems */
  field: string;
  message: string;
}

export class ConfigValidationError extends LlmFactoryError {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(formatIssues(issues));
    this.name = "ConfigValidationError";
    this.issues = Object.freeze([...issues]);
  }
}

function formatIssues(issues: ValidationIssue[]): string {
  const lines = issues.map((issue) =>
    issue.field
      ? `  ${issue.model}.${issue.field}: ${issue.message}`
      : `  ${issue.model}: ${issue.message}`,
  );
  return `Configuration validation failed with ${issues.length} issue(s):\n${lines.join("\n")}`;
}

export class ModelNotFoundError extends LlmFactoryError {
  readonly modelName: string;

  constructor(modelName: string) {
    super(`Config for '${modelName}' not found.`);
    this.name = "ModelNotFoundError";
    this.modelName = modelName;
  }
}

export class ModelConfigurationError extends LlmFactoryError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "ModelConfigurationError";
  }
}

export class LLMApiError extends LlmFactoryError {
  readonly statusCode?: number;
  readonly provider: string;

  constructor(
    message: string,
    options: { provider: string; statusCode?: number; cause?: Error },
  ) {
    super(message, { cause: options.cause });
    this.name = "LLMApiError";
    this.provider = options.provider;
    this.statusCode = options.statusCode;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
