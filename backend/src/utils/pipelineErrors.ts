/**
 * Коды ошибок пайплайна публикации.
 * ConfigInvalid - фатальна только при старте процесса,
 * остальные ограничены одним циклом или одним каналом.
 */
export type PipelineErrorCode =
  | "ConfigInvalid"
  | "NoItemAvailable"
  | "FetchFailed"
  | "ChannelPublishFailed"
  | "ArtifactGenerationFailed";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, cause?: unknown) {
    super(`${code}: ${message}`, { cause });
    this.name = "PipelineError";
    this.code = code;
  }
}

export class ConfigInvalidError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[], cause?: unknown) {
    super("ConfigInvalid", issues.join("; "), cause);
    this.name = "ConfigInvalidError";
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

export function getErrorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
