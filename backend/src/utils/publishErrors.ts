import type { ChannelErrorKind } from "../types/pipeline";
import { getErrorMessage } from "./pipelineErrors";

/**
 * Ошибка учётных данных канала (нет токена, нет API-ключа, отозванный доступ).
 */
export class ChannelCredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChannelCredentialError";
  }
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "ERR_NETWORK"
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * HTTP-статус из ошибки axios/gaxios (error.response.status).
 */
export function getHttpStatus(error: unknown): number | undefined {
  const status = readProperty(readProperty(error, "response"), "status");
  return typeof status === "number" ? status : undefined;
}

/**
 * Сообщение об ошибке с учётом тела ответа API (response.data.message / error.message).
 */
export function describePublishError(error: unknown): string {
  const data = readProperty(readProperty(error, "response"), "data");
  const apiMessage = readProperty(data, "message") ?? readProperty(readProperty(data, "error"), "message");
  if (typeof apiMessage === "string" && apiMessage) {
    return apiMessage;
  }
  return getErrorMessage(error);
}

/**
 * Относит ошибку публикации к одному из типов ChannelErrorKind.
 */
export function classifyPublishError(error: unknown): ChannelErrorKind {
  if (error instanceof ChannelCredentialError) {
    return "CredentialError";
  }
  if (!(error instanceof Error)) {
    return "Unknown";
  }

  if (describePublishError(error).includes("invalid_grant")) {
    return "CredentialError";
  }

  const status = getHttpStatus(error);
  if (status === 401 || status === 403) {
    return "CredentialError";
  }
  if (status !== undefined) {
    return "UploadError";
  }

  const code = readProperty(error, "code");
  if (typeof code === "string" && NETWORK_ERROR_CODES.has(code)) {
    return "NetworkError";
  }
  return "UploadError";
}
