import { isAxiosError } from 'axios';

export class AppError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

export const ERROR_CODES = {
  ERR_PARSE: 'ERR_PARSE',
  ERR_NETWORK: 'ERR_NETWORK',
  ERR_CONFIG: 'ERR_CONFIG',
  ERR_FILESYSTEM: 'ERR_FILESYSTEM',
  ERR_USAGE: 'ERR_USAGE',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export function toUserMessage(error: AppError): string {
  return `ERROR: ${error.message}`;
}

export interface NormalizedError {
  message: string;
  status?: number | undefined;
  code?: string | undefined;
  url?: string | undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (isAxiosError(error)) {
    return {
      message: error.message,
      status: error.response?.status,
      code: error.code,
      url: error.config?.url,
    };
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { message: error.message, code };
  }
  return { message: String(error) };
}

/**
 * Wraps a failed HTTP call into an `ERR_NETWORK` error. `what` names the
 * resource for the user ("license", "Part 3", ...).
 */
export function toNetworkError(error: unknown, what: string): AppError {
  if (error instanceof AppError) return error;
  const normalized = normalizeError(error);
  const reason = normalized.status !== undefined
    ? `HTTP ${normalized.status}`
    : normalized.code ?? normalized.message;
  return new AppError(ERROR_CODES.ERR_NETWORK, `Failed to download ${what}: ${reason}`, normalized);
}

/** Wraps a failed file operation into an `ERR_FILESYSTEM` error. */
export function toFileSystemError(error: unknown, action: string, path: string): AppError {
  if (error instanceof AppError) return error;
  const normalized = normalizeError(error);
  const reason = normalized.code ?? normalized.message;
  return new AppError(ERROR_CODES.ERR_FILESYSTEM, `Failed to ${action} "${path}": ${reason}`, { path, ...normalized });
}
