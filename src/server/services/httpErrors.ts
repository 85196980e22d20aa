import axios from 'axios';

export type HttpErrorType =
  | 'canceled'
  | 'connection_refused'
  | 'timeout'
  | 'server_error'
  | 'service_unavailable'
  | 'client_error'
  | 'unknown';

/**
 * Categorize an axios failure for logs, metrics and error mapping.
 */
export function categorizeHttpError(error: unknown): HttpErrorType {
  if (axios.isCancel(error)) return 'canceled';
  if (!axios.isAxiosError(error)) return 'unknown';
  if (error.code === 'ERR_CANCELED') return 'canceled';
  if (error.code === 'ECONNREFUSED') return 'connection_refused';
  if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') return 'timeout';

  const status = error.response?.status;
  if (status === 503) return 'service_unavailable';
  if (status !== undefined && status >= 500) return 'server_error';
  if (status !== undefined && status >= 400) return 'client_error';
  return 'unknown';
}

export function httpErrorSummary(error: unknown): Record<string, unknown> {
  if (axios.isAxiosError(error)) {
    return {
      type: categorizeHttpError(error),
      message: error.message,
      status: error.response?.status,
      code: error.code,
    };
  }
  return {
    type: 'unknown',
    message: error instanceof Error ? error.message : String(error),
  };
}
