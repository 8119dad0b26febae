import axios from 'axios';
import { getPath } from '../utils/json';

/**
 * Turns an axios failure into a one-line message naming the service.
 * Returns null for anything that is not an axios error.
 */
export function describeHttpError(error: unknown, service: string): string | null {
  if (!axios.isAxiosError(error)) {
    return null;
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return `${service} request timed out`;
  }

  const status = error.response?.status;
  const data: unknown = error.response?.data;
  const detail = getPath(data, 'message') ?? getPath(data, 'error.message') ?? getPath(data, 'error_description');
  const suffix = typeof detail === 'string' && detail ? `: ${detail}` : '';

  switch (status) {
    case undefined:
      return `${service} request failed: ${error.message}`;
    case 401:
      return `${service} authentication failed${suffix}`;
    case 403:
      return `${service} access denied${suffix}`;
    case 404:
      return `${service} resource not found${suffix}`;
    case 429:
      return `${service} rate limit exceeded`;
    default:
      return `${service} API error (${status})${suffix}`;
  }
}
