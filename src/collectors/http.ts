import axios from 'axios';
import { ArticleSource } from '../types/Article';
import { FetchError, FetchErrorCause } from '../errors';

export const USER_AGENT = 'TechTrends/1.0';

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

interface HttpFailure {
  status?: number;
  code?: string;
  message: string;
}

// Read structurally rather than through axios.isAxiosError, which is
// replaced along with the rest of the module when axios is mocked.
export function describeHttpFailure(error: unknown): HttpFailure {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const failure: HttpFailure = {
    message: error instanceof Error ? error.message : String(error),
  };

  if ('code' in error && typeof error.code === 'string') {
    failure.code = error.code;
  }

  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    failure.status = error.response.status;
  }

  return failure;
}

export function classifyHttpFailure(failure: HttpFailure): FetchErrorCause {
  if (failure.status === 429) {
    return 'rate-limited';
  }
  return 'network';
}

export function toFetchError(
  source: ArticleSource,
  error: unknown,
  context: string
): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  const failure = describeHttpFailure(error);
  const cause = classifyHttpFailure(failure);
  const detail =
    failure.code && TIMEOUT_CODES.includes(failure.code)
      ? `timed out (${failure.message})`
      : failure.status !== undefined
        ? `HTTP ${failure.status}`
        : failure.message;

  return new FetchError(source, cause, `${context}: ${detail}`);
}

export async function getJson(
  url: string,
  options: {
    timeoutMs: number;
    params?: Record<string, string | number>;
    headers?: Record<string, string>;
  }
): Promise<unknown> {
  const response = await axios.get<unknown>(url, {
    params: options.params,
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
      ...options.headers,
    },
  });
  return response.data;
}
