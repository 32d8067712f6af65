import axios, { isAxiosError } from 'axios';
import { z } from 'zod';
import { AppError, errorMessage } from '../errors.js';

const upstreamErrorBody = z
  .object({
    errors: z.array(z.string()).optional(),
    errorMessage: z.string().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
  })
  .passthrough();

function upstreamMessage(data: unknown): string | undefined {
  if (typeof data === 'string') return data ? data.slice(0, 200) : undefined;
  const parsed = upstreamErrorBody.safeParse(data);
  if (!parsed.success) return undefined;
  const body = parsed.data;
  return body.errors?.join('; ') || body.errorMessage || body.error_description || body.error;
}

export function upstreamStatus(err: unknown): number | undefined {
  return isAxiosError(err) ? err.response?.status : undefined;
}

/**
 * Maps an axios failure from an upstream service onto the error taxonomy.
 * Anything that is already an AppError passes through untouched.
 */
export function translateUpstreamError(service: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (axios.isCancel(err)) {
    return new AppError('UpstreamUnavailable', `${service} request cancelled`, { cause: err });
  }
  if (!isAxiosError(err)) {
    return new AppError('Internal', `${service}: ${errorMessage(err)}`, { cause: err });
  }
  const status = err.response?.status;
  if (status === undefined) {
    return new AppError('UpstreamUnavailable', `${service} unreachable: ${err.code ?? err.message}`, { cause: err });
  }
  const detail = upstreamMessage(err.response?.data);
  const suffix = detail ? `: ${detail}` : '';
  if (status === 503 && detail && /sealed/i.test(detail)) {
    return new AppError('UpstreamUnavailable', `${service} is sealed`, { cause: err, details: { sealed: true } });
  }
  if (status >= 500 || status === 429) {
    return new AppError('UpstreamUnavailable', `${service} returned ${status}${suffix}`, { cause: err });
  }
  switch (status) {
    case 401:
    case 403:
      return new AppError('Forbidden', `${service} denied the request${suffix}`, { cause: err });
    case 404:
      return new AppError('NotFound', `${service}: not found${suffix}`, { cause: err });
    case 409:
      return new AppError('Conflict', `${service}: conflict${suffix}`, { cause: err });
    case 400:
    case 422:
      return new AppError('InvalidRequest', `${service} rejected the request${suffix}`, { cause: err });
    default:
      return new AppError('Internal', `${service} returned ${status}${suffix}`, { cause: err });
  }
}

/** Rejects values that would escape the API path they are interpolated into. */
export function pathSegment(value: string, what: string): string {
  if (!value || value === '.' || value === '..' || /[/\\?#%]/.test(value)) {
    throw new AppError('InvalidRequest', `invalid ${what}`);
  }
  return encodeURIComponent(value);
}

/** Like pathSegment, for multi-segment mount paths such as `auth/kubernetes`. */
export function mountPath(value: string, what: string): string {
  return value
    .replace(/^\/+|\/+$/g, '')
    .split('/')
    .map((segment) => pathSegment(segment, what))
    .join('/');
}
