import { NextResponse } from 'next/server';
import { z } from 'zod';
import { isValidTimeZone } from './date';
import { getDefaultTimeZone } from './env';
import { ApiError, handleApiError, InvalidInputError } from './error';

const errorBodySchema = z
  .object({ error: z.string(), message: z.string(), detail: z.string() })
  .partial();

/**
 * Wraps a route handler: the handler's value is sent as JSON, a thrown error
 * becomes `{ error }` with the error's status. `fallback` lets dashboard routes
 * send their zeroed payload next to the error.
 */
export function apiHandler<Args extends unknown[], T>(
  handler: (...args: Args) => Promise<T> | T,
  options?: { fallback?: () => object }
) {
  return async (...args: Args): Promise<NextResponse> => {
    try {
      const data = await handler(...args);
      if (data instanceof NextResponse) return data;
      return NextResponse.json(data);
    } catch (error) {
      const { status, message } = handleApiError(error);
      const fallback = options?.fallback && status >= 500 ? options.fallback() : {};
      return NextResponse.json({ ...fallback, error: message }, { status });
    }
  };
}

/** Required, non-empty `user_id` query parameter. */
export function requireUserId(searchParams: URLSearchParams): string {
  const userId = searchParams.get('user_id')?.trim();
  if (!userId) throw new InvalidInputError('Missing user_id');
  return userId;
}

/** IANA zone from `tz`, or the configured default when absent. */
export function resolveTimeZone(searchParams: URLSearchParams): string {
  const tz = searchParams.get('tz')?.trim();
  if (!tz) return getDefaultTimeZone();
  if (!isValidTimeZone(tz)) throw new InvalidInputError(`Unknown time zone: ${tz}`);
  return tz;
}

export async function readJsonBody(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new InvalidInputError('Request body must be valid JSON');
  }
}

export async function safeJsonParse(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return text ? JSON.parse(text) : null;
  } catch (error) {
    console.error('Failed to parse JSON response:', { text, error });
    throw new Error('Failed to parse server response');
  }
}

/**
 * JSON POST/GET with a hard timeout. Non-2xx answers, network failures and
 * timeouts all surface as an ApiError carrying the upstream status (or 503).
 */
export async function fetchApi(
  input: string | URL,
  init: RequestInit & { timeoutMs: number }
): Promise<unknown> {
  const { timeoutMs, ...rest } = init;
  let response: Response;
  try {
    response = await fetch(input, {
      ...rest,
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        'Content-Type': 'application/json',
        ...rest.headers,
      },
    });
  } catch (error) {
    const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
    throw new ApiError(timedOut ? `Request timed out after ${timeoutMs}ms` : 'Request failed', 503, error);
  }

  if (!response.ok) {
    const parsed = errorBodySchema.safeParse(await safeJsonParse(response.clone()).catch(() => null));
    const errorData = parsed.success ? parsed.data : null;
    const errorMessage =
      errorData?.error || errorData?.message || errorData?.detail || response.statusText;
    throw new ApiError(errorMessage, response.status);
  }

  return safeJsonParse(response);
}
