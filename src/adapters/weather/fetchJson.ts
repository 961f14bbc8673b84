import type { z } from 'zod';
import { WeatherFetchError } from '../../utils/errors.js';

/** GET `url` and validate the body; every failure surfaces as a WeatherFetchError. */
export async function fetchJson<T extends z.ZodTypeAny>(
  provider: string,
  url: string,
  schema: T,
  signal?: AbortSignal
): Promise<z.infer<T>> {
  let response: Response;
  try {
    response = await fetch(url, { signal });
  } catch (error) {
    throw new WeatherFetchError(`${provider} request failed`, { cause: error });
  }

  if (!response.ok) {
    throw new WeatherFetchError(`${provider} API error: ${response.status}`, {
      status: response.status,
    });
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new WeatherFetchError(`${provider} returned invalid JSON`, { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new WeatherFetchError(`${provider} returned an unexpected payload`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
