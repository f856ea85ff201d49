import type { z } from 'zod';
import { getLogger } from '@fluidware-it/saddlebag';
import { NotFoundError, ParseError, RateLimitedError, TransportError, UnavailableError, errorMessage } from './errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GetJsonOptions {
  headers?: Record<string, string>;
  notFoundMessage: string;
  // Some endpoints answer 202 while the requested data is still being produced
  acceptedMessage?: string;
}

export function parsePayload<S extends z.ZodTypeAny>(body: string, schema: S): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (e) {
    throw new ParseError(errorMessage(e), body);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const reason = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ParseError(reason, body);
  }
  return result.data;
}

export async function getJson<S extends z.ZodTypeAny>(
  fetchImpl: FetchLike,
  url: string,
  schema: S,
  options: GetJsonOptions
): Promise<z.output<S>> {
  getLogger().debug(`GET ${url}`);

  let response: Response;
  try {
    response = await fetchImpl(url, { headers: options.headers ?? {} });
  } catch (e) {
    throw new TransportError(`Request to ${url} failed: ${errorMessage(e)}`);
  }

  if (response.status === 404) {
    throw new NotFoundError(options.notFoundMessage);
  }
  if (response.status === 429) {
    throw new RateLimitedError();
  }
  if (response.status === 202 && options.acceptedMessage) {
    throw new UnavailableError(options.acceptedMessage);
  }
  if (response.status !== 200) {
    throw new TransportError(`HTTP ${response.status} ${response.statusText} from ${url}`, response.status);
  }

  let body: string;
  try {
    body = await response.text();
  } catch (e) {
    throw new TransportError(`Reading response from ${url} failed: ${errorMessage(e)}`);
  }
  return parsePayload(body, schema);
}
