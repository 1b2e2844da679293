import { Option } from 'effect';

import type { Method } from 'got';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS', 'TRACE'] as const satisfies ReadonlyArray<Method>;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Resolves a method name, in any case, to one of the known HTTP verbs.
 */
export const normalizeMethod = (method: string): Option.Option<HttpMethod> => {
  const upper = method.toUpperCase();
  return Option.fromNullable(HTTP_METHODS.find((m) => m === upper));
};

const isHeaderByte = (byte: number): boolean => byte === 0x09 || (byte >= 0x20 && byte <= 0x7e) || byte >= 0x80;

/**
 * Encodes `value` as UTF-8 and returns those bytes as a latin1 string, which Node writes to the wire unchanged.
 * None when a byte is a control character other than TAB.
 */
export const encodeHeaderValue = (value: string): Option.Option<string> => {
  const bytes = Buffer.from(value, 'utf8');
  return bytes.every(isHeaderByte) ? Option.some(bytes.toString('latin1')) : Option.none();
};

export const isHeaderValue = (value: string): boolean => Option.isSome(encodeHeaderValue(value));

/**
 * Number of requests needed to collect `count` items at `endpointMaximum` per page.
 */
export const pageCount = (count: number, endpointMaximum: number): number => Math.ceil(count / endpointMaximum);

/**
 * Size of the next page: the endpoint maximum, or the exact remainder once fewer are left.
 *
 * @param count - Total number of items requested.
 * @param endpointMaximum - Largest page the endpoint serves.
 * @param collected - Items already accumulated by earlier pages.
 */
export const pageSize = (count: number, endpointMaximum: number, collected: number): number =>
  Math.min(endpointMaximum, count - collected);

export const isPageRequestValid = (count: number, endpointMaximum: number): boolean =>
  Number.isInteger(count) && count >= 0 && Number.isInteger(endpointMaximum) && endpointMaximum > 0;

export const joinUrl = (baseUrl: string, endpoint: string): string => `${baseUrl.replace(/\/+$/, '')}/${endpoint}`;
