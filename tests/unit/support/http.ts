/**
 * HTTP API v2 Event Builders and Response Helpers
 *
 * Builds the events API Gateway hands to the Lambda handlers, and reads
 * back the structured results they return.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import type { HttpResponse } from '@authgate/shared';

// =============================================================================
// Events
// =============================================================================

export interface EventOptions {
  method?: string;
  path?: string;
  /** Object form, or a raw query string when duplicates matter */
  query?: Record<string, string> | string;
  headers?: Record<string, string>;
  cookies?: string[];
  body?: string;
  pathParameters?: Record<string, string>;
}

export function apiEvent(options: EventOptions = {}): APIGatewayProxyEventV2 {
  const method = options.method ?? 'GET';
  const path = options.path ?? '/';
  const rawQueryString = typeof options.query === 'string'
    ? options.query
    : new URLSearchParams(options.query ?? {}).toString();

  return {
    version: '2.0',
    routeKey: `${method} ${path}`,
    rawPath: path,
    rawQueryString,
    headers: options.headers ?? {},
    ...(options.cookies && { cookies: options.cookies }),
    ...(options.body !== undefined && { body: options.body }),
    ...(options.pathParameters && { pathParameters: options.pathParameters }),
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'auth.example.test',
      domainPrefix: 'auth',
      http: {
        method,
        path,
        protocol: 'HTTP/1.1',
        sourceIp: '192.0.2.10',
        userAgent: 'vitest',
      },
      requestId: 'req-test',
      routeKey: `${method} ${path}`,
      stage: '$default',
      time: '14/Nov/2023:22:13:20 +0000',
      timeEpoch: 1_700_000_000_000,
    },
    isBase64Encoded: false,
  };
}

export function formPost(path: string, fields: Record<string, string>, headers: Record<string, string> = {}): APIGatewayProxyEventV2 {
  return apiEvent({
    method: 'POST',
    path,
    headers: { 'content-type': 'application/x-www-form-urlencoded', ...headers },
    body: new URLSearchParams(fields).toString(),
  });
}

export function jsonRequest(
  method: string,
  path: string,
  body: unknown,
  headers: Record<string, string> = {}
): APIGatewayProxyEventV2 {
  return apiEvent({
    method,
    path,
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

export function bearer(token: string): Record<string, string> {
  return { authorization: `Bearer ${token}` };
}

export function basicAuth(clientId: string, secret: string): Record<string, string> {
  return { authorization: `Basic ${Buffer.from(`${clientId}:${secret}`).toString('base64')}` };
}

// =============================================================================
// Responses
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a JSON response body; fails the test on anything else */
export function jsonBody(response: HttpResponse): Record<string, unknown> {
  const parsed: unknown = JSON.parse(response.body ?? '');
  if (!isRecord(parsed)) {
    throw new Error(`Expected a JSON object body, got: ${response.body}`);
  }
  return parsed;
}

export function stringProp(body: Record<string, unknown>, name: string): string {
  const value = body[name];
  if (typeof value !== 'string') {
    throw new Error(`Expected string property ${name}, got: ${JSON.stringify(value)}`);
  }
  return value;
}

export function stringArrayProp(body: Record<string, unknown>, name: string): string[] {
  const value = body[name];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Expected string array property ${name}, got: ${JSON.stringify(value)}`);
  }
  return value;
}

export function header(response: HttpResponse, name: string): string | undefined {
  const value = response.headers?.[name];
  return value === undefined ? undefined : String(value);
}

/** The Location of a redirect, parsed */
export function location(response: HttpResponse): URL {
  const value = header(response, 'Location');
  if (!value) {
    throw new Error(`Expected a Location header, status was ${response.statusCode}`);
  }
  return new URL(value);
}
