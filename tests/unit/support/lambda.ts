/**
 * API Gateway v2 Event Builders and Response Helpers
 *
 * Handlers are invoked in-process with synthetic events; nothing is deployed.
 */

import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyResultV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from 'aws-lambda';

// =============================================================================
// Events
// =============================================================================

export interface EventOptions {
  method: string;
  path: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  pathParameters?: Record<string, string>;
  body?: unknown;
  /** Raw body, sent as-is (for malformed JSON cases) */
  rawBody?: string;
}

export function buildEvent(options: EventOptions): APIGatewayProxyEventV2 {
  const query = options.query ?? {};
  const body = options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));

  return {
    version: '2.0',
    routeKey: `${options.method} ${options.path}`,
    rawPath: options.path,
    rawQueryString: new URLSearchParams(query).toString(),
    headers: {
      'user-agent': 'vitest',
      ...options.headers,
    },
    queryStringParameters: options.query,
    pathParameters: options.pathParameters,
    requestContext: {
      accountId: '000000000000',
      apiId: 'test-api',
      domainName: 'api.test.local',
      domainPrefix: 'api',
      http: {
        method: options.method,
        path: options.path,
        protocol: 'HTTP/1.1',
        sourceIp: '203.0.113.10',
        userAgent: 'vitest',
      },
      requestId: 'test-request',
      routeKey: `${options.method} ${options.path}`,
      stage: '$default',
      time: '01/Jan/2025:00:00:00 +0000',
      timeEpoch: 1735689600000,
    },
    body,
    isBase64Encoded: false,
  };
}

// =============================================================================
// Lambda Context
// =============================================================================

export function buildContext(remainingMs = 30_000): Context {
  return {
    callbackWaitsForEmptyEventLoop: false,
    functionName: 'account-service-test',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:000000000000:function:account-service-test',
    memoryLimitInMB: '256',
    awsRequestId: 'test-aws-request',
    logGroupName: '/aws/lambda/account-service-test',
    logStreamName: 'test-stream',
    getRemainingTimeInMillis: () => remainingMs,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
  };
}

// =============================================================================
// Responses
// =============================================================================

export function structured(result: APIGatewayProxyResultV2): APIGatewayProxyStructuredResultV2 {
  if (typeof result === 'string') {
    throw new Error(`Expected a structured response, got string: ${result}`);
  }
  return result;
}

/** Parsed JSON body of a structured response */
export function jsonBody(result: APIGatewayProxyResultV2): unknown {
  const { body } = structured(result);
  if (body === undefined || body === '') {
    return undefined;
  }
  return JSON.parse(body);
}

export function header(result: APIGatewayProxyResultV2, name: string): string | undefined {
  const value = structured(result).headers?.[name];
  return value === undefined ? undefined : String(value);
}
