/**
 * Account Service - Request Parsing
 *
 * Body decoding shared by the JSON endpoints.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a JSON object body, handling API Gateway base64 encoding.
 * Returns null when the body is not valid JSON or not an object.
 */
export function parseJsonBody(event: APIGatewayProxyEventV2): Record<string, unknown> | null {
    let raw = event.body || '{}';
    if (event.isBase64Encoded) {
        raw = Buffer.from(raw, 'base64').toString('utf-8');
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }

    return isPlainObject(parsed) ? parsed : null;
}

/**
 * Signature shared by every API Gateway HTTP API v2 handler in the service.
 */
export type HttpHandler = (
    event: APIGatewayProxyEventV2,
    context: Context
) => Promise<APIGatewayProxyResultV2>;

/**
 * Message for logs from an unknown thrown value.
 */
export function describeError(err: unknown): { error: string; stack?: string } {
    if (err instanceof Error) {
        return { error: err.message, stack: err.stack };
    }
    return { error: String(err) };
}
