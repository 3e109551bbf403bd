/**
 * Request ID Middleware
 *
 * Tags each request with a ULID for log correlation, echoes it back in the
 * `x-request-id` header, and maps thrown errors to one response shape:
 *   { error: { code, message, statusCode } }
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ulid } from 'ulidx';
import { ZodError } from 'zod';
import { env } from '../config/env.js';
import { AppError } from '../utils/errors.js';
import { httpLogger as logger } from '../utils/logger.js';

declare module 'fastify' {
    interface FastifyRequest {
        requestId: string;
        startTime: number;
    }
}

const HEADER = 'x-request-id';

/**
 * Add unique request ID to each request for tracing
 */
export async function addRequestId(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const incoming = request.headers[HEADER];
    request.requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : ulid();
    request.startTime = Date.now();
}

/**
 * Add request ID to response headers
 */
export async function returnRequestId(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    reply.header(HEADER, request.requestId);
}

/**
 * Request logging hook - logs request completion with timing
 */
export async function logRequest(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    logger.info({
        requestId: request.requestId,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        durationMs: Date.now() - request.startTime,
    }, 'Request completed');
}

interface ErrorBody {
    error: {
        code: string;
        message: string;
        statusCode: number;
        details?: string[];
    };
}

function hasStatusCode(error: FastifyError): error is FastifyError & { statusCode: number } {
    return typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 600;
}

/**
 * Global error handler - sanitizes unexpected errors in production
 */
export function createGlobalErrorHandler() {
    return async (error: FastifyError, request: FastifyRequest, reply: FastifyReply): Promise<ErrorBody> => {
        const requestId = request.requestId;

        if (error instanceof AppError && !error.isOperational) {
            logger.error({ requestId, code: error.code, err: error.message, stack: error.stack }, `AppError: ${error.code}`);
            reply.status(error.statusCode);
            return {
                error: {
                    code: error.code,
                    message: env.isProduction ? 'Internal Server Error' : error.message,
                    statusCode: error.statusCode,
                },
            };
        }

        if (error instanceof AppError) {
            const logMethod = error.statusCode >= 500 ? 'error' : 'warn';
            logger[logMethod]({ requestId, code: error.code, err: error.message }, `AppError: ${error.code}`);
            reply.status(error.statusCode);
            return { error: { code: error.code, message: error.message, statusCode: error.statusCode } };
        }

        if (error instanceof ZodError) {
            const details = error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            logger.warn({ requestId, details }, 'Request validation failed');
            reply.status(400);
            return { error: { code: 'VALIDATION_ERROR', message: 'Invalid request parameters', statusCode: 400, details } };
        }

        if (hasStatusCode(error) && error.statusCode < 500) {
            logger.warn({ requestId, err: error.message }, 'Client error');
            reply.status(error.statusCode);
            return { error: { code: error.code || 'BAD_REQUEST', message: error.message, statusCode: error.statusCode } };
        }

        logger.error({ requestId, err: error.message, stack: error.stack }, 'Unhandled error');
        reply.status(500);
        return {
            error: {
                code: 'INTERNAL_ERROR',
                message: env.isProduction ? 'Internal Server Error' : error.message,
                statusCode: 500,
            },
        };
    };
}
