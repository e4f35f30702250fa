import type { GatewayErrorKind, NormalizedError } from '@courtgate/core';
import { ZodError } from 'zod';
import { GatewayError } from './gateway-error.js';

const TIMEOUT_CODES = new Set([
	'ETIMEDOUT',
	'UND_ERR_CONNECT_TIMEOUT',
	'UND_ERR_HEADERS_TIMEOUT',
	'UND_ERR_BODY_TIMEOUT',
]);

const UNAVAILABLE_CODES = new Set([
	'ECONNREFUSED',
	'ECONNRESET',
	'ENOTFOUND',
	'EAI_AGAIN',
	'EHOSTUNREACH',
	'ENETUNREACH',
	'EPIPE',
	'UND_ERR_SOCKET',
	'UND_ERR_CLOSED',
	'UND_ERR_DESTROYED',
	'UND_ERR_INFO',
]);

/** Reads a Node/undici error code from the error or its `cause` chain. */
export function errorCode(error: unknown): string | undefined {
	let current: unknown = error;
	for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
		if ('code' in current && typeof current.code === 'string') {
			return current.code;
		}
		current = current.cause;
	}
	return undefined;
}

export function classifyNetworkError(error: unknown): GatewayErrorKind | undefined {
	const code = errorCode(error);
	if (code === undefined) return undefined;
	if (TIMEOUT_CODES.has(code)) return 'UpstreamTimeout';
	if (UNAVAILABLE_CODES.has(code)) return 'UpstreamUnavailable';
	return undefined;
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Single conversion point from anything thrown inside the gateway to the
 * closed error taxonomy.
 */
export function toNormalizedError(error: unknown): NormalizedError {
	if (error instanceof GatewayError) {
		return error.toNormalized();
	}

	if (error instanceof ZodError) {
		const issues = error.issues.map((issue) => ({
			field: issue.path.join('.'),
			message: issue.message,
		}));
		return {
			kind: 'InvalidArgument',
			message: issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message)).join('; '),
			details: { issues },
		};
	}

	const networkKind = classifyNetworkError(error);
	if (networkKind !== undefined) {
		return {
			kind: networkKind,
			message: describeError(error),
			details: { code: errorCode(error) ?? null },
		};
	}

	return {
		kind: 'InternalError',
		message: 'Unexpected gateway failure',
		details: { error: describeError(error) },
	};
}
