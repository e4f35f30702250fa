import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { classifyNetworkError, errorCode, toNormalizedError } from '../error-translator.js';
import { GatewayError } from '../gateway-error.js';

function networkError(code: string, message = `socket ${code}`): Error {
	return Object.assign(new Error(message), { code });
}

describe('errorCode', () => {
	it('finds a code on the error or further down its cause chain', () => {
		expect(errorCode(networkError('ECONNRESET'))).toBe('ECONNRESET');
		expect(errorCode(new TypeError('fetch failed', { cause: networkError('ENOTFOUND') }))).toBe('ENOTFOUND');
		expect(errorCode(new Error('plain'))).toBeUndefined();
		expect(errorCode('not an error')).toBeUndefined();
	});
});

describe('classifyNetworkError', () => {
	it('separates timeouts from unreachable hosts', () => {
		expect(classifyNetworkError(networkError('UND_ERR_HEADERS_TIMEOUT'))).toBe('UpstreamTimeout');
		expect(classifyNetworkError(networkError('ETIMEDOUT'))).toBe('UpstreamTimeout');
		expect(classifyNetworkError(networkError('ECONNREFUSED'))).toBe('UpstreamUnavailable');
		expect(classifyNetworkError(networkError('UND_ERR_SOCKET'))).toBe('UpstreamUnavailable');
		expect(classifyNetworkError(networkError('ERR_SOMETHING_ELSE'))).toBeUndefined();
	});
});

describe('toNormalizedError', () => {
	it('keeps the kind, message and details of gateway errors', () => {
		expect(toNormalizedError(new GatewayError('Conflict', 'already filed', { status: 409 }))).toEqual({
			kind: 'Conflict',
			message: 'already filed',
			details: { status: 409 },
		});
		expect(toNormalizedError(new GatewayError('NotFound', 'gone'))).toEqual({
			kind: 'NotFound',
			message: 'gone',
		});
	});

	it('turns validation issues into InvalidArgument', () => {
		const schema = z.object({ state_code: z.string().min(1, 'must not be empty'), cnr: z.string() });
		const parsed = schema.safeParse({ state_code: '', cnr: 5 });
		if (parsed.success) throw new Error('expected validation to fail');

		expect(toNormalizedError(parsed.error)).toEqual({
			kind: 'InvalidArgument',
			message: 'state_code: must not be empty; cnr: Expected string, received number',
			details: {
				issues: [
					{ field: 'state_code', message: 'must not be empty' },
					{ field: 'cnr', message: 'Expected string, received number' },
				],
			},
		});
	});

	it('uses the bare message for issues on the root value', () => {
		const parsed = z.string().safeParse(1);
		if (parsed.success) throw new Error('expected validation to fail');

		expect(toNormalizedError(parsed.error).message).toBe('Expected string, received number');
	});

	it('classifies raw network failures', () => {
		expect(toNormalizedError(networkError('ECONNREFUSED', 'connect ECONNREFUSED 10.0.0.1:443'))).toEqual({
			kind: 'UpstreamUnavailable',
			message: 'connect ECONNREFUSED 10.0.0.1:443',
			details: { code: 'ECONNREFUSED' },
		});
	});

	it('hides anything else behind InternalError', () => {
		expect(toNormalizedError(new RangeError('index out of range'))).toEqual({
			kind: 'InternalError',
			message: 'Unexpected gateway failure',
			details: { error: 'index out of range' },
		});
		expect(toNormalizedError('thrown string').details).toEqual({ error: 'thrown string' });
	});
});
