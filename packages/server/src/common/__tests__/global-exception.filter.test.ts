import type { ArgumentsHost } from '@nestjs/common';
import { BadRequestException, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { describe, expect, it, vi } from 'vitest';
import { GlobalExceptionFilter } from '../global-exception.filter.js';
import { NormalizedErrorException, unwrapResult } from '../normalized-error.exception.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Rendered {
	status: number;
	body: Record<string, unknown>;
}

interface FakeResponse {
	status(code: number): FakeResponse;
	json(body: Record<string, unknown>): void;
}

function render(exception: unknown): Rendered {
	const rendered: Rendered = { status: 0, body: {} };
	const response: FakeResponse = {
		status: vi.fn((code: number) => {
			rendered.status = code;
			return response;
		}),
		json: vi.fn((body: Record<string, unknown>) => {
			rendered.body = body;
		}),
	};
	const host = {
		switchToHttp: () => ({ getResponse: () => response }),
	} as unknown as ArgumentsHost;

	new GlobalExceptionFilter().catch(exception, host);
	return rendered;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GlobalExceptionFilter', () => {
	it('renders gateway errors with their kind, status and details', () => {
		const { status, body } = render(
			new NormalizedErrorException({
				kind: 'UpstreamTimeout',
				message: 'Upstream did not answer within 20000ms',
				details: { deadlineMs: 20_000 },
			}),
		);

		expect(status).toBe(504);
		expect(body).toMatchObject({
			statusCode: 504,
			kind: 'UpstreamTimeout',
			message: 'Upstream did not answer within 20000ms',
			details: { deadlineMs: 20_000 },
		});
		expect(typeof body.timestamp).toBe('string');
	});

	it.each([
		['InvalidArgument', 400],
		['AuthFailure', 401],
		['UpstreamAuthFailure', 401],
		['NotFound', 404],
		['Conflict', 409],
		['MalformedPayload', 502],
		['DecryptionFailure', 500],
		['UpstreamUnavailable', 502],
		['InternalError', 500],
	] as const)('maps %s to HTTP %i', (kind, expected) => {
		expect(render(new NormalizedErrorException({ kind, message: 'x' })).status).toBe(expected);
	});

	it('joins validation pipe messages', () => {
		const { status, body } = render(
			new BadRequestException(['state_code should not be empty', 'state_code must be a string']),
		);

		expect(status).toBe(400);
		expect(body.kind).toBe('InvalidArgument');
		expect(body.message).toBe('state_code should not be empty; state_code must be a string');
		expect(body).not.toHaveProperty('details');
	});

	it('names unknown routes NotFound', () => {
		const { body } = render(new NotFoundException('Cannot GET /api/v1/nowhere'));

		expect(body).toMatchObject({ statusCode: 404, kind: 'NotFound', message: 'Cannot GET /api/v1/nowhere' });
	});

	it('keeps the status of other HTTP exceptions', () => {
		const { status, body } = render(new ServiceUnavailableException('draining'));

		expect(status).toBe(503);
		expect(body.kind).toBe('InternalError');
		expect(body.message).toBe('draining');
	});

	it('hides unexpected errors behind a generic 500', () => {
		const { status, body } = render(new Error('connection pool exhausted'));

		expect(status).toBe(500);
		expect(body).toMatchObject({ kind: 'InternalError', message: 'Internal server error' });
	});
});

describe('unwrapResult', () => {
	it('returns data and throws errors as NormalizedErrorException', () => {
		expect(unwrapResult({ ok: true, data: [1, 2] })).toEqual([1, 2]);

		const error = { kind: 'NotFound', message: 'No case listing found' } as const;
		try {
			unwrapResult({ ok: false, error });
			throw new Error('expected unwrapResult to throw');
		} catch (thrown) {
			expect(thrown).toBeInstanceOf(NormalizedErrorException);
			if (thrown instanceof NormalizedErrorException) {
				expect(thrown.error).toBe(error);
				expect(thrown.getStatus()).toBe(404);
			}
		}
	});
});
