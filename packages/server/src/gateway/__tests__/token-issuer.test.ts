import { describe, expect, it } from 'vitest';
import { GatewayError } from '../gateway-error.js';
import { createHarness, encrypted, hang } from './fake-upstream.js';

async function failure(promise: Promise<unknown>): Promise<GatewayError> {
	try {
		await promise;
	} catch (error) {
		if (error instanceof GatewayError) return error;
		throw error;
	}
	throw new Error('expected issue() to fail');
}

describe('TokenIssuer', () => {
	it('sends the encrypted handshake and returns the upstream token', async () => {
		const { upstream, tokens } = createHarness();
		upstream.on('appReleaseWebService.php', () => encrypted({ token: 'tok-1', status: 'ok' }));

		await expect(tokens.issue()).resolves.toBe('tok-1');

		expect(upstream.requests).toEqual([
			{
				sessionId: 'session-1',
				path: 'appReleaseWebService.php',
				params: { version: '3.0', uid: 'device-test:in.gov.ecourts.eCourtsServices' },
				token: undefined,
			},
		]);
		expect(upstream.closed).toBe(1);
	});

	it('issues a new token on every call', async () => {
		const { upstream, tokens } = createHarness();
		let issued = 0;
		upstream.on('appReleaseWebService.php', () => encrypted({ token: `tok-${++issued}` }));

		expect(await tokens.issue()).toBe('tok-1');
		expect(await tokens.issue()).toBe('tok-2');
		expect(upstream.opened).toBe(2);
	});

	it('fails with UpstreamAuthFailure when the handshake is rejected', async () => {
		const { upstream, tokens } = createHarness();
		upstream.on('appReleaseWebService.php', () => ({ status: 403, body: '' }));

		const error = await failure(tokens.issue());

		expect(error.kind).toBe('UpstreamAuthFailure');
		expect(error.message).toBe('Upstream rejected the handshake with HTTP 403');
		expect(error.details).toEqual({ status: 403 });
	});

	it('fails with UpstreamAuthFailure when no token comes back', async () => {
		const { upstream, tokens } = createHarness();
		upstream.on('appReleaseWebService.php', () => encrypted({ token: '' }));

		const error = await failure(tokens.issue());

		expect(error.kind).toBe('UpstreamAuthFailure');
		expect(error.message).toBe('Handshake response carried no token');
	});

	it('fails with DecryptionFailure when the handshake cannot be opened', async () => {
		const { upstream, tokens } = createHarness();
		upstream.on('appReleaseWebService.php', () => ({
			status: 200,
			body: `${'0'.repeat(32)}AAAAAAAAAAAAAAAAAAAAAA==`,
		}));

		const error = await failure(tokens.issue());

		expect(error.kind).toBe('DecryptionFailure');
	});

	it('respects the call deadline', async () => {
		const { upstream, tokens } = createHarness();
		upstream.on('appReleaseWebService.php', (_, signal) => hang(signal));

		const error = await failure(tokens.issue({ deadlineMs: 20 }));

		expect(error.kind).toBe('UpstreamTimeout');
		expect(upstream.closed).toBe(1);
	});
});
