import type { BearerToken, CallOptions, IEnvelopeCodec } from '@courtgate/core';
import { Logger } from '@nestjs/common';
import { GatewayError } from './gateway-error.js';
import type { IsolatedTransport } from './isolated-transport.js';
import { isJsonObject } from './upstream-payload.js';
import { type UpstreamIdentity, uidOf } from './upstream-identity.js';

const HANDSHAKE_PATH = 'appReleaseWebService.php';

/**
 * Obtains a fresh upstream token on every call. Tokens are handed straight
 * back to the caller and never kept here.
 */
export class TokenIssuer {
	private readonly logger = new Logger(TokenIssuer.name);

	constructor(
		private readonly codec: IEnvelopeCodec,
		private readonly transport: IsolatedTransport,
		private readonly identity: UpstreamIdentity,
	) {}

	async issue(options: CallOptions = {}): Promise<BearerToken> {
		const params = this.codec.encrypt({
			version: this.identity.appVersion,
			uid: uidOf(this.identity),
		});

		const response = await this.transport.withSession(
			(session, signal) => session.get({ path: HANDSHAKE_PATH, query: { params } }, signal),
			options,
		);

		if (response.status !== 200) {
			throw new GatewayError(
				'UpstreamAuthFailure',
				`Upstream rejected the handshake with HTTP ${response.status}`,
				{ status: response.status },
			);
		}

		const payload = this.codec.decryptResponse(response.body);
		const token = isJsonObject(payload) ? payload.token : undefined;
		if (typeof token !== 'string' || token.length === 0) {
			throw new GatewayError('UpstreamAuthFailure', 'Handshake response carried no token');
		}

		this.logger.log('Issued upstream token');
		return token;
	}
}
