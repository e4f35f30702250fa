import type { IEnvelopeCodec } from '@courtgate/core';
import { Global, Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../common/config.js';
import { CourtOperations } from './court-operations.js';
import { EnvelopeCodec } from './envelope-codec.js';
import { IsolatedTransport } from './isolated-transport.js';
import { TokenIssuer } from './token-issuer.js';
import { UndiciSessionFactory } from './undici-session.factory.js';
import type { UpstreamIdentity } from './upstream-identity.js';

export const ENVELOPE_CODEC = Symbol('ENVELOPE_CODEC');

function identityOf(config: AppConfig): UpstreamIdentity {
	return {
		deviceId: config.UPSTREAM_DEVICE_ID,
		appId: config.UPSTREAM_APP_ID,
		appVersion: config.UPSTREAM_APP_VERSION,
	};
}

@Global()
@Module({
	providers: [
		{
			provide: ENVELOPE_CODEC,
			useFactory: (config: AppConfig) =>
				new EnvelopeCodec({
					requestKey: config.ENVELOPE_REQUEST_KEY,
					responseKey: config.ENVELOPE_RESPONSE_KEY,
					ivPrefixes: config.ENVELOPE_IV_PREFIXES,
				}),
			inject: [APP_CONFIG],
		},
		{
			provide: IsolatedTransport,
			useFactory: (config: AppConfig) =>
				new IsolatedTransport(
					new UndiciSessionFactory({
						baseUrl: config.UPSTREAM_BASE_URL,
						userAgent: config.UPSTREAM_USER_AGENT,
						connectTimeoutMs: config.UPSTREAM_TIMEOUT_MS,
					}),
					config.UPSTREAM_TIMEOUT_MS,
				),
			inject: [APP_CONFIG],
		},
		{
			provide: TokenIssuer,
			useFactory: (codec: IEnvelopeCodec, transport: IsolatedTransport, config: AppConfig) =>
				new TokenIssuer(codec, transport, identityOf(config)),
			inject: [ENVELOPE_CODEC, IsolatedTransport, APP_CONFIG],
		},
		{
			provide: CourtOperations,
			useFactory: (
				codec: IEnvelopeCodec,
				transport: IsolatedTransport,
				tokens: TokenIssuer,
				config: AppConfig,
			) => new CourtOperations(codec, transport, tokens, { identity: identityOf(config) }),
			inject: [ENVELOPE_CODEC, IsolatedTransport, TokenIssuer, APP_CONFIG],
		},
	],
	exports: [CourtOperations, IsolatedTransport],
})
export class GatewayModule {}
