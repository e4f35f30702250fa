import { createCipheriv, randomBytes } from 'node:crypto';
import type {
	ISessionFactory,
	IUpstreamSession,
	JsonValue,
	UpstreamRequest,
	UpstreamResponse,
} from '@courtgate/core';
import { EnvelopeCodec, type EnvelopeKeyMaterial } from '../envelope-codec.js';
import { IsolatedTransport } from '../isolated-transport.js';
import { TokenIssuer } from '../token-issuer.js';
import type { UpstreamIdentity } from '../upstream-identity.js';

export const TEST_KEYS: EnvelopeKeyMaterial = {
	requestKey: '00112233445566778899aabbccddeeff',
	responseKey: 'ffeeddccbbaa99887766554433221100',
	ivPrefixes: ['0011223344556677', '8899aabbccddeeff'],
};

export const TEST_IDENTITY: UpstreamIdentity = {
	deviceId: 'device-test',
	appId: 'in.gov.ecourts.eCourtsServices',
	appVersion: '3.0',
};

/** Encrypts raw text the way upstream builds a response envelope. */
export function sealRaw(text: string, keyHex = TEST_KEYS.responseKey): string {
	const iv = randomBytes(16);
	const cipher = createCipheriv('aes-128-cbc', Buffer.from(keyHex, 'hex'), iv);
	const ciphertext = Buffer.concat([cipher.update(text, 'utf-8'), cipher.final()]);
	return `${iv.toString('hex')}${ciphertext.toString('base64')}`;
}

export function sealResponse(value: JsonValue): string {
	return sealRaw(JSON.stringify(value));
}

export function encrypted(value: JsonValue, status = 200): UpstreamResponse {
	return { status, body: sealResponse(value) };
}

/** Rejects once the session signal aborts; never resolves otherwise. */
export function hang(signal: AbortSignal): Promise<never> {
	return new Promise((_, reject) => {
		signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
	});
}

export interface RecordedRequest {
	readonly sessionId: string;
	readonly path: string;
	/** Decrypted `params` envelope. */
	readonly params: JsonValue;
	/** Decrypted bearer token, when one was sent. */
	readonly token: JsonValue | undefined;
}

export type Responder = (
	request: RecordedRequest,
	signal: AbortSignal,
) => UpstreamResponse | Promise<UpstreamResponse>;

/**
 * In-process stand-in for upstream. Every session it opens records the
 * decrypted requests it carries so tests can inspect what left the gateway.
 */
export class FakeUpstream implements ISessionFactory {
	readonly requests: RecordedRequest[] = [];
	opened = 0;
	closed = 0;
	private readonly routes = new Map<string, Responder>();

	constructor(private readonly codec: EnvelopeCodec) {}

	on(path: string, responder: Responder): this {
		this.routes.set(path, responder);
		return this;
	}

	open(): IUpstreamSession {
		this.opened++;
		const id = `session-${this.opened}`;
		let isClosed = false;

		return {
			id,
			get: async (req: UpstreamRequest, signal: AbortSignal) => {
				if (isClosed) throw new Error(`${id} used after close`);
				const recorded = this.record(id, req);
				const responder = this.routes.get(req.path);
				if (!responder) return { status: 404, body: '' };
				return responder(recorded, signal);
			},
			close: async () => {
				isClosed = true;
				this.closed++;
			},
		};
	}

	private record(sessionId: string, req: UpstreamRequest): RecordedRequest {
		const params = req.query?.params;
		const authorization = req.headers?.authorization;
		const recorded: RecordedRequest = {
			sessionId,
			path: req.path,
			params: params === undefined ? null : this.codec.decrypt(params),
			token:
				authorization === undefined
					? undefined
					: this.codec.decrypt(authorization.replace(/^Bearer /, '')),
		};
		this.requests.push(recorded);
		return recorded;
	}
}

export interface GatewayHarness {
	readonly codec: EnvelopeCodec;
	readonly upstream: FakeUpstream;
	readonly transport: IsolatedTransport;
	readonly tokens: TokenIssuer;
}

export function createHarness(deadlineMs = 1_000): GatewayHarness {
	const codec = new EnvelopeCodec(TEST_KEYS);
	const upstream = new FakeUpstream(codec);
	const transport = new IsolatedTransport(upstream, deadlineMs);
	const tokens = new TokenIssuer(codec, transport, TEST_IDENTITY);
	return { codec, upstream, transport, tokens };
}
