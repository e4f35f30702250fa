import { createCipheriv, createDecipheriv, randomBytes, randomInt } from 'node:crypto';
import type { IEnvelopeCodec, JsonValue } from '@courtgate/core';
import { GatewayError } from './gateway-error.js';

const BLOCK_SIZE = 16;
const NONCE_LENGTH = 8;
const NONCE_HEX_LENGTH = NONCE_LENGTH * 2;
const IV_HEX_LENGTH = BLOCK_SIZE * 2;
const IV_PREFIX_HEX_LENGTH = (BLOCK_SIZE - NONCE_LENGTH) * 2;
const MAX_IV_PREFIXES = 10;

const CBC_ALGORITHMS: Record<number, string> = {
	16: 'aes-128-cbc',
	24: 'aes-192-cbc',
	32: 'aes-256-cbc',
};

const HEX = /^[0-9a-fA-F]+$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export interface EnvelopeKeyMaterial {
	/** Hex AES key for envelopes this process sends. */
	readonly requestKey: string;
	/** Hex AES key for envelopes upstream sends back. */
	readonly responseKey: string;
	/** Fixed 8-byte IV halves, hex; the envelope names one by index. */
	readonly ivPrefixes: readonly string[];
}

interface CipherKey {
	readonly algorithm: string;
	readonly key: Buffer;
}

function parseKey(label: string, hex: string): CipherKey {
	const key = HEX.test(hex) && hex.length % 2 === 0 ? Buffer.from(hex, 'hex') : Buffer.alloc(0);
	const algorithm = CBC_ALGORITHMS[key.length];
	if (!algorithm) {
		throw new Error(`${label} key must be 16, 24 or 32 bytes of hex`);
	}
	return { algorithm, key };
}

function parseIvPrefixes(prefixes: readonly string[]): readonly Buffer[] {
	if (prefixes.length === 0 || prefixes.length > MAX_IV_PREFIXES) {
		throw new Error(`Between 1 and ${MAX_IV_PREFIXES} IV prefixes are required, got ${prefixes.length}`);
	}
	return Object.freeze(
		prefixes.map((prefix, index) => {
			if (prefix.length !== IV_PREFIX_HEX_LENGTH || !HEX.test(prefix)) {
				throw new Error(`IV prefix ${index} must be ${IV_PREFIX_HEX_LENGTH} hex characters`);
			}
			return Buffer.from(prefix, 'hex');
		}),
	);
}

function malformed(message: string): GatewayError {
	return new GatewayError('MalformedPayload', message);
}

/**
 * AES-CBC envelopes in the upstream wire format.
 *
 * Request envelope: `nonce(16 hex) | prefixIndex(1 digit) | base64(ciphertext)`,
 * IV = ivPrefixes[prefixIndex] | nonce.
 * Response envelope: `iv(32 hex) | base64(ciphertext)`.
 *
 * Key material is read once at construction and never changes afterwards.
 */
export class EnvelopeCodec implements IEnvelopeCodec {
	private readonly requestKey: CipherKey;
	private readonly responseKey: CipherKey;
	private readonly ivPrefixes: readonly Buffer[];
	private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

	constructor(material: EnvelopeKeyMaterial) {
		this.requestKey = parseKey('Request', material.requestKey);
		this.responseKey = parseKey('Response', material.responseKey);
		this.ivPrefixes = parseIvPrefixes(material.ivPrefixes);
	}

	encrypt(plaintext: JsonValue): string {
		const nonce = randomBytes(NONCE_LENGTH);
		const index = randomInt(this.ivPrefixes.length);
		const iv = Buffer.concat([this.prefixAt(index), nonce]);

		const cipher = createCipheriv(this.requestKey.algorithm, this.requestKey.key, iv);
		const ciphertext = Buffer.concat([
			cipher.update(JSON.stringify(plaintext), 'utf-8'),
			cipher.final(),
		]);

		return `${nonce.toString('hex')}${index}${ciphertext.toString('base64')}`;
	}

	decrypt(envelope: string): JsonValue {
		const trimmed = envelope.trim();
		if (trimmed.length <= NONCE_HEX_LENGTH + 1) {
			throw malformed('Request envelope is too short');
		}

		const nonceHex = trimmed.slice(0, NONCE_HEX_LENGTH);
		if (!HEX.test(nonceHex)) {
			throw malformed('Request envelope nonce is not hex');
		}

		const indexChar = trimmed.charAt(NONCE_HEX_LENGTH);
		const index = /^[0-9]$/.test(indexChar) ? Number(indexChar) : -1;
		if (index < 0 || index >= this.ivPrefixes.length) {
			throw malformed(`Request envelope names unknown IV prefix "${indexChar}"`);
		}

		const iv = Buffer.concat([this.prefixAt(index), Buffer.from(nonceHex, 'hex')]);
		return this.open(this.requestKey, iv, trimmed.slice(NONCE_HEX_LENGTH + 1));
	}

	decryptResponse(envelope: string): JsonValue {
		const trimmed = envelope.trim();
		if (trimmed.length <= IV_HEX_LENGTH) {
			throw malformed('Response envelope is too short');
		}

		const ivHex = trimmed.slice(0, IV_HEX_LENGTH);
		if (!HEX.test(ivHex)) {
			throw malformed('Response envelope IV is not hex');
		}

		return this.open(this.responseKey, Buffer.from(ivHex, 'hex'), trimmed.slice(IV_HEX_LENGTH));
	}

	private prefixAt(index: number): Buffer {
		const prefix = this.ivPrefixes[index];
		if (!prefix) {
			throw malformed(`IV prefix ${index} is not configured`);
		}
		return prefix;
	}

	private open(cipherKey: CipherKey, iv: Buffer, body: string): JsonValue {
		if (!BASE64.test(body)) {
			throw malformed('Envelope ciphertext is not base64');
		}
		const ciphertext = Buffer.from(body, 'base64');
		if (ciphertext.length === 0 || ciphertext.length % BLOCK_SIZE !== 0) {
			throw malformed(`Envelope ciphertext is not a whole number of ${BLOCK_SIZE}-byte blocks`);
		}

		let plaintext: string;
		try {
			const decipher = createDecipheriv(cipherKey.algorithm, cipherKey.key, iv);
			plaintext = this.utf8.decode(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
		} catch (error) {
			throw new GatewayError('DecryptionFailure', 'Envelope failed the cipher integrity check', undefined, {
				cause: error,
			});
		}

		try {
			const value: JsonValue = JSON.parse(plaintext);
			return value;
		} catch (error) {
			throw new GatewayError('DecryptionFailure', 'Decrypted envelope is not valid JSON', undefined, {
				cause: error,
			});
		}
	}
}
