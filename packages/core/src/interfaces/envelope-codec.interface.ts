import type { JsonValue } from '../types/json.js';

export interface IEnvelopeCodec {
	/** Seal a value as a request envelope. Never returns the same string twice. */
	encrypt(plaintext: JsonValue): string;

	/** Open a request envelope produced by `encrypt`. */
	decrypt(envelope: string): JsonValue;

	/** Open an envelope sent back by upstream. */
	decryptResponse(envelope: string): JsonValue;
}
