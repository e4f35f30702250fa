import type { JsonObject, JsonValue } from '@courtgate/core';

export function isJsonObject(value: JsonValue): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Upstream answers "no data" with a plain JSON body instead of an envelope.
 * Returns the parsed body in that case and `undefined` for anything else.
 */
export function parsePlainJson(body: string): JsonValue | undefined {
	const trimmed = body.trim();
	if (trimmed.length === 0) return undefined;
	try {
		const parsed: JsonValue = JSON.parse(trimmed);
		return parsed;
	} catch {
		return undefined;
	}
}
