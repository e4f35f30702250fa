function requireEnv(name: string): string {
	const value = process.env[name];
	if (!value) throw new Error(`Missing required env var: ${name}`);
	return value;
}

function optionalEnv(name: string, fallback: string): string {
	return process.env[name] || fallback;
}

export interface AppConfig {
	readonly NODE_ENV: string;
	readonly PORT: number;
	readonly ALLOWED_ORIGINS: string[];

	// Upstream
	readonly UPSTREAM_BASE_URL: string;
	readonly UPSTREAM_TIMEOUT_MS: number;
	readonly UPSTREAM_USER_AGENT: string;
	readonly UPSTREAM_DEVICE_ID: string;
	readonly UPSTREAM_APP_ID: string;
	readonly UPSTREAM_APP_VERSION: string;

	// Envelope key material (hex)
	readonly ENVELOPE_REQUEST_KEY: string;
	readonly ENVELOPE_RESPONSE_KEY: string;
	readonly ENVELOPE_IV_PREFIXES: string[];
}

function parseIntInRange(name: string, fallback: string, min: number, max: number): number {
	const val = Number.parseInt(optionalEnv(name, fallback), 10);
	if (Number.isNaN(val) || val < min || val > max) {
		throw new Error(`${name} must be an integer between ${min} and ${max}`);
	}
	return val;
}

function parseBaseUrl(name: string): string {
	const raw = requireEnv(name);
	let url: URL;
	try {
		url = new URL(raw);
	} catch {
		throw new Error(`${name} must be an absolute URL, got: ${raw}`);
	}
	if (url.protocol !== 'https:' && url.protocol !== 'http:') {
		throw new Error(`${name} must use http or https, got: ${url.protocol}`);
	}
	return raw;
}

function parseList(value: string): string[] {
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);
}

export function parseConfig(): AppConfig {
	const portStr = process.env.PORT;
	const port = portStr ? Number.parseInt(portStr, 10) : 8000;
	if (Number.isNaN(port)) {
		throw new Error(`PORT must be a valid number, got: ${portStr}`);
	}

	const ivPrefixes = parseList(requireEnv('ENVELOPE_IV_PREFIXES'));
	if (ivPrefixes.length === 0) {
		throw new Error('ENVELOPE_IV_PREFIXES must list at least one prefix');
	}

	return Object.freeze({
		NODE_ENV: optionalEnv('NODE_ENV', 'development'),
		PORT: port,
		ALLOWED_ORIGINS: parseList(optionalEnv('ALLOWED_ORIGINS', 'http://localhost:3000')),

		UPSTREAM_BASE_URL: parseBaseUrl('UPSTREAM_BASE_URL'),
		UPSTREAM_TIMEOUT_MS: parseIntInRange('UPSTREAM_TIMEOUT_MS', '20000', 1, 120_000),
		UPSTREAM_USER_AGENT: optionalEnv('UPSTREAM_USER_AGENT', 'Dalvik/2.1.0 (Linux; U; Android 14)'),
		UPSTREAM_DEVICE_ID: requireEnv('UPSTREAM_DEVICE_ID'),
		UPSTREAM_APP_ID: optionalEnv('UPSTREAM_APP_ID', 'in.gov.ecourts.eCourtsServices'),
		UPSTREAM_APP_VERSION: optionalEnv('UPSTREAM_APP_VERSION', '3.0'),

		ENVELOPE_REQUEST_KEY: requireEnv('ENVELOPE_REQUEST_KEY'),
		ENVELOPE_RESPONSE_KEY: requireEnv('ENVELOPE_RESPONSE_KEY'),
		ENVELOPE_IV_PREFIXES: ivPrefixes,
	});
}

export const APP_CONFIG = Symbol('APP_CONFIG');
