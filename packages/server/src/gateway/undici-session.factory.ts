import { randomUUID } from 'node:crypto';
import type {
	ISessionFactory,
	IUpstreamSession,
	UpstreamRequest,
	UpstreamResponse,
} from '@courtgate/core';
import { Agent, type Dispatcher, request } from 'undici';
import { classifyNetworkError, describeError, errorCode } from './error-translator.js';
import { GatewayError } from './gateway-error.js';

export interface UndiciSessionFactoryOptions {
	readonly baseUrl: string;
	readonly userAgent: string;
	readonly connectTimeoutMs: number;
	/** Builds the dispatcher owned by one session. Defaults to a fresh undici Agent. */
	readonly createDispatcher?: () => Dispatcher;
}

class UndiciSession implements IUpstreamSession {
	readonly id = randomUUID();

	constructor(
		private readonly dispatcher: Dispatcher,
		private readonly baseUrl: URL,
		private readonly headers: Record<string, string>,
	) {}

	async get(req: UpstreamRequest, signal: AbortSignal): Promise<UpstreamResponse> {
		const url = new URL(req.path, this.baseUrl);
		for (const [name, value] of Object.entries(req.query ?? {})) {
			url.searchParams.set(name, value);
		}

		try {
			const response = await request(url, {
				method: 'GET',
				headers: { ...this.headers, ...req.headers },
				dispatcher: this.dispatcher,
				signal,
			});
			const body = await response.body.text();
			return { status: response.statusCode, body };
		} catch (error) {
			if (signal.aborted) throw error;
			throw new GatewayError(
				classifyNetworkError(error) ?? 'UpstreamUnavailable',
				`Upstream request to ${req.path} failed: ${describeError(error)}`,
				{ path: req.path, code: errorCode(error) ?? null },
				{ cause: error },
			);
		}
	}

	/** Tears down the pool at once, failing anything still in flight. */
	async close(): Promise<void> {
		await this.dispatcher.destroy();
	}
}

/** One undici dispatcher, and so one connection pool, per session. */
export class UndiciSessionFactory implements ISessionFactory {
	private readonly baseUrl: URL;
	private readonly headers: Record<string, string>;

	constructor(private readonly options: UndiciSessionFactoryOptions) {
		this.baseUrl = new URL(options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`);
		this.headers = {
			'user-agent': options.userAgent,
			'accept-charset': 'UTF-8',
		};
	}

	open(): IUpstreamSession {
		const dispatcher =
			this.options.createDispatcher?.() ??
			new Agent({ connect: { timeout: this.options.connectTimeoutMs } });
		return new UndiciSession(dispatcher, this.baseUrl, this.headers);
	}
}
