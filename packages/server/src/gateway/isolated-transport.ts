import type { ISessionFactory, IUpstreamSession } from '@courtgate/core';
import { Logger } from '@nestjs/common';
import { describeError } from './error-translator.js';
import { GatewayError } from './gateway-error.js';

export const DEFAULT_DEADLINE_MS = 20_000;

export interface SessionOptions {
	readonly deadlineMs?: number;
	readonly signal?: AbortSignal;
}

export type SessionBody<T> = (session: IUpstreamSession, signal: AbortSignal) => Promise<T>;

function cancelled(): GatewayError {
	return new GatewayError('InternalError', 'Operation cancelled by caller', { reason: 'cancelled' });
}

/**
 * Hands each operation its own upstream session and tears it down when the
 * operation ends, however it ends. Nothing survives between two calls.
 */
export class IsolatedTransport {
	private readonly logger = new Logger(IsolatedTransport.name);
	private openSessions = 0;

	constructor(
		private readonly sessions: ISessionFactory,
		private readonly defaultDeadlineMs: number = DEFAULT_DEADLINE_MS,
	) {}

	get activeSessions(): number {
		return this.openSessions;
	}

	async withSession<T>(body: SessionBody<T>, options: SessionOptions = {}): Promise<T> {
		const { signal: callerSignal } = options;
		if (callerSignal?.aborted) {
			throw cancelled();
		}

		const deadlineMs = options.deadlineMs ?? this.defaultDeadlineMs;
		const session = this.sessions.open();
		this.openSessions++;

		const controller = new AbortController();
		const timer = setTimeout(() => {
			controller.abort(
				new GatewayError('UpstreamTimeout', `Upstream did not answer within ${deadlineMs}ms`, {
					deadlineMs,
				}),
			);
		}, deadlineMs);
		const onCallerAbort = () => controller.abort(cancelled());
		callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

		const interrupted = new Promise<never>((_, reject) => {
			controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
				once: true,
			});
		});

		try {
			return await Promise.race([body(session, controller.signal), interrupted]);
		} catch (error) {
			if (controller.signal.aborted) {
				throw controller.signal.reason;
			}
			throw error;
		} finally {
			clearTimeout(timer);
			callerSignal?.removeEventListener('abort', onCallerAbort);
			this.openSessions--;
			try {
				await session.close();
			} catch (error) {
				this.logger.warn(`Failed to close upstream session ${session.id}: ${describeError(error)}`);
			}
		}
	}
}
