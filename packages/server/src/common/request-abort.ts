import type { Response } from 'express';

/** Aborts when the client goes away before the response was written. */
export function abortSignalFor(res: Response): AbortSignal {
	const controller = new AbortController();
	if (res.destroyed || res.req.destroyed) {
		// 'close' has already fired
		controller.abort();
		return controller.signal;
	}
	res.once('close', () => {
		if (!res.writableFinished) controller.abort();
	});
	return controller.signal;
}
