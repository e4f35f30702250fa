import { Controller, Get } from '@nestjs/common';

@Controller('health')
export class HealthController {
	/** Liveness only; upstream is not probed because every probe would cost a token. */
	@Get()
	check() {
		return {
			status: 'ok',
			uptime: Math.floor(process.uptime()),
			timestamp: new Date().toISOString(),
		};
	}
}
