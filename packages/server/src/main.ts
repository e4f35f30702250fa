import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';
import { APP_CONFIG, type AppConfig } from './common/config.js';

async function bootstrap() {
	const app = await NestFactory.create<NestExpressApplication>(AppModule);
	const logger = new Logger('Bootstrap');

	const config = app.get<AppConfig>(APP_CONFIG);

	app.useBodyParser('json', { limit: '64kb' });

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);

	app.enableCors({
		origin: config.ALLOWED_ORIGINS,
	});

	app.enableShutdownHooks();
	app.setGlobalPrefix('api/v1');
	await app.listen(config.PORT);
	logger.log(`Server running on port ${config.PORT}, CORS origins: ${config.ALLOWED_ORIGINS.join(', ')}`);
}

bootstrap().catch((error: unknown) => {
	new Logger('Bootstrap').error(
		`Failed to start: ${error instanceof Error ? error.message : String(error)}`,
		error instanceof Error ? error.stack : undefined,
	);
	process.exit(1);
});
