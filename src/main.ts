import 'reflect-metadata';
import { BadRequestException, INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { ValidationExceptionFilter, flattenValidationErrors } from './common/filters/validation-exception.filter';
import { EnvironmentConfig, EnvironmentConfigFactory } from './config/environment.config';
import { AppModule } from './modules/app.module';
import { LoggerFactory } from './modules/logging';

async function bootstrap(): Promise<void> {
    const bootstrapLogger = LoggerFactory.createFromEnvironment();

    try {
        const app = await NestFactory.create(AppModule, { logger: bootstrapLogger });

        const appLogger = LoggerFactory.createFromEnvironment(app);
        app.useLogger(appLogger);

        const configService = app.get(ConfigService);
        const environmentConfig = EnvironmentConfigFactory.create(configService);

        configureGlobalMiddleware(app, environmentConfig);

        if (!environmentConfig.isProduction) {
            setupSwagger(app, environmentConfig);
        }

        const port = configService.get<number>('port', 3000);
        await app.listen(port);
        appLogger.log(`🚀 Slot booking service running on port ${port} in ${environmentConfig.environment} mode`);
        appLogger.log(`📝 Logging strategy: ${LoggerFactory.getCurrentStrategy()}`);
        if (!environmentConfig.isProduction) {
            appLogger.log(`📚 Swagger available at: http://localhost:${port}/api`);
        }
    } catch (error: unknown) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        bootstrapLogger.error(
            `Failed to start application: ${errorMessage}`,
            error instanceof Error ? error.stack : undefined,
        );
        process.exit(1);
    }
}

function configureGlobalMiddleware(app: INestApplication, environmentConfig: EnvironmentConfig): void {
    // most specific first
    app.useGlobalFilters(new ValidationExceptionFilter(), new GlobalExceptionFilter(app.get(ConfigService)));

    app.useGlobalPipes(
        new ValidationPipe({
            whitelist: true,
            forbidNonWhitelisted: true,
            transform: true,
            disableErrorMessages: environmentConfig.isProduction,
            exceptionFactory: errors =>
                new BadRequestException({ message: flattenValidationErrors(errors), error: 'Bad Request' }),
        }),
    );

    app.enableCors({
        origin: !environmentConfig.isProduction,
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
    });
}

function setupSwagger(app: INestApplication, environmentConfig: EnvironmentConfig): void {
    const config = new DocumentBuilder()
        .setTitle('Slot Booking API')
        .setDescription(`Matched hotel and band slot reservations - ${environmentConfig.environment}`)
        .setVersion('1.0')
        .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('/api', app, document);
}

void bootstrap();
