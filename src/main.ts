// OpenTelemetry must be imported FIRST before any other imports
import { shutdownTracing } from './shared/tracing/tracing';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

async function bootstrap() {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    // Use Pino logger
    app.useLogger(app.get(Logger));
    app.enableShutdownHooks();
    app.getHttpServer().on('close', () => {
        void shutdownTracing();
    });

    // Swagger API documentation
    const config = new DocumentBuilder()
        .setTitle('Customer Dual-Store Search API')
        .setDescription('Encrypted customer search over a queryable-encryption search store and a pgcrypto record store')
        .setVersion('1.0')
        .addTag('customers', 'Mode-switched customer search')
        .addTag('admin', 'Dual-store ingestion')
        .addTag('virtualization', 'Gated search through the data-virtualization server')
        .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api-docs', app, document);

    const port = process.env.PORT ?? 3000;
    await app.listen(port);

    console.log(`Customer Dual-Store Search API running on http://localhost:${port}`);
    console.log(`Swagger docs available at http://localhost:${port}/api-docs`);
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start', error);
    process.exit(1);
});
