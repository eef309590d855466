/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, the record store
 * connection and the feature modules.
 */

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule } from './config/config.module';
import { CustomerEntity } from './customers/entities';
import { IngestionModule } from './ingestion';
import { SearchModule } from './search';
import { CoreExceptionFilter } from './shared/errors';
import { VirtualizationModule } from './virtualization';

interface SerializedRequest {
    id?: string | number;
    method?: string;
    url?: string;
}

@Module({
    imports: [
        // Logging
        LoggerModule.forRoot({
            pinoHttp: {
                level: process.env.NODE_ENV === 'production' ? 'info' : 'debug',
                transport: process.env.NODE_ENV === 'production'
                    ? undefined // JSON output
                    : {
                        targets: [
                            {
                                target: 'pino-pretty',
                                level: 'debug',
                                options: { colorize: true },
                            },
                            {
                                target: 'pino-loki',
                                level: 'info',
                                options: {
                                    host: process.env.LOKI_HOST || 'http://localhost:3100',
                                    labels: { app: 'customer-dual-store-search' },
                                    batching: true,
                                    interval: 5,
                                },
                            },
                        ],
                    },
                // Search values are plaintext PII; log the route without its query string
                serializers: {
                    req: (req: SerializedRequest) => ({
                        id: req.id,
                        method: req.method,
                        url: req.url?.split('?')[0],
                    }),
                },
                redact: ['req.headers.authorization', 'res.headers["set-cookie"]'],
            },
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: true },
        }),

        // TypeORM for PostgreSQL (record store)
        TypeOrmModule.forRootAsync({
            imports: [NestConfigModule],
            inject: [ConfigService],
            useFactory: (config: ConfigService) => {
                const isProduction = config.get('NODE_ENV') === 'production';
                const password = config.get<string>('POSTGRES_PASSWORD');

                // SECURITY: Require explicit password in production
                if (isProduction && !password) {
                    throw new Error(
                        'CRITICAL: POSTGRES_PASSWORD must be set in production'
                    );
                }

                return {
                    type: 'postgres',
                    host: config.get<string>('POSTGRES_HOST', 'localhost'),
                    port: config.get<number>('POSTGRES_PORT', 5432),
                    username: config.get<string>('POSTGRES_USER', 'postgres'),
                    password: password || 'postgres', // Default only for local dev
                    database: config.get<string>('POSTGRES_DB', 'customers'),
                    entities: [CustomerEntity],
                    // pgcrypto and the table come from sql/schema.sql
                    synchronize: false,
                    logging: !isProduction,
                };
            },
        }),

        // Shared modules
        ConfigModule,

        // Feature modules
        SearchModule,
        IngestionModule,
        VirtualizationModule,
    ],
    providers: [{ provide: APP_FILTER, useClass: CoreExceptionFilter }],
})
export class AppModule { }
