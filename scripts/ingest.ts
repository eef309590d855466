/**
 * Ingestion CLI
 * Boots the application context and writes generated customers into both stores.
 *
 * Usage: npm run ingest -- --count 1000 --batch-size 100
 */

import 'reflect-metadata';
import { parseArgs } from 'util';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from '../src/app.module';
import { IngestionService } from '../src/ingestion';

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
        throw new Error(`--${name} must be a positive integer, got '${raw}'`);
    }
    return value;
}

async function main(): Promise<void> {
    const { values } = parseArgs({
        options: {
            count: { type: 'string', short: 'n' },
            'batch-size': { type: 'string', short: 'b' },
        },
    });

    const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
    app.useLogger(app.get(Logger));

    try {
        const ingestion = app.get(IngestionService);
        const count = positiveInt('count', values.count, 1000);
        const batchSize = positiveInt('batch-size', values['batch-size'], ingestion.defaultBatchSize);

        const summary = await ingestion.ingest(batchSize, count);
        console.log(JSON.stringify(summary, null, 2));

        if (!summary.storesAgree) {
            process.exitCode = 2;
        }
    } finally {
        await app.close();
    }
}

main().catch((error: unknown) => {
    console.error('Ingestion failed:', error);
    process.exit(1);
});
