/**
 * @fileoverview Encryption Module
 *
 * Builds the process-wide {@link EncryptionRouter} from configuration. An
 * invalid field table aborts startup here.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EncryptionRouter } from './encryption-router';
import { loadFieldEncryptionTable } from './field-encryption.table';

@Module({
    providers: [
        {
            provide: EncryptionRouter,
            inject: [ConfigService],
            useFactory: (config: ConfigService) =>
                new EncryptionRouter(loadFieldEncryptionTable(config.get<string>('FIELD_ENCRYPTION_TABLE'))),
        },
    ],
    exports: [EncryptionRouter],
})
export class EncryptionModule { }
