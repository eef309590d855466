/**
 * @fileoverview Shared MongoDB Module
 *
 * Provides the encrypted search-store client to the customer adapters.
 */

import { Module } from '@nestjs/common';
import { EncryptionModule } from '../../encryption';
import { MongoDbProvider } from './mongodb.provider';

@Module({
    imports: [EncryptionModule],
    providers: [MongoDbProvider],
    exports: [MongoDbProvider],
})
export class SharedMongoDbModule { }
