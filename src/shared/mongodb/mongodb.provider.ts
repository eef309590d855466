/**
 * @fileoverview MongoDB Provider
 *
 * Owns the auto-encrypting MongoDB client behind the search store. On module
 * init it makes sure the key vault and the encrypted collection exist, then
 * opens a client that encrypts queries and decrypts results transparently.
 *
 * @remarks
 * Two clients are involved:
 * - a plain setup client, used once to create data keys and the collection
 *   through `ClientEncryption.createEncryptedCollection`;
 * - the long-lived client with `autoEncryption`, handed to the store adapter.
 *
 * Automatic encryption needs the `mongodb-client-encryption` package and the
 * crypt_shared library (`CRYPT_SHARED_LIB_PATH`) or mongocryptd.
 */

import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AutoEncryptionOptions, ClientEncryption, Collection, Db, Document, KMSProviders, MongoClient } from 'mongodb';
import { EncryptionRouter } from '../../encryption';
import { SearchUnavailableError } from '../errors';

/* -------------------------------------------------------------------------- */
/*                              Provider Implementation                        */
/* -------------------------------------------------------------------------- */

@Injectable()
export class MongoDbProvider implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(MongoDbProvider.name);

    /** Auto-encrypting client, set once connected. */
    private client?: MongoClient;
    private db?: Db;

    constructor(
        private readonly configService: ConfigService,
        private readonly router: EncryptionRouter,
    ) { }

    async onModuleInit(): Promise<void> {
        await this.connect();
    }

    async onModuleDestroy(): Promise<void> {
        await this.client?.close();
    }

    /**
     * Returns the encrypted customer collection.
     *
     * @throws SearchUnavailableError before the provider has connected
     */
    getCollection<TSchema extends Document>(): Collection<TSchema> {
        if (!this.db) {
            throw new SearchUnavailableError('Search store is not connected');
        }
        return this.db.collection<TSchema>(this.collectionName);
    }

    /**
     * Pings the server.
     *
     * @returns True when the server answered
     */
    async healthCheck(): Promise<boolean> {
        if (!this.db) {
            return false;
        }
        try {
            await this.db.command({ ping: 1 });
            return true;
        } catch (error) {
            this.logger.warn({ msg: 'Search store ping failed', error });
            return false;
        }
    }

    private get collectionName(): string {
        return this.configService.get<string>('MONGODB_COLLECTION', 'customers');
    }

    private async connect(): Promise<void> {
        const uri = this.configService.getOrThrow<string>('MONGODB_URI');
        const databaseName = this.configService.get<string>('MONGODB_DATABASE', 'customer_search');
        const keyVaultNamespace = this.configService.get<string>(
            'MONGODB_KEY_VAULT_NAMESPACE',
            'encryption.__keyVault',
        );
        const kmsProviders: KMSProviders = {
            local: { key: Buffer.from(this.configService.getOrThrow<string>('ENCRYPTION_MASTER_KEY'), 'base64') },
        };

        const setupClient = new MongoClient(uri);
        let encryptedFields: Document;
        try {
            await setupClient.connect();
            encryptedFields = await this.ensureEncryptedCollection(
                setupClient,
                databaseName,
                keyVaultNamespace,
                kmsProviders,
            );
        } finally {
            await setupClient.close();
        }

        const cryptSharedLibPath = this.configService.get<string>('CRYPT_SHARED_LIB_PATH');
        const autoEncryption: AutoEncryptionOptions = {
            keyVaultNamespace,
            kmsProviders,
            encryptedFieldsMap: { [`${databaseName}.${this.collectionName}`]: encryptedFields },
            extraOptions: cryptSharedLibPath
                ? { cryptSharedLibPath, cryptSharedLibRequired: true }
                : undefined,
        };

        this.client = new MongoClient(uri, { autoEncryption });
        await this.client.connect();
        this.db = this.client.db(databaseName);

        await this.db
            .collection(this.collectionName)
            .createIndex({ customer_id: 1 }, { unique: true, name: 'customer_id_unique' });

        this.logger.log({
            msg: 'Search store connected',
            database: databaseName,
            collection: this.collectionName,
            encryptedFields: this.router.fields().length,
        });
    }

    /**
     * Creates the key vault index and the encrypted collection when missing.
     * Idempotent: an existing collection keeps its key ids.
     *
     * @returns The collection's encryptedFields, key ids included
     */
    private async ensureEncryptedCollection(
        client: MongoClient,
        databaseName: string,
        keyVaultNamespace: string,
        kmsProviders: KMSProviders,
    ): Promise<Document> {
        const db = client.db(databaseName);
        const [existing] = await db.listCollections({ name: this.collectionName }).toArray();
        const current: unknown = existing && 'options' in existing ? existing.options?.encryptedFields : undefined;

        if (current && typeof current === 'object') {
            return { ...current };
        }

        const [vaultDbName, vaultCollectionName] = keyVaultNamespace.split('.', 2);
        await client
            .db(vaultDbName)
            .collection(vaultCollectionName)
            .createIndex(
                { keyAltNames: 1 },
                { unique: true, partialFilterExpression: { keyAltNames: { $exists: true } } },
            );

        const clientEncryption = new ClientEncryption(client, { keyVaultNamespace, kmsProviders });
        const { encryptedFields } = await clientEncryption.createEncryptedCollection(db, this.collectionName, {
            provider: 'local',
            createCollectionOptions: { encryptedFields: { fields: this.router.encryptedFields().fields } },
        });

        this.logger.log({ msg: 'Encrypted collection created', collection: this.collectionName });
        return encryptedFields;
    }
}
