/**
 * @fileoverview Customer Generator
 *
 * Produces synthetic candidate records for ingestion from a small seed
 * vocabulary. Identifiers are fresh UUIDs; values are random within the
 * ranges the record store schema accepts.
 */

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import vocabularyJson from './data/customer-vocabulary.json';
import { CustomerRecord } from './interfaces';

const VocabularySchema = z.object({
    firstNames: z.array(z.string().min(1)).nonempty(),
    lastNames: z.array(z.string().min(1)).nonempty(),
    streets: z.array(z.string().min(1)).nonempty(),
    cities: z.array(z.object({ city: z.string(), state: z.string().length(2) })).nonempty(),
    tiers: z.array(z.string()).nonempty(),
    categories: z.array(z.string()).nonempty(),
    statuses: z.array(z.string()).nonempty(),
});

export type CustomerVocabulary = z.infer<typeof VocabularySchema>;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Runs larger than this get a sequence number in every email address. */
const EMAIL_SUFFIX_THRESHOLD = 50;

export interface GenerateOptions {
    /** Position of the first record within the whole run. */
    startIndex: number;
    /** Size of the whole run. */
    runSize: number;
}

/** Anything that can hand the ingestion coordinator candidate records. */
export interface CustomerSource {
    generate(count: number, options: GenerateOptions): CustomerRecord[];
}

@Injectable()
export class CustomerGenerator implements CustomerSource {
    private readonly vocabulary: CustomerVocabulary = VocabularySchema.parse(vocabularyJson);

    generate(count: number, options: GenerateOptions): CustomerRecord[] {
        const records: CustomerRecord[] = [];
        for (let i = 0; i < count; i++) {
            records.push(this.generateOne(options.startIndex + i, options.runSize));
        }
        return records;
    }

    private generateOne(index: number, runSize: number): CustomerRecord {
        const v = this.vocabulary;
        const firstName = this.pick(v.firstNames);
        const lastName = this.pick(v.lastNames);
        const emailSuffix = runSize > EMAIL_SUFFIX_THRESHOLD ? String(index + 1) : '';
        const location = this.pick(v.cities);

        return {
            customer_id: randomUUID(),
            full_name: `${firstName} ${lastName}`,
            email: `${firstName.toLowerCase()}.${lastName.toLowerCase()}${emailSuffix}@example.com`,
            phone: `+1-555-${this.integer(1000, 9999)}`,
            address: {
                street: `${this.integer(100, 9999)} ${this.pick(v.streets)} St`,
                city: location.city,
                state: location.state,
                zip_code: String(this.integer(10000, 99999)),
            },
            preferences: {
                newsletter: Math.random() < 0.5,
                sms: Math.random() < 0.5,
            },
            tier: this.pick(v.tiers),
            category: this.pick(v.categories),
            status: this.pick(v.statuses),
            loyalty_points: this.integer(0, 1000),
            last_purchase_date: new Date(Date.now() - this.integer(1, 365) * DAY_MS).toISOString(),
            lifetime_value: Math.round((100 + Math.random() * 9900) * 100) / 100,
        };
    }

    /** Inclusive on both ends. */
    private integer(min: number, max: number): number {
        return min + Math.floor(Math.random() * (max - min + 1));
    }

    private pick<T>(items: readonly [T, ...T[]]): T {
        return items[Math.floor(Math.random() * items.length)] ?? items[0];
    }
}
