/**
 * @fileoverview Field Encryption Table
 *
 * Default field table matching the deployed search-store schema, plus a
 * loader for a replacement table supplied as JSON through configuration.
 */

import { z } from 'zod';
import { InvalidFieldTableError } from '../shared/errors';
import { AlgorithmClass, FieldEncryptionSpec, FieldEncryptionTable } from './interfaces';

const PREVIEW_CLASSES: readonly AlgorithmClass[] = [
    AlgorithmClass.PrefixPreview,
    AlgorithmClass.SuffixPreview,
    AlgorithmClass.SubstringPreview,
];

function unindexed(field: string, path: string, bsonType: FieldEncryptionSpec['bsonType']): FieldEncryptionSpec {
    return {
        field,
        path,
        bsonType,
        algorithms: [AlgorithmClass.Unindexed],
        caseSensitive: true,
        diacriticSensitive: true,
        contention: 0,
    };
}

export const DEFAULT_FIELD_ENCRYPTION_TABLE: FieldEncryptionTable = {
    name: {
        field: 'name',
        path: 'searchable_name',
        bsonType: 'string',
        algorithms: [AlgorithmClass.SubstringPreview],
        minQueryLength: 2,
        maxQueryLength: 10,
        maxLength: 60,
        caseSensitive: false,
        diacriticSensitive: false,
        contention: 0,
    },
    email: {
        field: 'email',
        path: 'searchable_email',
        bsonType: 'string',
        algorithms: [AlgorithmClass.PrefixPreview],
        minQueryLength: 1,
        maxQueryLength: 50,
        maxLength: 100,
        caseSensitive: false,
        diacriticSensitive: false,
        contention: 0,
    },
    phone: {
        field: 'phone',
        path: 'searchable_phone',
        bsonType: 'string',
        algorithms: [AlgorithmClass.Equality],
        caseSensitive: true,
        diacriticSensitive: true,
        contention: 0,
    },
    category: {
        field: 'category',
        path: 'metadata.category',
        bsonType: 'string',
        algorithms: [AlgorithmClass.Equality],
        caseSensitive: true,
        diacriticSensitive: true,
        contention: 0,
    },
    status: {
        field: 'status',
        path: 'metadata.status',
        bsonType: 'string',
        algorithms: [AlgorithmClass.Equality],
        caseSensitive: true,
        diacriticSensitive: true,
        contention: 0,
    },
    address: unindexed('address', 'address', 'object'),
    preferences: unindexed('preferences', 'preferences', 'object'),
    tier: unindexed('tier', 'metadata.tier', 'string'),
    loyalty_points: unindexed('loyalty_points', 'metadata.loyalty_points', 'int'),
    last_purchase_date: unindexed('last_purchase_date', 'metadata.last_purchase_date', 'string'),
    lifetime_value: unindexed('lifetime_value', 'metadata.lifetime_value', 'double'),
};

/* -------------------------------------------------------------------------- */
/*                              Table validation                               */
/* -------------------------------------------------------------------------- */

/**
 * Checks the combination rules of the backing store:
 * a field carries one or two classes; SubstringPreview and Unindexed stand
 * alone; the only permitted pair is PrefixPreview + SuffixPreview.
 *
 * @throws InvalidFieldTableError listing every violation found
 */
export function assertValidFieldTable(table: FieldEncryptionTable): void {
    const problems: string[] = [];

    for (const [key, spec] of Object.entries(table)) {
        const classes = spec.algorithms;
        const label = `field '${key}'`;

        if (spec.field !== key) {
            problems.push(`${label} is registered under a different name ('${spec.field}')`);
        }
        if (classes.length < 1 || classes.length > 2) {
            problems.push(`${label} must carry one or two algorithm classes, found ${classes.length}`);
        }
        if (new Set(classes).size !== classes.length) {
            problems.push(`${label} repeats an algorithm class`);
        }
        if (classes.length > 1) {
            if (classes.includes(AlgorithmClass.SubstringPreview)) {
                problems.push(`${label} combines substringPreview with another class`);
            }
            if (classes.includes(AlgorithmClass.Unindexed)) {
                problems.push(`${label} combines unindexed with another class`);
            }
            const isPrefixSuffixPair =
                classes.includes(AlgorithmClass.PrefixPreview) && classes.includes(AlgorithmClass.SuffixPreview);
            if (!isPrefixSuffixPair) {
                problems.push(`${label} may only pair prefixPreview with suffixPreview`);
            }
        }

        if (classes.some((c) => PREVIEW_CLASSES.includes(c))) {
            if (spec.bsonType !== 'string') {
                problems.push(`${label} uses a preview class on a non-string type`);
            }
            if (spec.maxQueryLength === undefined) {
                problems.push(`${label} must declare maxQueryLength`);
            }
            const min = spec.minQueryLength ?? 1;
            if (min < 1) {
                problems.push(`${label} has minQueryLength below 1`);
            }
            if (spec.maxQueryLength !== undefined && min > spec.maxQueryLength) {
                problems.push(`${label} has minQueryLength above maxQueryLength`);
            }
            if (
                spec.maxLength !== undefined &&
                spec.maxQueryLength !== undefined &&
                spec.maxQueryLength > spec.maxLength
            ) {
                problems.push(`${label} has maxQueryLength above maxLength`);
            }
        }
        if (classes.includes(AlgorithmClass.SubstringPreview) && spec.maxLength === undefined) {
            problems.push(`${label} must declare maxLength for substringPreview`);
        }
    }

    if (problems.length > 0) {
        throw new InvalidFieldTableError(`Invalid field encryption table: ${problems.join('; ')}`);
    }
}

/* -------------------------------------------------------------------------- */
/*                              JSON loading                                   */
/* -------------------------------------------------------------------------- */

const FieldSpecSchema = z.object({
    field: z.string().min(1),
    path: z.string().min(1),
    bsonType: z.enum(['string', 'int', 'double', 'bool', 'object', 'date']),
    algorithms: z.array(z.nativeEnum(AlgorithmClass)),
    minQueryLength: z.number().int().optional(),
    maxQueryLength: z.number().int().positive().optional(),
    maxLength: z.number().int().positive().optional(),
    caseSensitive: z.boolean().default(true),
    diacriticSensitive: z.boolean().default(true),
    contention: z.number().int().min(0).default(0),
});

const FieldTableSchema = z.record(FieldSpecSchema);

/**
 * Resolves the effective table: the JSON override when given, else the default.
 */
export function loadFieldEncryptionTable(json?: string): FieldEncryptionTable {
    if (!json) {
        return DEFAULT_FIELD_ENCRYPTION_TABLE;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new InvalidFieldTableError('FIELD_ENCRYPTION_TABLE is not valid JSON', { cause: error });
    }

    const result = FieldTableSchema.safeParse(raw);
    if (!result.success) {
        throw new InvalidFieldTableError(`FIELD_ENCRYPTION_TABLE is malformed: ${result.error.message}`);
    }
    return result.data;
}
