/**
 * @fileoverview Encryption Algorithm Router
 *
 * Maps a public field name to its encryption spec and checks a query against
 * the operators that spec admits. Pure: no I/O, no mutable state, so one
 * instance is shared by every request.
 */

import { InvalidQueryError, UnknownFieldError } from '../shared/errors';
import { assertValidFieldTable } from './field-encryption.table';
import {
    ALGORITHM_FOR_KIND,
    AlgorithmClass,
    EncryptedFieldEntry,
    EncryptedFieldQuery,
    EncryptedFieldsDocument,
    FieldEncryptionSpec,
    FieldEncryptionTable,
    QUERY_KINDS,
    QueryKind,
    ValidatedQuery,
} from './interfaces';

const PREVIEW_CLASSES: readonly AlgorithmClass[] = [
    AlgorithmClass.PrefixPreview,
    AlgorithmClass.SuffixPreview,
    AlgorithmClass.SubstringPreview,
];

export function isQueryKind(value: string): value is QueryKind {
    return QUERY_KINDS.some((kind) => kind === value);
}

function kindFor(algorithm: AlgorithmClass): QueryKind | undefined {
    return QUERY_KINDS.find((kind) => ALGORITHM_FOR_KIND[kind] === algorithm);
}

export class EncryptionRouter {
    private readonly table: FieldEncryptionTable;

    /**
     * @throws InvalidFieldTableError when the table breaks the combination rules
     */
    constructor(table: FieldEncryptionTable) {
        assertValidFieldTable(table);
        this.table = table;
    }

    fields(): string[] {
        return Object.keys(this.table);
    }

    resolve(field: string): FieldEncryptionSpec {
        const spec = Object.prototype.hasOwnProperty.call(this.table, field) ? this.table[field] : undefined;
        if (!spec) {
            throw new UnknownFieldError(field);
        }
        return spec;
    }

    /**
     * The operator used when a caller names none: the field's first class.
     */
    defaultQueryKind(field: string): QueryKind {
        const spec = this.resolve(field);
        const kind = kindFor(spec.algorithms[0]);
        if (!kind) {
            throw new InvalidQueryError(`Field '${field}' is not queryable`);
        }
        return kind;
    }

    /**
     * Validates a query locally, before any store is contacted.
     *
     * @throws UnknownFieldError for fields missing from the table
     * @throws InvalidQueryError for unsupported operators or out-of-bounds values
     */
    validate(field: string, kind: QueryKind | undefined, value: string): ValidatedQuery {
        const spec = this.resolve(field);
        const queryKind = kind ?? this.defaultQueryKind(field);
        const algorithm = ALGORITHM_FOR_KIND[queryKind];

        if (!spec.algorithms.includes(algorithm)) {
            const supported = spec.algorithms
                .map(kindFor)
                .filter((k): k is QueryKind => k !== undefined);
            throw new InvalidQueryError(
                supported.length > 0
                    ? `Field '${field}' does not support ${queryKind} queries (supported: ${supported.join(', ')})`
                    : `Field '${field}' is not queryable`,
            );
        }

        if (value.trim().length === 0) {
            throw new InvalidQueryError(`Query value for '${field}' must not be empty`);
        }

        if (PREVIEW_CLASSES.includes(algorithm)) {
            const length = [...value].length;
            const min = spec.minQueryLength ?? 1;
            if (length < min) {
                throw new InvalidQueryError(
                    `Query value for '${field}' must be at least ${min} characters for ${queryKind} search`,
                );
            }
            if (spec.maxQueryLength !== undefined && length > spec.maxQueryLength) {
                throw new InvalidQueryError(
                    `Query value for '${field}' must be at most ${spec.maxQueryLength} characters for ${queryKind} search`,
                );
            }
        }

        return { spec, kind: queryKind, algorithm, value };
    }

    /**
     * The `encryptedFields` document a search-store collection is created with.
     */
    encryptedFields(): EncryptedFieldsDocument {
        return {
            fields: Object.values(this.table).map((spec) => {
                const entry: EncryptedFieldEntry = { path: spec.path, bsonType: spec.bsonType, keyId: null };
                const queries = spec.algorithms
                    .filter((algorithm) => algorithm !== AlgorithmClass.Unindexed)
                    .map((algorithm) => this.queryFor(spec, algorithm));
                if (queries.length > 0) {
                    entry.queries = queries;
                }
                return entry;
            }),
        };
    }

    private queryFor(spec: FieldEncryptionSpec, algorithm: AlgorithmClass): EncryptedFieldQuery {
        switch (algorithm) {
            case AlgorithmClass.Equality:
                return { queryType: AlgorithmClass.Equality, contention: spec.contention };
            case AlgorithmClass.PrefixPreview:
            case AlgorithmClass.SuffixPreview:
                return {
                    queryType: algorithm,
                    strMinQueryLength: spec.minQueryLength ?? 1,
                    strMaxQueryLength: spec.maxQueryLength,
                    caseSensitive: spec.caseSensitive,
                    diacriticSensitive: spec.diacriticSensitive,
                };
            case AlgorithmClass.SubstringPreview:
                return {
                    queryType: AlgorithmClass.SubstringPreview,
                    strMaxLength: spec.maxLength,
                    strMinQueryLength: spec.minQueryLength ?? 1,
                    strMaxQueryLength: spec.maxQueryLength,
                    caseSensitive: spec.caseSensitive,
                    diacriticSensitive: spec.diacriticSensitive,
                };
            case AlgorithmClass.Unindexed:
                throw new InvalidQueryError(`Field '${spec.field}' is not queryable`);
        }
    }
}
