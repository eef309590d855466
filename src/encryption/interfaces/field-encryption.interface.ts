/**
 * @fileoverview Field encryption types
 *
 * Describes how each customer attribute is encrypted in the search store and
 * which query operators that encryption admits.
 */

/** Encryption algorithm classes offered by the search store. */
export enum AlgorithmClass {
    Equality = 'equality',
    PrefixPreview = 'prefixPreview',
    SuffixPreview = 'suffixPreview',
    SubstringPreview = 'substringPreview',
    Unindexed = 'unindexed',
}

/** Query operator requested by a caller. */
export type QueryKind = 'equality' | 'prefix' | 'suffix' | 'substring';

export const QUERY_KINDS: readonly QueryKind[] = ['equality', 'prefix', 'suffix', 'substring'];

export const ALGORITHM_FOR_KIND: Readonly<Record<QueryKind, AlgorithmClass>> = {
    equality: AlgorithmClass.Equality,
    prefix: AlgorithmClass.PrefixPreview,
    suffix: AlgorithmClass.SuffixPreview,
    substring: AlgorithmClass.SubstringPreview,
};

export type EncryptedBsonType = 'string' | 'int' | 'double' | 'bool' | 'object' | 'date';

export interface FieldEncryptionSpec {
    /** Public field name used by callers. */
    field: string;
    /** Dotted document path in the search store. */
    path: string;
    bsonType: EncryptedBsonType;
    /** One or two classes; see the combination rules in `assertValidFieldTable`. */
    algorithms: readonly AlgorithmClass[];
    minQueryLength?: number;
    maxQueryLength?: number;
    /** Longest value the store indexes; required for substring fields. */
    maxLength?: number;
    caseSensitive: boolean;
    diacriticSensitive: boolean;
    /** Equality contention factor. */
    contention: number;
}

export type FieldEncryptionTable = Readonly<Record<string, FieldEncryptionSpec>>;

/** A query that passed local validation and is safe to send to a store. */
export interface ValidatedQuery {
    spec: FieldEncryptionSpec;
    kind: QueryKind;
    algorithm: AlgorithmClass;
    value: string;
}

/* -------------------------------------------------------------------------- */
/*                     Store-side encryptedFields document                     */
/* -------------------------------------------------------------------------- */

export interface EncryptedFieldQuery {
    queryType: Exclude<AlgorithmClass, AlgorithmClass.Unindexed>;
    contention?: number;
    strMinQueryLength?: number;
    strMaxQueryLength?: number;
    strMaxLength?: number;
    caseSensitive?: boolean;
    diacriticSensitive?: boolean;
}

export interface EncryptedFieldEntry {
    path: string;
    bsonType: EncryptedBsonType;
    /** Filled in by the store when the collection is created. */
    keyId: null;
    queries?: EncryptedFieldQuery[];
}

export interface EncryptedFieldsDocument {
    fields: EncryptedFieldEntry[];
}
