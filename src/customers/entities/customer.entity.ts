/**
 * @fileoverview Customer Entity
 *
 * TypeORM entity for the PostgreSQL customers table. PII columns hold
 * pgcrypto ciphertext (`pgp_sym_encrypt`); the remaining columns are plain.
 */

import { Column, CreateDateColumn, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

@Entity('customers')
export class CustomerEntity {
    @PrimaryColumn('uuid')
    id!: string;

    @Column('bytea')
    full_name_encrypted!: Buffer;

    @Column('bytea')
    email_encrypted!: Buffer;

    @Column('bytea', { nullable: true })
    phone_encrypted!: Buffer | null;

    /** JSON text inside the ciphertext. */
    @Column('bytea', { nullable: true })
    address_encrypted!: Buffer | null;

    /** JSON text inside the ciphertext. */
    @Column('bytea', { nullable: true })
    preferences_encrypted!: Buffer | null;

    @Column('varchar', { length: 20 })
    tier!: string;

    @Column('varchar', { length: 20 })
    category!: string;

    @Column('varchar', { length: 20 })
    status!: string;

    @Column('integer', { default: 0 })
    loyalty_points!: number;

    @Column('varchar', { length: 32 })
    last_purchase_date!: string;

    /** pg returns numeric as a string. */
    @Column('numeric', { precision: 12, scale: 2 })
    lifetime_value!: string;

    @CreateDateColumn({ type: 'timestamptz' })
    created_at!: Date;

    @UpdateDateColumn({ type: 'timestamptz' })
    updated_at!: Date;
}
