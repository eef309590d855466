/**
 * @fileoverview License Gate Interfaces
 */

/** What `acquire` does when every slot is taken. */
export type AdmissionPolicy = 'block' | 'reject';

export const ADMISSION_POLICIES: readonly AdmissionPolicy[] = ['block', 'reject'];

export interface AcquireOptions {
    /** Defaults to VIRTUALIZATION_ADMISSION_POLICY. */
    policy?: AdmissionPolicy;
    /** How long a `block` caller waits; defaults to VIRTUALIZATION_ACQUIRE_TIMEOUT_MS. */
    timeoutMs?: number;
}

/** Proof of one held slot. Valid for exactly one release. */
export interface LicensePermit {
    readonly id: number;
    readonly acquiredAt: Date;
}

export interface LicenseUsageStats {
    current: number;
    peak: number;
    totalAcquired: number;
    totalThrottled: number;
    totalViolations: number;
    ceiling: number;
}
