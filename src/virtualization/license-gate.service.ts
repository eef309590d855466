/**
 * @fileoverview Concurrency License Gate
 *
 * Caps simultaneous requests to the virtualization server at the licensed
 * ceiling. Waiters are served in arrival order.
 *
 * @remarks
 * Every read and write of the usage counters happens inside one synchronous
 * section, so the event loop is the lock. `peak` can therefore never exceed
 * the ceiling; if it ever did, the gate counts a violation and throws
 * {@link GateInvariantViolationError}.
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Counter, Gauge } from 'prom-client';
import { GateInvariantViolationError, PermitReleaseError, WouldThrottleError } from '../shared/errors';
import { AcquireOptions, AdmissionPolicy, LicensePermit, LicenseUsageStats } from './interfaces';

/* -------------------------------------------------------------------------- */
/*                              Prometheus Metrics                             */
/* -------------------------------------------------------------------------- */

const inUseGauge = new Gauge({
    name: 'virtualization_license_in_use',
    help: 'Virtualization license slots currently held',
});

const acquiredCounter = new Counter({
    name: 'virtualization_license_acquired_total',
    help: 'Virtualization license slots granted',
});

const throttleCounter = new Counter({
    name: 'virtualization_license_throttled_total',
    help: 'Callers that had to wait for, or were refused, a license slot',
    labelNames: ['policy'],
});

const violationCounter = new Counter({
    name: 'virtualization_license_violations_total',
    help: 'Observations of more holders than the licensed ceiling',
});

interface Waiter {
    resolve: (permit: LicensePermit) => void;
    reject: (error: Error) => void;
    timer: ReturnType<typeof setTimeout>;
}

@Injectable()
export class LicenseGateService implements OnModuleDestroy {
    private readonly logger = new Logger(LicenseGateService.name);
    readonly ceiling: number;
    private readonly defaultPolicy: AdmissionPolicy;
    private readonly defaultTimeoutMs: number;

    private readonly held = new Set<LicensePermit>();
    private readonly waiters: Waiter[] = [];
    private sequence = 0;
    private closed = false;

    private peak = 0;
    private totalAcquired = 0;
    private totalThrottled = 0;
    private totalViolations = 0;

    constructor(configService: ConfigService) {
        this.ceiling = configService.get<number>('VIRTUALIZATION_MAX_CONCURRENT', 3);
        this.defaultPolicy = configService.get<AdmissionPolicy>('VIRTUALIZATION_ADMISSION_POLICY', 'block');
        this.defaultTimeoutMs = configService.get<number>('VIRTUALIZATION_ACQUIRE_TIMEOUT_MS', 30000);

        if (!Number.isInteger(this.ceiling) || this.ceiling < 1) {
            throw new Error(`VIRTUALIZATION_MAX_CONCURRENT must be a positive integer, got ${this.ceiling}`);
        }
    }

    /**
     * Takes one slot.
     *
     * @throws WouldThrottleError when no slot is free under `reject`, or none
     *   freed up within the timeout under `block`
     */
    acquire(options: AcquireOptions = {}): Promise<LicensePermit> {
        const policy = options.policy ?? this.defaultPolicy;
        const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

        if (this.closed) {
            return Promise.reject(new WouldThrottleError('License gate is shut down'));
        }
        if (this.held.size < this.ceiling && this.waiters.length === 0) {
            try {
                return Promise.resolve(this.grant());
            } catch (error) {
                return Promise.reject(error);
            }
        }

        this.totalThrottled++;
        throttleCounter.inc({ policy });

        if (policy === 'reject') {
            this.logger.warn({ msg: 'License slot refused', current: this.held.size, ceiling: this.ceiling });
            return Promise.reject(
                new WouldThrottleError(`All ${this.ceiling} license slots are in use`),
            );
        }

        return new Promise<LicensePermit>((resolve, reject) => {
            const waiter: Waiter = {
                resolve,
                reject,
                timer: setTimeout(() => this.expire(waiter, timeoutMs), timeoutMs),
            };
            this.waiters.push(waiter);
        });
    }

    /**
     * Returns a slot and hands it to the longest waiter.
     *
     * @throws PermitReleaseError on a second release or a permit this gate did not grant
     */
    release(permit: LicensePermit): void {
        if (!this.held.delete(permit)) {
            throw new PermitReleaseError(`Permit ${permit.id} is not held by this gate`);
        }
        inUseGauge.set(this.held.size);
        this.admitWaiters();
    }

    /** Acquires, runs `operation`, and releases whatever the outcome. */
    async run<T>(operation: () => Promise<T>, options?: AcquireOptions): Promise<T> {
        const permit = await this.acquire(options);
        try {
            return await operation();
        } finally {
            this.release(permit);
        }
    }

    stats(): LicenseUsageStats {
        return {
            current: this.held.size,
            peak: this.peak,
            totalAcquired: this.totalAcquired,
            totalThrottled: this.totalThrottled,
            totalViolations: this.totalViolations,
            ceiling: this.ceiling,
        };
    }

    /** Zeroes the cumulative counters. In-flight permits stay valid. */
    reset(): LicenseUsageStats {
        this.peak = this.held.size;
        this.totalAcquired = 0;
        this.totalThrottled = 0;
        this.totalViolations = 0;
        this.logger.log({ msg: 'License usage counters reset', current: this.held.size });
        return this.stats();
    }

    onModuleDestroy(): void {
        this.closed = true;
        const pending = this.waiters.splice(0);
        for (const waiter of pending) {
            clearTimeout(waiter.timer);
            waiter.reject(new WouldThrottleError('License gate is shut down'));
        }
        if (pending.length > 0) {
            this.logger.warn({ msg: 'Rejected queued license waiters on shutdown', count: pending.length });
        }
    }

    /* ---------------------------------------------------------------------- */
    /*                              Internals                                  */
    /* ---------------------------------------------------------------------- */

    private grant(): LicensePermit {
        const permit: LicensePermit = { id: ++this.sequence, acquiredAt: new Date() };
        this.held.add(permit);
        this.totalAcquired++;
        acquiredCounter.inc();
        inUseGauge.set(this.held.size);

        if (this.held.size > this.peak) {
            this.peak = this.held.size;
        }
        if (this.held.size > this.ceiling) {
            this.totalViolations++;
            violationCounter.inc();
            this.held.delete(permit);
            inUseGauge.set(this.held.size);
            this.logger.error({ msg: 'License ceiling exceeded', holders: this.held.size + 1, ceiling: this.ceiling });
            throw new GateInvariantViolationError(
                `${this.held.size + 1} holders observed with a ceiling of ${this.ceiling}`,
            );
        }
        return permit;
    }

    private admitWaiters(): void {
        while (this.held.size < this.ceiling && this.waiters.length > 0) {
            const waiter = this.waiters.shift();
            if (!waiter) {
                return;
            }
            clearTimeout(waiter.timer);
            try {
                waiter.resolve(this.grant());
            } catch (error) {
                waiter.reject(error instanceof Error ? error : new Error(String(error)));
            }
        }
    }

    private expire(waiter: Waiter, timeoutMs: number): void {
        const index = this.waiters.indexOf(waiter);
        if (index < 0) {
            return;
        }
        this.waiters.splice(index, 1);
        this.logger.warn({ msg: 'License wait timed out', timeoutMs, queued: this.waiters.length });
        waiter.reject(new WouldThrottleError(`No license slot freed within ${timeoutMs}ms`));
    }
}
