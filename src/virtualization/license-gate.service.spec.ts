/**
 * @fileoverview License Gate Tests
 */

import { PermitReleaseError, WouldThrottleError } from '../shared/errors';
import { LicensePermit } from './interfaces';
import { LicenseGateService } from './license-gate.service';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('LicenseGateService', () => {
    let gate: LicenseGateService;
    let mockConfigService: any;
    let config: Record<string, unknown>;

    beforeEach(() => {
        config = {};
        mockConfigService = {
            get: jest.fn((key: string, defaultValue: unknown) => config[key] ?? defaultValue),
        };
        gate = new LicenseGateService(mockConfigService);
    });

    afterEach(() => {
        gate.onModuleDestroy();
    });

    const holdAll = async (): Promise<LicensePermit[]> =>
        Promise.all([gate.acquire(), gate.acquire(), gate.acquire()]);

    it('should refuse a non-positive ceiling', () => {
        config.VIRTUALIZATION_MAX_CONCURRENT = 0;
        expect(() => new LicenseGateService(mockConfigService)).toThrow(
            'VIRTUALIZATION_MAX_CONCURRENT must be a positive integer, got 0',
        );
    });

    it('should grant up to the ceiling without throttling', async () => {
        await holdAll();

        expect(gate.stats()).toEqual({
            current: 3,
            peak: 3,
            totalAcquired: 3,
            totalThrottled: 0,
            totalViolations: 0,
            ceiling: 3,
        });
    });

    describe('reject policy', () => {
        it('should fail at once and count a throttle', async () => {
            await holdAll();

            await expect(gate.acquire({ policy: 'reject' })).rejects.toThrow(WouldThrottleError);
            expect(gate.stats().totalThrottled).toBe(1);
            expect(gate.stats().current).toBe(3);
        });

        it('should apply the configured default policy', async () => {
            config.VIRTUALIZATION_ADMISSION_POLICY = 'reject';
            gate = new LicenseGateService(mockConfigService);
            await holdAll();

            await expect(gate.acquire()).rejects.toThrow('All 3 license slots are in use');
        });
    });

    describe('block policy', () => {
        it('should serve waiters in arrival order', async () => {
            const permits = await holdAll();
            const served: number[] = [];
            const waiting = [1, 2, 3].map((n) =>
                gate.acquire({ policy: 'block' }).then((permit) => {
                    served.push(n);
                    return permit;
                }),
            );
            expect(gate.stats().totalThrottled).toBe(3);

            for (const permit of permits) {
                gate.release(permit);
            }
            const granted = await Promise.all(waiting);

            expect(served).toEqual([1, 2, 3]);
            expect(granted.map((p) => p.id)).toEqual([4, 5, 6]);
            expect(gate.stats().current).toBe(3);
        });

        it('should time out into WouldThrottle and count the throttle once', async () => {
            await holdAll();

            await expect(gate.acquire({ policy: 'block', timeoutMs: 20 })).rejects.toThrow(
                'No license slot freed within 20ms',
            );
            expect(gate.stats().totalThrottled).toBe(1);
        });

        it('should not hand a slot to a waiter that already timed out', async () => {
            const permits = await holdAll();
            await expect(gate.acquire({ timeoutMs: 10 })).rejects.toThrow(WouldThrottleError);

            const next = gate.acquire({ timeoutMs: 1000 });
            gate.release(permits[0]);

            await expect(next).resolves.toMatchObject({ id: 4 });
            expect(gate.stats().current).toBe(3);
        });

        it('should reject queued waiters on shutdown', async () => {
            await holdAll();
            const waiting = gate.acquire({ timeoutMs: 10000 });

            gate.onModuleDestroy();

            await expect(waiting).rejects.toThrow('License gate is shut down');
            await expect(gate.acquire()).rejects.toThrow(WouldThrottleError);
        });
    });

    describe('release', () => {
        it('should fail fast on a second release', async () => {
            const permit = await gate.acquire();
            gate.release(permit);

            expect(() => gate.release(permit)).toThrow(PermitReleaseError);
            expect(gate.stats().current).toBe(0);
        });

        it('should refuse a permit it did not grant', () => {
            expect(() => gate.release({ id: 99, acquiredAt: new Date() })).toThrow(
                'Permit 99 is not held by this gate',
            );
        });
    });

    describe('run', () => {
        it('should release the slot when the operation fails', async () => {
            await expect(
                gate.run(async () => {
                    throw new Error('view failed');
                }),
            ).rejects.toThrow('view failed');

            expect(gate.stats().current).toBe(0);
            expect(gate.stats().totalAcquired).toBe(1);
        });

        it('should return the operation result', async () => {
            await expect(gate.run(async () => 42)).resolves.toBe(42);
        });
    });

    describe('reset', () => {
        it('should zero the counters and keep in-flight permits valid', async () => {
            const permits = await holdAll();
            gate.release(permits[0]);
            await expect(gate.acquire({ policy: 'reject' })).resolves.toBeDefined();
            gate.release(permits[1]);

            const stats = gate.reset();

            expect(stats).toEqual({
                current: 2,
                peak: 2,
                totalAcquired: 0,
                totalThrottled: 0,
                totalViolations: 0,
                ceiling: 3,
            });
            expect(() => gate.release(permits[2])).not.toThrow();
            expect(gate.stats().current).toBe(1);
        });
    });

    describe('under contention', () => {
        it('should never observe more holders than the ceiling', async () => {
            const observed: number[] = [];

            const callers = Array.from({ length: 60 }, (_, i) =>
                gate.run(async () => {
                    observed.push(gate.stats().current);
                    await sleep(i % 4);
                    observed.push(gate.stats().current);
                }),
            );
            await Promise.all(callers);

            expect(Math.max(...observed)).toBeLessThanOrEqual(3);
            expect(gate.stats()).toEqual({
                current: 0,
                peak: 3,
                totalAcquired: 60,
                totalThrottled: 57,
                totalViolations: 0,
                ceiling: 3,
            });
        });
    });
});
