/**
 * JobRunner Unit Tests
 *
 * SCOPE: Lease exclusivity, permission check, system actor hand-off
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { createMemoryLease, type JobLease } from '@/lib/redis.js';
import type { JobServices } from '@/workers/job-runner.js';
import { createJobRunner } from '@/workers/job-runner.js';
import type { ActorContext, Result, SweepResult } from '@/types/index.js';
import { success } from '@/types/index.js';

import { TEST_REQUEST_ID, operatorActor, serviceActor } from '../../fixtures/index.js';
import { silentLogger } from '../../helpers/test-utils.js';

const EMPTY_SWEEP: SweepResult = {
  transitions: [],
  notificationsQueued: 0,
  revoked: 0,
  revocationsSkipped: 0,
  errors: 0,
};

function createServices(): JobServices {
  return {
    reconciliationService: {
      run: vi.fn().mockResolvedValue(
        success({
          paymentsFound: 0,
          transactionsScanned: 0,
          repaired: 0,
          windowStart: new Date('2025-01-07T12:00:00Z'),
          cursorAdvancedTo: null,
        })
      ),
    },
    lifecycleService: {
      sweep: vi.fn().mockResolvedValue(success(EMPTY_SWEEP)),
      sendReminders: vi.fn().mockResolvedValue(success({ remindersQueued: 0, errors: 0 })),
    },
    notificationService: {
      processPending: vi.fn().mockResolvedValue(success({ processed: 0, sent: 0, errors: 0 })),
    },
    accessService: {
      resumePending: vi.fn().mockResolvedValue(success({ resumed: 0 })),
    },
  };
}

describe('JobRunner', () => {
  let services: JobServices;
  let lease: JobLease;

  beforeEach(() => {
    services = createServices();
    lease = createMemoryLease();
  });

  function build(jobLease: JobLease = lease) {
    return createJobRunner({ services, lease: jobLease, leaseSeconds: 60, logger: silentLogger() });
  }

  it('should run the job as the system actor with the caller\'s request id', async () => {
    const runner = build();

    const result = await runner.runSweep(operatorActor);

    expect(result).toEqual({ success: true, data: EMPTY_SWEEP });
    const sweep = vi.mocked(services.lifecycleService.sweep);
    const [actor] = sweep.mock.calls[0] ?? [];
    expect(actor).toMatchObject({ type: 'system', requestId: TEST_REQUEST_ID });
  });

  it('should refuse callers without jobs:run', async () => {
    const runner = build();

    const result = await runner.runReconciliation(serviceActor);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('PERMISSION_DENIED');
    expect(services.reconciliationService.run).not.toHaveBeenCalled();
  });

  it('should reject a second trigger while the job runs', async () => {
    let finish: (value: Result<SweepResult>) => void = () => undefined;
    vi.mocked(services.lifecycleService.sweep).mockImplementation(
      (_actor: ActorContext) =>
        new Promise<Result<SweepResult>>((resolve) => {
          finish = resolve;
        })
    );
    const runner = build();

    const first = runner.runSweep(operatorActor);
    await new Promise((resolve) => setTimeout(resolve, 0));
    const second = await runner.runSweep(operatorActor);
    finish(success(EMPTY_SWEEP));

    expect(second.success).toBe(false);
    if (second.success) return;
    expect(second.error.code).toBe('JOB_IN_PROGRESS');
    expect((await first).success).toBe(true);
  });

  it('should release the lease after the job', async () => {
    const runner = build();

    await runner.runNotifications(operatorActor);
    const again = await runner.runNotifications(operatorActor);

    expect(again.success).toBe(true);
    expect(services.notificationService.processPending).toHaveBeenCalledTimes(2);
  });

  it('should release the lease when the job throws', async () => {
    vi.mocked(services.accessService.resumePending).mockRejectedValueOnce(new Error('boom'));
    const runner = build();

    const crashed = await runner.runFinalizations(operatorActor);
    const retried = await runner.runFinalizations(operatorActor);

    expect(crashed).toEqual({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'Job finalizations crashed: boom' },
    });
    expect(retried).toEqual({ success: true, data: { resumed: 0 } });
  });

  it('should report an unreachable lease store', async () => {
    const broken: JobLease = {
      acquire: vi.fn().mockRejectedValue(new Error('ECONNREFUSED')),
      release: vi.fn(),
    };
    const runner = build(broken);

    const result = await runner.runReminders(operatorActor);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'STORAGE_UNAVAILABLE',
        message: 'Failed to acquire reminders lease: ECONNREFUSED',
      },
    });
    expect(services.lifecycleService.sendReminders).not.toHaveBeenCalled();
  });
});
