import cron from 'node-cron';
import logger from '../src/config/logger';
import {
  InMemorySubscriptionHistoryRepository,
  InMemorySubscriptionRepository,
} from '../src/repositories/in-memory';
import { ReminderEngine } from '../src/services/reminder-engine';
import { RenewalProcessor } from '../src/services/renewal-processor';
import { SchedulerService } from '../src/services/scheduler';
import { ProcessRenewalUseCase } from '../src/use-cases/subscription-status';

jest.mock('node-cron', () => ({
  __esModule: true,
  default: {
    schedule: jest.fn(),
    validate: jest.fn(() => true),
  },
}));

// Mock logger to suppress output during tests
jest.mock('../src/config/logger', () => ({
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
  __esModule: true,
}));

describe('SchedulerService', () => {
  const config = { enabled: true, reminderCron: '0 9 * * *', renewalCron: '*/10 * * * *', upcomingRenewalDays: 30 };

  let reminderEngine: ReminderEngine;
  let renewalProcessor: RenewalProcessor;
  let scheduler: SchedulerService;
  let stops: jest.Mock[];

  beforeEach(() => {
    jest.clearAllMocks();
    stops = [];
    (cron.schedule as jest.Mock).mockImplementation(() => {
      const stop = jest.fn();
      stops.push(stop);
      return { stop };
    });

    const subscriptions = new InMemorySubscriptionRepository();
    reminderEngine = new ReminderEngine(subscriptions);
    renewalProcessor = new RenewalProcessor(
      subscriptions,
      new ProcessRenewalUseCase({
        subscriptionRepository: subscriptions,
        historyRepository: new InMemorySubscriptionHistoryRepository(),
      }),
    );
    scheduler = new SchedulerService(reminderEngine, renewalProcessor, config);
  });

  const jobAt = (index: number): (() => Promise<void>) => (cron.schedule as jest.Mock).mock.calls[index][1];

  it('should register the reminder and renewal jobs with the configured expressions', () => {
    scheduler.start();

    expect(cron.schedule).toHaveBeenCalledTimes(2);
    expect((cron.schedule as jest.Mock).mock.calls.map((call) => call[0])).toEqual(['0 9 * * *', '*/10 * * * *']);
    expect(scheduler.getStatus()).toEqual({ running: true, jobCount: 2 });
  });

  it('should not register jobs twice', () => {
    scheduler.start();
    scheduler.start();

    expect(cron.schedule).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Scheduler service already running');
  });

  it('should stop every job', () => {
    scheduler.start();
    scheduler.stop();

    expect(stops).toHaveLength(2);
    stops.forEach((stop) => expect(stop).toHaveBeenCalledTimes(1));
    expect(scheduler.getStatus()).toEqual({ running: false, jobCount: 0 });
  });

  it('should run reminder processing when the reminder job fires', async () => {
    const processReminders = jest
      .spyOn(reminderEngine, 'processReminders')
      .mockResolvedValue({ processed: 0, sent: 0, skipped: 0, errors: 0 });
    scheduler.start();

    await jobAt(0)();

    expect(processReminders).toHaveBeenCalledTimes(1);
  });

  it('should log and swallow failures inside a job', async () => {
    const failure = new Error('database unavailable');
    jest.spyOn(renewalProcessor, 'processDueRenewals').mockRejectedValue(failure);
    scheduler.start();

    await expect(jobAt(1)()).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('Error in scheduled renewal processing:', failure);
  });
});
