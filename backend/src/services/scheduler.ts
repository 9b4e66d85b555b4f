import cron from 'node-cron';
import logger from '../config/logger';
import { loadSchedulerConfig, type SchedulerConfig } from '../config/scheduler';
import type { ReminderEngine } from './reminder-engine';
import type { RenewalProcessor } from './renewal-processor';

export interface SchedulerStatus {
  running: boolean;
  jobCount: number;
}

export class SchedulerService {
  private jobs: cron.ScheduledTask[] = [];

  constructor(
    private readonly reminderEngine: ReminderEngine,
    private readonly renewalProcessor: RenewalProcessor,
    private readonly config: SchedulerConfig = loadSchedulerConfig(),
  ) {}

  /**
   * Start all scheduled jobs
   */
  start(): void {
    if (this.jobs.length > 0) {
      logger.warn('Scheduler service already running');
      return;
    }

    logger.info('Starting scheduler service');

    const reminderJob = cron.schedule(this.config.reminderCron, async () => {
      logger.info('Running scheduled reminder processing');
      try {
        await this.reminderEngine.processReminders();
      } catch (error) {
        logger.error('Error in scheduled reminder processing:', error);
      }
    });

    this.jobs.push(reminderJob);

    const renewalJob = cron.schedule(this.config.renewalCron, async () => {
      logger.info('Running scheduled renewal processing');
      try {
        await this.renewalProcessor.processDueRenewals();
      } catch (error) {
        logger.error('Error in scheduled renewal processing:', error);
      }
    });

    this.jobs.push(renewalJob);

    logger.info(`Started ${this.jobs.length} scheduled jobs`);
  }

  /**
   * Stop all scheduled jobs
   */
  stop(): void {
    logger.info('Stopping scheduler service');
    this.jobs.forEach((job) => job.stop());
    this.jobs = [];
    logger.info('Scheduler service stopped');
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.jobs.length > 0,
      jobCount: this.jobs.length,
    };
  }
}
