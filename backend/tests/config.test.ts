import { loadDatabaseConfig, createDatabaseClient } from '../src/config/database';
import {
  DEFAULT_REMINDER_CRON,
  DEFAULT_RENEWAL_CRON,
  DEFAULT_UPCOMING_RENEWAL_DAYS,
  loadSchedulerConfig,
} from '../src/config/scheduler';

describe('loadSchedulerConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.SCHEDULER_ENABLED;
    delete process.env.REMINDER_CRON;
    delete process.env.RENEWAL_CRON;
    delete process.env.UPCOMING_RENEWAL_DAYS;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should return defaults when nothing is set', () => {
    expect(loadSchedulerConfig()).toEqual({
      enabled: true,
      reminderCron: DEFAULT_REMINDER_CRON,
      renewalCron: DEFAULT_RENEWAL_CRON,
      upcomingRenewalDays: DEFAULT_UPCOMING_RENEWAL_DAYS,
    });
  });

  it('should read overrides from env vars', () => {
    process.env.REMINDER_CRON = '30 8 * * *';
    process.env.RENEWAL_CRON = '*/15 * * * *';
    process.env.UPCOMING_RENEWAL_DAYS = '14';

    const config = loadSchedulerConfig();
    expect(config.reminderCron).toBe('30 8 * * *');
    expect(config.renewalCron).toBe('*/15 * * * *');
    expect(config.upcomingRenewalDays).toBe(14);
  });

  it.each(['false', '0', 'no', 'OFF'])('should disable the scheduler for "%s"', (value) => {
    process.env.SCHEDULER_ENABLED = value;
    expect(loadSchedulerConfig().enabled).toBe(false);
  });

  it('should fall back to the default window for invalid day counts', () => {
    process.env.UPCOMING_RENEWAL_DAYS = '0';
    expect(loadSchedulerConfig().upcomingRenewalDays).toBe(30);

    process.env.UPCOMING_RENEWAL_DAYS = 'soon';
    expect(loadSchedulerConfig().upcomingRenewalDays).toBe(30);
  });

  it('should throw on an invalid cron expression', () => {
    process.env.RENEWAL_CRON = 'every hour';
    expect(() => loadSchedulerConfig()).toThrow(
      'Invalid RENEWAL_CRON value "every hour". Must be a valid cron expression.',
    );
  });
});

describe('loadDatabaseConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.STORAGE_DRIVER;
    delete process.env.SUPABASE_URL;
    delete process.env.SUPABASE_SERVICE_ROLE_KEY;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should default to the memory driver', () => {
    expect(loadDatabaseConfig()).toEqual({ driver: 'memory', supabaseUrl: null, supabaseServiceRoleKey: null });
  });

  it('should read supabase settings', () => {
    process.env.STORAGE_DRIVER = 'Supabase';
    process.env.SUPABASE_URL = 'http://localhost:54321';
    process.env.SUPABASE_SERVICE_ROLE_KEY = 'test-secret';

    expect(loadDatabaseConfig()).toEqual({
      driver: 'supabase',
      supabaseUrl: 'http://localhost:54321',
      supabaseServiceRoleKey: 'test-secret',
    });
  });

  it('should reject unknown drivers', () => {
    process.env.STORAGE_DRIVER = 'mysql';
    expect(() => loadDatabaseConfig()).toThrow('Invalid STORAGE_DRIVER value "mysql". Must be "memory" or "supabase".');
  });

  it('should require credentials before creating a client', () => {
    expect(() => createDatabaseClient({ driver: 'supabase', supabaseUrl: null, supabaseServiceRoleKey: null })).toThrow(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase storage driver',
    );
  });
});
