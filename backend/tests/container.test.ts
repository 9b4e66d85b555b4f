import { createApplication, createRepositories } from '../src/container';
import { InMemorySubscriptionRepository } from '../src/repositories/in-memory';

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

describe('createApplication', () => {
  it('should use in-memory repositories for the memory driver', () => {
    const repositories = createRepositories({ driver: 'memory', supabaseUrl: null, supabaseServiceRoleKey: null });

    expect(repositories.subscriptions).toBeInstanceOf(InMemorySubscriptionRepository);
  });

  it('should require credentials for the supabase driver', () => {
    expect(() =>
      createApplication({ database: { driver: 'supabase', supabaseUrl: null, supabaseServiceRoleKey: null } }),
    ).toThrow('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase storage driver');
  });

  it('should build an idle scheduler', () => {
    const app = createApplication({
      database: { driver: 'memory', supabaseUrl: null, supabaseServiceRoleKey: null },
      scheduler: { enabled: true, reminderCron: '0 9 * * *', renewalCron: '0 * * * *', upcomingRenewalDays: 7 },
    });

    expect(app.scheduler.getStatus()).toEqual({ running: false, jobCount: 0 });
    expect(app.analysisService).toBeDefined();
  });
});
