import { createDatabaseClient, loadDatabaseConfig, type DatabaseConfig } from './config/database';
import logger from './config/logger';
import { loadSchedulerConfig, type SchedulerConfig } from './config/scheduler';
import {
  InMemoryProviderRepository,
  InMemorySubscriptionHistoryRepository,
  InMemorySubscriptionRepository,
} from './repositories/in-memory';
import {
  SupabaseProviderRepository,
  SupabaseSubscriptionHistoryRepository,
  SupabaseSubscriptionRepository,
} from './repositories/supabase';
import type { ProviderRepository, SubscriptionHistoryRepository, SubscriptionRepository } from './repositories/types';
import { CurrencyService } from './services/currency-service';
import { notificationService } from './services/notification-service';
import { ReminderEngine, type ReminderChannel, loggerReminderChannel } from './services/reminder-engine';
import { RenewalProcessor } from './services/renewal-processor';
import { SchedulerService } from './services/scheduler';
import { SubscriptionAnalysisService } from './services/subscription-analysis-service';
import { CreateSubscriptionUseCase } from './use-cases/create-subscription';
import {
  AddNotificationRuleUseCase,
  RemoveNotificationRuleUseCase,
  SetNotificationRuleEnabledUseCase,
} from './use-cases/notification-rules';
import { RegisterProviderUseCase } from './use-cases/register-provider';
import { systemClock, type Clock, type SubscriptionCommandDependencies } from './use-cases/subscription-command';
import {
  GetSubscriptionDetailsUseCase,
  GetSubscriptionInsightsUseCase,
  ListSubscriptionsUseCase,
} from './use-cases/subscription-queries';
import {
  CancelSubscriptionUseCase,
  PauseSubscriptionUseCase,
  ProcessRenewalUseCase,
  ResumeSubscriptionUseCase,
} from './use-cases/subscription-status';
import {
  UpdateBillingCycleUseCase,
  UpdateSubscriptionCostUseCase,
  UpdateSubscriptionDetailsUseCase,
} from './use-cases/update-subscription';
import { KeyedLock } from './utils/keyed-lock';

export interface Repositories {
  subscriptions: SubscriptionRepository;
  providers: ProviderRepository;
  history: SubscriptionHistoryRepository;
}

export interface ApplicationOptions {
  repositories?: Repositories;
  database?: DatabaseConfig;
  scheduler?: SchedulerConfig;
  currencyService?: CurrencyService;
  reminderChannel?: ReminderChannel;
  clock?: Clock;
}

export interface Application {
  repositories: Repositories;
  currencyService: CurrencyService;
  analysisService: SubscriptionAnalysisService;
  useCases: {
    registerProvider: RegisterProviderUseCase;
    createSubscription: CreateSubscriptionUseCase;
    updateCost: UpdateSubscriptionCostUseCase;
    updateBillingCycle: UpdateBillingCycleUseCase;
    updateDetails: UpdateSubscriptionDetailsUseCase;
    pause: PauseSubscriptionUseCase;
    resume: ResumeSubscriptionUseCase;
    cancel: CancelSubscriptionUseCase;
    processRenewal: ProcessRenewalUseCase;
    addNotificationRule: AddNotificationRuleUseCase;
    setNotificationRuleEnabled: SetNotificationRuleEnabledUseCase;
    removeNotificationRule: RemoveNotificationRuleUseCase;
    listSubscriptions: ListSubscriptionsUseCase;
    getSubscriptionDetails: GetSubscriptionDetailsUseCase;
    getInsights: GetSubscriptionInsightsUseCase;
  };
  reminderEngine: ReminderEngine;
  renewalProcessor: RenewalProcessor;
  scheduler: SchedulerService;
}

export function createRepositories(config: DatabaseConfig): Repositories {
  if (config.driver === 'supabase') {
    const client = createDatabaseClient(config);
    logger.info('Using supabase storage driver');
    return {
      subscriptions: new SupabaseSubscriptionRepository(client),
      providers: new SupabaseProviderRepository(client),
      history: new SupabaseSubscriptionHistoryRepository(client),
    };
  }

  logger.info('Using in-memory storage driver');
  return {
    subscriptions: new InMemorySubscriptionRepository(),
    providers: new InMemoryProviderRepository(),
    history: new InMemorySubscriptionHistoryRepository(),
  };
}

/**
 * Wire repositories, services and use cases together. All mutating use cases
 * share one lock so commands against the same subscription are serialized.
 */
export function createApplication(options: ApplicationOptions = {}): Application {
  const repositories = options.repositories ?? createRepositories(options.database ?? loadDatabaseConfig());
  const schedulerConfig = options.scheduler ?? loadSchedulerConfig();
  const currencyService = options.currencyService ?? new CurrencyService();
  const analysisService = new SubscriptionAnalysisService(currencyService.baseCurrency);
  const clock = options.clock ?? systemClock;

  const commandDeps: SubscriptionCommandDependencies = {
    subscriptionRepository: repositories.subscriptions,
    historyRepository: repositories.history,
    lock: new KeyedLock(),
    clock,
  };

  const processRenewal = new ProcessRenewalUseCase(commandDeps);
  const reminderEngine = new ReminderEngine(
    repositories.subscriptions,
    options.reminderChannel ?? loggerReminderChannel,
    notificationService,
  );
  const renewalProcessor = new RenewalProcessor(repositories.subscriptions, processRenewal);

  return {
    repositories,
    currencyService,
    analysisService,
    useCases: {
      registerProvider: new RegisterProviderUseCase(repositories.providers),
      createSubscription: new CreateSubscriptionUseCase({ ...commandDeps, providerRepository: repositories.providers }),
      updateCost: new UpdateSubscriptionCostUseCase(commandDeps),
      updateBillingCycle: new UpdateBillingCycleUseCase(commandDeps),
      updateDetails: new UpdateSubscriptionDetailsUseCase(commandDeps),
      pause: new PauseSubscriptionUseCase(commandDeps),
      resume: new ResumeSubscriptionUseCase(commandDeps),
      cancel: new CancelSubscriptionUseCase(commandDeps),
      processRenewal,
      addNotificationRule: new AddNotificationRuleUseCase(commandDeps),
      setNotificationRuleEnabled: new SetNotificationRuleEnabledUseCase(commandDeps),
      removeNotificationRule: new RemoveNotificationRuleUseCase(commandDeps),
      listSubscriptions: new ListSubscriptionsUseCase(repositories.subscriptions),
      getSubscriptionDetails: new GetSubscriptionDetailsUseCase(
        repositories.subscriptions,
        repositories.history,
        currencyService,
      ),
      getInsights: new GetSubscriptionInsightsUseCase(repositories.subscriptions, analysisService, {
        upcomingDays: schedulerConfig.upcomingRenewalDays,
        clock,
      }),
    },
    reminderEngine,
    renewalProcessor,
    scheduler: new SchedulerService(reminderEngine, renewalProcessor, schedulerConfig),
  };
}
