import dotenv from 'dotenv';
import logger from './config/logger';
import { loadSchedulerConfig } from './config/scheduler';
import { createApplication } from './container';

// Load environment variables
dotenv.config();

const schedulerConfig = loadSchedulerConfig();
const app = createApplication({ scheduler: schedulerConfig });

logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
logger.info(`Base currency: ${app.currencyService.baseCurrency}`);

if (schedulerConfig.enabled) {
  app.scheduler.start();
} else {
  logger.info('Scheduler disabled by SCHEDULER_ENABLED');
}

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`);
  app.scheduler.stop();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
