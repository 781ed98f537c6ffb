import pino from 'pino';
import { config } from './config.js';

// No pretty transport under Vitest: its worker thread outlives the test run.
const usePretty = config.env === 'development' && !process.env.VITEST;

export const logger = usePretty
  ? pino({ level: config.logLevel, transport: { target: 'pino-pretty' } })
  : pino({ level: config.logLevel });

export type Logger = typeof logger;
