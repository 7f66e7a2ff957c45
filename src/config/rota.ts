/**
 * Rota Configuration
 *
 * Centralizes scheduling constants and environment-driven settings.
 */

import { todayInTimeZone } from '../lib/dates';

/**
 * Application name used in notification texts and logs
 */
export const APPLICATION_NAME = 'Escala de Plantão';

/**
 * Limits for automatic generation.
 * One run is written in a single DynamoDB transaction (100 items max),
 * so twelve weekends of five collaborator slots plus the run record fit.
 */
export const GENERATION_LIMITS = {
  minCycles: 1,
  maxCycles: 12,
  defaultCycles: 4,
  minRosterSize: 2,
} as const;

/**
 * Dashboard listing defaults
 */
export const DASHBOARD_DEFAULTS = {
  /** Weeks ahead shown when no date filter is given */
  weeksAhead: 4,
} as const;

export const DEFAULT_TIMEZONE = 'America/Sao_Paulo';

/**
 * Environment-specific configuration
 * Can be overridden via environment variables for local development
 */
export const getRotaConfig = () => {
  return {
    applicationName: APPLICATION_NAME,
    timeZone: process.env['ROTA_TIMEZONE'] || DEFAULT_TIMEZONE,
    stage: process.env['STAGE'] || 'dev',
  };
};

/**
 * Today's date where the rota is worked
 */
export const getRotaToday = (now: Date = new Date()): string =>
  todayInTimeZone(getRotaConfig().timeZone, now);
