/**
 * Environment configuration
 */
import { SERVER_TICK_RATE, TARGET_FILL_PERCENTAGE } from '@qix/common';

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function numberEnv(name: string, defaultValue: number): number {
  const raw = optionalEnv(name, `${defaultValue}`);
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`⚠️ Ignoring invalid ${name}=${raw}, using ${defaultValue}`);
    return defaultValue;
  }
  return value;
}

export const config = {
  // Server
  port: Math.floor(numberEnv('PORT', 2567)),
  nodeEnv: optionalEnv('NODE_ENV', 'development'),

  // Simulation
  tickRate: numberEnv('TICK_RATE', SERVER_TICK_RATE),
  targetFillPercentage: Math.min(100, numberEnv('TARGET_FILL_PERCENTAGE', TARGET_FILL_PERCENTAGE)),
} as const;

export type Config = typeof config;
