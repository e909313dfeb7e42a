/**
 * Reconnection schedule generation
 */

import type { DisconnectAnalysis, ReconnectionScheduleEntry, TransportHint } from '../types/analysis.js';
import { DEFAULT_ENGINE_CONFIG, MAX_RETRY_DELAY_MS } from '../types/config.js';

const IMMEDIATE_RETRY_DELAY_MS = 100;
const SWITCH_TRANSPORTS: readonly TransportHint[] = ['websocket', 'polling'];

/**
 * Base delay for ADAPTIVE_TIMING, scaled by the analysis' contextual factors
 */
export function adaptiveBaseDelay(analysis: DisconnectAnalysis): number {
  let baseDelay = 1000;
  if (analysis.contextualFactors.includes('network_instability')) {
    baseDelay *= 2;
  }
  if (analysis.contextualFactors.includes('resource_pressure')) {
    baseDelay *= 3;
  }
  if (analysis.contextualFactors.includes('mobile_network')) {
    baseDelay *= 1.5;
  }
  return baseDelay;
}

/**
 * Expand an analysis into one entry per allowed attempt.
 * USER_PROMPT always yields an empty schedule.
 */
export function generateSchedule(
  analysis: DisconnectAnalysis,
  baseDelayMs = DEFAULT_ENGINE_CONFIG.baseDelayMs
): ReconnectionScheduleEntry[] {
  const schedule: ReconnectionScheduleEntry[] = [];
  if (analysis.strategy === 'USER_PROMPT') {
    return schedule;
  }

  const adaptiveBase = adaptiveBaseDelay(analysis);
  let currentDelay = baseDelayMs;

  for (let attempt = 1; attempt <= analysis.maxAttempts; attempt++) {
    switch (analysis.strategy) {
      case 'IMMEDIATE_RETRY':
        schedule.push({ attempt, delayMs: IMMEDIATE_RETRY_DELAY_MS, transportHint: 'websocket', adaptive: false });
        break;

      case 'EXPONENTIAL_BACKOFF':
        schedule.push({ attempt, delayMs: currentDelay, transportHint: 'websocket', adaptive: false });
        currentDelay = Math.min(currentDelay * analysis.backoffMultiplier, MAX_RETRY_DELAY_MS);
        break;

      case 'LINEAR_BACKOFF':
        schedule.push({
          attempt,
          delayMs: baseDelayMs * attempt * analysis.backoffMultiplier,
          transportHint: 'websocket',
          adaptive: false,
        });
        break;

      case 'ADAPTIVE_TIMING':
        schedule.push({
          attempt,
          delayMs: Math.min(adaptiveBase * Math.pow(1.4, attempt - 1), MAX_RETRY_DELAY_MS),
          transportHint: 'websocket',
          adaptive: true,
        });
        break;

      case 'TRANSPORT_SWITCH':
        schedule.push({
          attempt,
          delayMs: currentDelay,
          transportHint: SWITCH_TRANSPORTS[attempt % SWITCH_TRANSPORTS.length] ?? 'websocket',
          adaptive: false,
        });
        currentDelay *= 1.2;
        break;

      default:
        schedule.push({ attempt, delayMs: currentDelay, transportHint: 'websocket', adaptive: false });
        currentDelay *= 1.5;
    }
  }

  return schedule;
}

/**
 * Sum of all delays in a schedule
 */
export function totalScheduledDelay(schedule: readonly ReconnectionScheduleEntry[]): number {
  return schedule.reduce((sum, entry) => sum + entry.delayMs, 0);
}
