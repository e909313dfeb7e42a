/**
 * Reconnection guidance sent to a client after its connection drops
 */

import type {
  ContextualFactor,
  DisconnectAnalysis,
  ReconnectionScheduleEntry,
  StrategyKind,
} from '../types/analysis.js';
import { totalScheduledDelay } from './schedule.js';

export interface ReconnectionGuidance {
  strategy: StrategyKind;
  /** False when the engine leaves reconnecting to the user */
  autoRetry: boolean;
  maxAttempts: number;
  /** Delay before the first attempt (0 when there is none) */
  estimatedDelayMs: number;
  /** Sum of every planned delay */
  totalPlannedDelayMs: number;
  tips: string[];
}

const FACTOR_TIPS: Record<ContextualFactor, string> = {
  network_instability: 'The network looks unstable; move closer to the access point or switch networks',
  server_maintenance: 'The server is restarting; reconnection will resume once it is back',
  transport_instability: 'The connection transport failed; alternate transports will be tried',
  auth_issue: 'Authentication failed; check the pairing code and connect again',
  resource_pressure: 'The server is under load; retries are spaced out',
  manual_disconnect: 'Disconnected on request; reconnect from the connection screen',
  mobile_network: 'Mobile data detected; Wi-Fi gives a steadier connection',
};

export function buildGuidance(
  analysis: DisconnectAnalysis,
  schedule: readonly ReconnectionScheduleEntry[]
): ReconnectionGuidance {
  return {
    strategy: analysis.strategy,
    autoRetry: schedule.length > 0,
    maxAttempts: analysis.maxAttempts,
    estimatedDelayMs: schedule[0]?.delayMs ?? 0,
    totalPlannedDelayMs: totalScheduledDelay(schedule),
    tips: analysis.contextualFactors.map((factor) => FACTOR_TIPS[factor]),
  };
}
