import { metricsRegistry } from './registry.js';
import { createEngineMetrics, type EngineMetrics } from './engine.js';

// Singleton engine metrics instance
let _engineMetrics: EngineMetrics | null = null;

/**
 * Initialize metrics exactly once
 * Safe to call multiple times - will return existing instance after first call
 */
export function initMetricsOnce(): EngineMetrics {
  if (_engineMetrics) return _engineMetrics;
  _engineMetrics = createEngineMetrics(metricsRegistry);
  return _engineMetrics;
}

// Re-export the central registry
export { metricsRegistry as registry };
export type { EngineMetrics };
