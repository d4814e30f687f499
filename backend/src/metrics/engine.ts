/**
 * Engine Metrics
 *
 * - Operation attempts by outcome (committed or the rejecting error code)
 * - Operation latency once the engine lock is held
 * - Call-outs that could not be reversed after a failed operation
 * - Liquidations and outstanding debt
 */

import { Counter, Gauge, Histogram, type Registry } from 'prom-client';

export interface EngineMetrics {
  operationsTotal: Counter<'operation' | 'outcome'>;
  operationDurationSeconds: Histogram<'operation'>;
  compensationFailuresTotal: Counter<'operation'>;
  liquidationsTotal: Counter<'collateral'>;
  totalDebt: Gauge<string>;
}

/**
 * Create and register engine metrics. Metric names are unique per registry:
 * pass a fresh Registry when more than one engine shares a process.
 */
export function createEngineMetrics(registry: Registry): EngineMetrics {
  return {
    operationsTotal: new Counter({
      name: 'dsc_engine_operations_total',
      help: 'Mutating engine operations by outcome',
      labelNames: ['operation', 'outcome'] as const,
      registers: [registry]
    }),
    operationDurationSeconds: new Histogram({
      name: 'dsc_engine_operation_duration_seconds',
      help: 'Wall time of mutating operations once the lock is held (seconds)',
      labelNames: ['operation'] as const,
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers: [registry]
    }),
    compensationFailuresTotal: new Counter({
      name: 'dsc_engine_compensation_failures_total',
      help: 'Completed call-outs a failed operation could not reverse',
      labelNames: ['operation'] as const,
      registers: [registry]
    }),
    liquidationsTotal: new Counter({
      name: 'dsc_engine_liquidations_total',
      help: 'Committed liquidations by seized collateral asset',
      labelNames: ['collateral'] as const,
      registers: [registry]
    }),
    totalDebt: new Gauge({
      name: 'dsc_engine_total_debt',
      help: 'Outstanding synthetic-dollar debt across all accounts (whole units)',
      registers: [registry]
    })
  };
}
