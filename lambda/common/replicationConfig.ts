import { ConfigurationError } from './replicationErrors';

/**
 * Settings for one KMS key replication function instance.
 * Read once per cold start and handed to the dispatcher and coordinator.
 */
export interface ReplicationConfig {
  /** Upper bound on replications running at the same time */
  readonly maxWorkers: number;
}

export const DEFAULT_MAX_WORKERS = 3;

// Same constraint the deployment template puts on the parameter
const MAX_WORKERS_PATTERN = /^\d*$/;

/**
 * Build the replication config from environment variables.
 * MAX_WORKERS unset or blank falls back to DEFAULT_MAX_WORKERS.
 */
export function loadReplicationConfig(env: NodeJS.ProcessEnv = process.env): ReplicationConfig {
  const raw = (env.MAX_WORKERS ?? '').trim();

  if (!MAX_WORKERS_PATTERN.test(raw)) {
    throw new ConfigurationError(`MAX_WORKERS must be a number, got "${raw}"`);
  }
  if (raw === '') {
    return { maxWorkers: DEFAULT_MAX_WORKERS };
  }

  const maxWorkers = parseInt(raw, 10);
  if (maxWorkers < 1) {
    throw new ConfigurationError('MAX_WORKERS must be greater than 0');
  }

  return { maxWorkers };
}
