import { KMSClient } from '@aws-sdk/client-kms';
import { ReplicationTask, replicateKeyToRegion } from './kmsKeys';
import { ReplicationConfig } from './replicationConfig';
import { TaskOutcome, WorkerPool } from './workerPool';

export type ReplicationOutcome =
  | { targetRegion: string; succeeded: true }
  | { targetRegion: string; succeeded: false; error: unknown };

export type FailedReplication = Extract<ReplicationOutcome, { succeeded: false }>;

export type ReplicationResult =
  | { status: 'SUCCESS' }
  | { status: 'FAILED'; failure: FailedReplication };

/**
 * Tag a pool outcome with the region its task targeted
 */
export function toReplicationOutcome(task: ReplicationTask, outcome: TaskOutcome<void>): ReplicationOutcome {
  if (outcome.ok) {
    return { targetRegion: task.targetRegion, succeeded: true };
  }
  return { targetRegion: task.targetRegion, succeeded: false, error: outcome.error };
}

export interface ReplicationCoordinatorOptions {
  config: ReplicationConfig;
  /** Called once per worker, on that worker's first task */
  createClient: () => KMSClient;
  replicate?: (client: KMSClient, task: ReplicationTask) => Promise<void>;
}

/**
 * Fans one key out to many regions on a bounded worker pool.
 *
 * Outcomes are read in submission order. The first failed outcome decides the
 * result, but the coordinator still waits for every started replication to
 * finish before returning; nothing is cancelled.
 */
export class ReplicationCoordinator {
  private readonly config: ReplicationConfig;
  private readonly createClient: () => KMSClient;
  private readonly replicate: (client: KMSClient, task: ReplicationTask) => Promise<void>;

  constructor(options: ReplicationCoordinatorOptions) {
    this.config = options.config;
    this.createClient = options.createClient;
    this.replicate = options.replicate ?? replicateKeyToRegion;
  }

  async replicateToRegions(
    keyId: string,
    policy: string,
    targetRegions: readonly string[]
  ): Promise<ReplicationResult> {
    if (targetRegions.length === 0) {
      return { status: 'SUCCESS' };
    }

    const tasks: ReplicationTask[] = targetRegions.map((targetRegion) => ({ keyId, targetRegion, policy }));

    const pool = new WorkerPool<KMSClient>({
      size: Math.min(this.config.maxWorkers, tasks.length),
      createResource: () => this.createClient(),
    });
    const run = pool.run(tasks, (task, client) => this.replicate(client, task));

    let result: ReplicationResult = { status: 'SUCCESS' };
    for (let i = 0; i < tasks.length; i++) {
      const outcome = toReplicationOutcome(tasks[i], await run.outcomes[i]);
      if (!outcome.succeeded) {
        result = { status: 'FAILED', failure: outcome };
        break;
      }
    }

    await run.drained;
    return result;
  }
}
