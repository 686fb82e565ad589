import { KMSClient, GetKeyPolicyCommand, ReplicateKeyCommand } from '@aws-sdk/client-kms';
import { PolicyRetrievalError, ReplicationError } from './replicationErrors';

export const REPLICA_DESCRIPTION = 'Replicated KMS CMK.';

/**
 * One unit of replication work: copy the source key into one region
 */
export interface ReplicationTask {
  readonly keyId: string;
  readonly targetRegion: string;
  /** Key policy JSON, attached to the replica as-is */
  readonly policy: string;
}

/**
 * New KMS client in the function's own region.
 * ReplicateKey is always called against the source key's region.
 */
export function createKmsClient(): KMSClient {
  return new KMSClient({});
}

/**
 * Return the default key policy of a KMS key as a JSON string
 */
export async function getKeyPolicy(client: KMSClient, keyId: string): Promise<string> {
  console.log(`Retrieving key policy for "${keyId}".`);

  let policy: string | undefined;
  try {
    const result = await client.send(new GetKeyPolicyCommand({
      KeyId: keyId,
      PolicyName: 'default',
    }));
    policy = result.Policy;
  } catch (error) {
    throw new PolicyRetrievalError(keyId, error);
  }

  if (!policy) {
    throw new PolicyRetrievalError(keyId, new Error('GetKeyPolicy returned no policy'));
  }
  return policy;
}

/**
 * Replicate a multi-region key into one region with the given policy.
 * The lockout safety check is bypassed: the policy was read from the source key.
 */
export async function replicateKeyToRegion(client: KMSClient, task: ReplicationTask): Promise<void> {
  try {
    await client.send(new ReplicateKeyCommand({
      BypassPolicyLockoutSafetyCheck: true,
      Description: REPLICA_DESCRIPTION,
      KeyId: task.keyId,
      Policy: task.policy,
      ReplicaRegion: task.targetRegion,
    }));
  } catch (error) {
    throw new ReplicationError(task.keyId, task.targetRegion, error);
  }

  console.log(`"${task.keyId}" replicated to "${task.targetRegion}" successfully.`);
}
