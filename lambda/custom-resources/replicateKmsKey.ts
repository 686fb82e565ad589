import { CloudFormationCustomResourceEvent, Context } from 'aws-lambda';
import { KMSClient } from '@aws-sdk/client-kms';
import { sendResponse, ResponseStatus } from '../common/cfnResponse';
import { createKmsClient, getKeyPolicy } from '../common/kmsKeys';
import { ReplicationConfig, loadReplicationConfig } from '../common/replicationConfig';
import { ReplicationCoordinator } from '../common/replicationCoordinator';
import { ValidationError, describeError } from '../common/replicationErrors';

type RequestType = CloudFormationCustomResourceEvent['RequestType'];

const REQUEST_TYPES: readonly string[] = ['Create', 'Update', 'Delete'];

/**
 * Desired state of a Custom::KeyReplica resource, parsed from the event
 */
export interface ReplicationRequest {
  readonly requestType: RequestType;
  readonly keyId: string;
  readonly targetRegions: readonly string[];
}

export interface ReplicateKmsKeyDependencies {
  /** Called on Create only; throws ConfigurationError for a bad MAX_WORKERS */
  getConfig: () => ReplicationConfig;
  /** Used for the policy lookup and once per pool worker */
  createClient: () => KMSClient;
  notify: typeof sendResponse;
}

function isRequestType(value: unknown): value is RequestType {
  return typeof value === 'string' && REQUEST_TYPES.includes(value);
}

/**
 * Validate the inbound event and pull out the replication request.
 * Resource properties are only required for Create, the one request type that uses them.
 */
export function parseReplicationRequest(event: CloudFormationCustomResourceEvent): ReplicationRequest {
  const requestType: unknown = event.RequestType;
  if (!isRequestType(requestType)) {
    throw new ValidationError(`Unsupported RequestType "${String(requestType)}"`);
  }
  if (requestType !== 'Create') {
    return { requestType, keyId: '', targetRegions: [] };
  }

  const properties: Record<string, unknown> = event.ResourceProperties ?? {};

  const keyId = properties.KMSKeyID;
  if (typeof keyId !== 'string' || keyId.trim() === '') {
    throw new ValidationError('ResourceProperties.KMSKeyID is required');
  }

  const regions = properties.ReplicationRegions;
  if (!Array.isArray(regions)) {
    throw new ValidationError('ResourceProperties.ReplicationRegions must be a list of regions');
  }

  const targetRegions = regions.map((region: unknown, index: number) => {
    if (typeof region !== 'string' || region.trim() === '') {
      throw new ValidationError(`ResourceProperties.ReplicationRegions[${index}] must be a region name`);
    }
    return region.trim();
  });

  return { requestType, keyId: keyId.trim(), targetRegions };
}

async function resolveStatus(
  event: CloudFormationCustomResourceEvent,
  dependencies: ReplicateKmsKeyDependencies
): Promise<ResponseStatus> {
  try {
    const request = parseReplicationRequest(event);

    // Update and Delete leave existing replicas untouched
    if (request.requestType !== 'Create') {
      console.log(`${request.requestType} request, nothing to replicate`);
      return 'SUCCESS';
    }

    const config = dependencies.getConfig();
    const policy = await getKeyPolicy(dependencies.createClient(), request.keyId);

    const coordinator = new ReplicationCoordinator({
      config,
      createClient: dependencies.createClient,
    });
    const result = await coordinator.replicateToRegions(request.keyId, policy, request.targetRegions);

    if (result.status === 'FAILED') {
      console.error(`Replication of "${request.keyId}" failed:`, describeError(result.failure.error));
      return 'FAILED';
    }

    console.log(`"${request.keyId}" replicated to ${request.targetRegions.length} region(s)`);
    return 'SUCCESS';
  } catch (error) {
    console.error('Error replicating KMS key:', error);
    return 'FAILED';
  }
}

/**
 * Build the Custom::KeyReplica handler around its collaborators
 */
export function createReplicateKmsKeyHandler(dependencies: ReplicateKmsKeyDependencies) {
  return async (event: CloudFormationCustomResourceEvent, context: Context): Promise<void> => {
    console.log('Event:', JSON.stringify(event, null, 2));

    const status = await resolveStatus(event, dependencies);

    try {
      await dependencies.notify(event, context, status, {});
    } catch (error) {
      console.error('Failed to send response to CloudFormation:', error);
      throw error;
    }
  };
}

let cachedConfig: ReplicationConfig | undefined;

function getConfig(): ReplicationConfig {
  if (!cachedConfig) {
    cachedConfig = loadReplicationConfig();
  }
  return cachedConfig;
}

export const handler = createReplicateKmsKeyHandler({
  getConfig,
  createClient: createKmsClient,
  notify: sendResponse,
});
