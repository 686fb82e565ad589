import { CloudFormationCustomResourceEvent, CloudFormationCustomResourceResponse, Context } from 'aws-lambda';
import * as https from 'https';
import { ResponseDeliveryError } from './replicationErrors';

export type ResponseStatus = 'SUCCESS' | 'FAILED';

/**
 * Build the response document CloudFormation expects for a custom resource
 */
export function buildResponseBody(
  event: CloudFormationCustomResourceEvent,
  context: Pick<Context, 'logStreamName'>,
  status: ResponseStatus,
  data: Record<string, unknown> = {}
): CloudFormationCustomResourceResponse {
  const physicalResourceId = 'PhysicalResourceId' in event
    ? event.PhysicalResourceId
    : context.logStreamName;

  return {
    Status: status,
    Reason: `See the details in CloudWatch Log Stream: ${context.logStreamName}`,
    PhysicalResourceId: physicalResourceId,
    StackId: event.StackId,
    RequestId: event.RequestId,
    LogicalResourceId: event.LogicalResourceId,
    NoEcho: false,
    Data: data,
  };
}

/**
 * Send response to CloudFormation custom resource.
 * Not retried: if this fails, CloudFormation waits until its own timeout.
 */
export async function sendResponse(
  event: CloudFormationCustomResourceEvent,
  context: Pick<Context, 'logStreamName'>,
  status: ResponseStatus,
  data: Record<string, unknown> = {}
): Promise<void> {
  const responseBody = JSON.stringify(buildResponseBody(event, context, status, data));
  const parsedUrl = new URL(event.ResponseURL);

  const options: https.RequestOptions = {
    hostname: parsedUrl.hostname,
    port: 443,
    path: `${parsedUrl.pathname}${parsedUrl.search}`,
    method: 'PUT',
    headers: {
      'content-type': '',
      'content-length': Buffer.byteLength(responseBody),
    },
  };

  console.log(`Sending ${status} response to CloudFormation`);

  return new Promise((resolve, reject) => {
    const request = https.request(options, (response) => {
      const statusCode = response.statusCode ?? 0;
      response.resume();
      if (statusCode >= 200 && statusCode < 300) {
        resolve();
      } else {
        reject(new ResponseDeliveryError(`CloudFormation rejected the response with status ${statusCode}`));
      }
    });

    request.on('error', (error) => {
      console.error('sendResponse Error:', error);
      reject(new ResponseDeliveryError('Unable to deliver the response to CloudFormation', error));
    });

    request.write(responseBody);
    request.end();
  });
}
