import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { config } from '../config';
import { getErrorMessage, getErrorStatusCode } from '../errors';
import { createPipeline } from '../services/pipeline';
import { WebhookIntake } from '../services/webhookIntake';
import { normalizeHeaders } from '../services/webhookSignature';

export type WebhookHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

function respond(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  };
}

export function createHandler(intake: WebhookIntake): WebhookHandler {
  return async event => {
    const provider = event.pathParameters?.provider || 'unknown';
    console.log(`${provider} webhook received for ${event.pathParameters?.clientReferenceId || '(no tenant)'}`);

    if (event.httpMethod !== 'POST') {
      return respond(405, { error: 'Method not allowed' });
    }

    if (!event.body) {
      return respond(400, { error: 'Missing request body' });
    }

    const rawBody = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;

    try {
      const acceptance = await intake.receive({
        provider,
        clientReferenceId: event.pathParameters?.clientReferenceId,
        rawBody,
        headers: normalizeHeaders(event.headers)
      });
      return respond(202, acceptance);
    } catch (error) {
      const statusCode = getErrorStatusCode(error);
      if (statusCode === 500) {
        console.error('Error processing webhook:', error);
        return respond(500, { error: 'Internal server error', details: getErrorMessage(error) });
      }
      return respond(statusCode, { error: getErrorMessage(error) });
    }
  };
}

let defaultHandler: WebhookHandler | undefined;

// Built on first invocation so a cold start without credentials still loads the module.
export const handler: WebhookHandler = async event => {
  if (!defaultHandler) {
    defaultHandler = createHandler(createPipeline(config).intake);
  }
  return defaultHandler(event);
};
