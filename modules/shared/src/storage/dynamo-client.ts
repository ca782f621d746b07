/**
 * AuthGate - DynamoDB Document Client
 *
 * One document client per Lambda container, reused across invocations.
 *
 * @module storage/dynamo-client
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

/** Region falls back to the SDK default chain when absent */
export function createDocumentClient(config: { region?: string }): DynamoDBDocumentClient {
    return DynamoDBDocumentClient.from(new DynamoDBClient({ region: config.region }), {
        marshallOptions: {
            removeUndefinedValues: true,
            convertClassInstanceToMap: true,
        },
        unmarshallOptions: {
            wrapNumbers: false,
        },
    });
}
