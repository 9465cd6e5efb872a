/**
 * Account Service - DynamoDB Client
 *
 * Lazily created DocumentClient shared by every handler in the process,
 * reused across Lambda warm starts.
 *
 * Region and credentials come from the Lambda execution environment.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

let docClient: DynamoDBDocumentClient | null = null;

export function getDocClient(): DynamoDBDocumentClient {
    if (!docClient) {
        const client = new DynamoDBClient({});
        docClient = DynamoDBDocumentClient.from(client, {
            marshallOptions: {
                removeUndefinedValues: true,
                convertEmptyValues: false,
            },
        });
    }
    return docClient;
}
