import { type DynamoDBClient, DynamoDBServiceException } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, PutCommand, type PutCommandOutput } from "@aws-sdk/lib-dynamodb";

export type StoreItem = Record<string, unknown>;

export interface PutResult {
  httpStatus: number | null;
}

export interface RecordStore {
  putItem(tableName: string, item: StoreItem): Promise<PutResult>;
}

/** The store refused the write for a caller-side reason (bad table, permissions, throttling). */
export class StoreClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreClientError";
  }
}

export interface PutItemClient {
  send(command: PutCommand): Promise<PutCommandOutput>;
}

/**
 * Payloads are stored as sent, so numbers past Number.MAX_SAFE_INTEGER are
 * written with the precision JSON.parse left them instead of being rejected.
 */
export function documentClient(client: DynamoDBClient) {
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: { allowImpreciseNumbers: true },
  });
}

export class DynamoRecordStore implements RecordStore {
  constructor(private readonly dynamo: PutItemClient) {}

  async putItem(tableName: string, item: StoreItem): Promise<PutResult> {
    try {
      const response = await this.dynamo.send(
        new PutCommand({
          TableName: tableName,
          Item: item,
        })
      );
      return { httpStatus: response.$metadata.httpStatusCode ?? null };
    } catch (error) {
      if (error instanceof DynamoDBServiceException && error.$fault === "client") {
        throw new StoreClientError(`${error.name}: ${error.message}`);
      }
      throw error;
    }
  }
}
