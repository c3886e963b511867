/**
 * DynamoDB Policy Adapter — DynamoDB Store
 *
 * The table primitives the adapter needs (paginated scan, put, delete with
 * old-value return, batch write) on top of the DynamoDB document client.
 * Transport retries belong to the SDK client (`maxAttempts`); every failure
 * that reaches this layer is wrapped and rethrown as is.
 */

import {
  DynamoDBClient,
  CreateTableCommand,
  type TableDescription,
} from "@aws-sdk/client-dynamodb";

import {
  DynamoDBDocumentClient,
  ScanCommand,
  PutCommand,
  DeleteCommand,
  BatchWriteCommand,
} from "@aws-sdk/lib-dynamodb";

import { PolicyStoreError } from "./errors.js";
import type { PolicyAdapterConfig, PolicyRecord, PolicyStore, ScanFilter, WriteOperation } from "./types.js";

// ─── Client Construction ───────────────────────────────────────────────────────

export type PolicyClients = {
  client: DynamoDBClient;
  docClient: DynamoDBDocumentClient;
};

export function createPolicyClients(
  config: Pick<PolicyAdapterConfig, "region" | "endpoint" | "credentials" | "maxRetries">,
): PolicyClients {
  const client = new DynamoDBClient({
    region: config.region,
    endpoint: config.endpoint,
    credentials: config.credentials,
    maxAttempts: config.maxRetries,
  });

  const docClient = DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      convertEmptyValues: false,
      removeUndefinedValues: true,
    },
    unmarshallOptions: {
      wrapNumbers: false,
    },
  });

  return { client, docClient };
}

// ─── Table Provisioning ────────────────────────────────────────────────────────

export type PolicyTableOptions = {
  billingMode?: "PAY_PER_REQUEST" | "PROVISIONED";
  provisionedThroughput?: {
    readCapacityUnits: number;
    writeCapacityUnits: number;
  };
  tags?: Record<string, string>;
};

/**
 * Create the policy table: string hash key `id`, every other attribute
 * schemaless.
 */
export async function createPolicyTable(
  client: DynamoDBClient,
  tableName: string,
  options: PolicyTableOptions = {},
): Promise<TableDescription | undefined> {
  const billingMode = options.billingMode ?? "PAY_PER_REQUEST";
  const tags = Object.entries(options.tags ?? {}).map(([Key, Value]) => ({ Key, Value }));

  try {
    const response = await client.send(
      new CreateTableCommand({
        TableName: tableName,
        AttributeDefinitions: [{ AttributeName: "id", AttributeType: "S" }],
        KeySchema: [{ AttributeName: "id", KeyType: "HASH" }],
        BillingMode: billingMode,
        ProvisionedThroughput:
          billingMode === "PROVISIONED"
            ? {
                ReadCapacityUnits: options.provisionedThroughput?.readCapacityUnits ?? 5,
                WriteCapacityUnits: options.provisionedThroughput?.writeCapacityUnits ?? 5,
              }
            : undefined,
        Tags: tags.length ? tags : undefined,
      }),
    );
    return response.TableDescription;
  } catch (error) {
    throw new PolicyStoreError("CreateTable", tableName, error);
  }
}

// ─── Store ─────────────────────────────────────────────────────────────────────

export type DynamoDBPolicyStoreOptions = {
  tableName: string;
  consistentRead?: boolean;
};

export class DynamoDBPolicyStore implements PolicyStore {
  private readonly docClient: DynamoDBDocumentClient;
  readonly tableName: string;
  private readonly consistentRead: boolean;

  constructor(docClient: DynamoDBDocumentClient, options: DynamoDBPolicyStoreOptions) {
    this.docClient = docClient;
    this.tableName = options.tableName;
    this.consistentRead = options.consistentRead ?? false;
  }

  async *scan(filter?: ScanFilter): AsyncGenerator<Record<string, unknown>> {
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const response = await this.docClient
        .send(
          new ScanCommand({
            TableName: this.tableName,
            FilterExpression: filter?.expression,
            ExpressionAttributeNames: filter?.expressionAttributeNames,
            ExpressionAttributeValues: filter?.expressionAttributeValues,
            ConsistentRead: this.consistentRead || undefined,
            ExclusiveStartKey: exclusiveStartKey,
          }),
        )
        .catch((error: unknown) => {
          throw new PolicyStoreError("Scan", this.tableName, error);
        });

      for (const item of response.Items ?? []) {
        yield item;
      }
      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);
  }

  async put(record: PolicyRecord): Promise<void> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: record,
        }),
      );
    } catch (error) {
      throw new PolicyStoreError("Put", this.tableName, error);
    }
  }

  async delete(id: string): Promise<Record<string, unknown> | undefined> {
    try {
      const response = await this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { id },
          ReturnValues: "ALL_OLD",
        }),
      );
      return response.Attributes;
    } catch (error) {
      throw new PolicyStoreError("Delete", this.tableName, error);
    }
  }

  async batchWrite(operations: WriteOperation[]): Promise<void> {
    const requests = operations.map((op) =>
      op.type === "put" ? { PutRequest: { Item: op.record } } : { DeleteRequest: { Key: { id: op.id } } },
    );

    let unprocessed: number;
    try {
      const response = await this.docClient.send(
        new BatchWriteCommand({
          RequestItems: { [this.tableName]: requests },
        }),
      );
      unprocessed = response.UnprocessedItems?.[this.tableName]?.length ?? 0;
    } catch (error) {
      throw new PolicyStoreError("BatchWrite", this.tableName, error);
    }

    if (unprocessed > 0) {
      throw new PolicyStoreError(
        "BatchWrite",
        this.tableName,
        new Error(`${unprocessed} of ${operations.length} items were not processed`),
      );
    }
  }
}
