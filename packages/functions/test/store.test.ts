import { DynamoDBClient, InternalServerError, ResourceNotFoundException } from "@aws-sdk/client-dynamodb";
import type { PutCommand, PutCommandOutput } from "@aws-sdk/lib-dynamodb";
import { afterEach, describe, expect, it, vi } from "vitest";
import { crearPelicula } from "../src/crearPelicula";
import { DynamoRecordStore, StoreClientError, documentClient } from "../src/lib/store";

/** Real document client whose requests stop at the build step and come back 200. */
function stubbedDocumentClient() {
  const sent: unknown[] = [];
  const client = new DynamoDBClient({
    region: "us-east-1",
    credentials: { accessKeyId: "test", secretAccessKey: "test" },
  });
  client.middlewareStack.add(
    () => async (args) => {
      sent.push(args.input);
      return { output: { $metadata: { httpStatusCode: 200 } }, response: {} };
    },
    { step: "build", priority: "low" }
  );
  return { dynamo: documentClient(client), sent };
}

function clientThrowing(error: unknown) {
  return {
    send: vi.fn(async (_command: PutCommand): Promise<PutCommandOutput> => {
      throw error;
    }),
  };
}

describe("DynamoRecordStore", () => {
  it("puts the item into the named table and reports the http status", async () => {
    const client = {
      send: vi.fn(async (_command: PutCommand): Promise<PutCommandOutput> => ({
        $metadata: { httpStatusCode: 200 },
      })),
    };
    const store = new DynamoRecordStore(client);
    const item = { tenant_id: "t1", uuid: "u1", pelicula_datos: { titulo: "X" } };

    await expect(store.putItem("Peliculas", item)).resolves.toEqual({ httpStatus: 200 });
    expect(client.send).toHaveBeenCalledTimes(1);
    expect(client.send.mock.calls[0][0].input).toEqual({ TableName: "Peliculas", Item: item });
  });

  it("reports a null status when the response carries none", async () => {
    const client = {
      send: vi.fn(async (_command: PutCommand): Promise<PutCommandOutput> => ({ $metadata: {} })),
    };
    const store = new DynamoRecordStore(client);

    await expect(store.putItem("Peliculas", { tenant_id: "t1", uuid: "u1" })).resolves.toEqual({
      httpStatus: null,
    });
  });

  it("turns client faults into StoreClientError", async () => {
    const store = new DynamoRecordStore(
      clientThrowing(
        new ResourceNotFoundException({ $metadata: { httpStatusCode: 400 }, message: "Requested resource not found" })
      )
    );

    const error = await store.putItem("NoExiste", { tenant_id: "t1", uuid: "u1" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StoreClientError);
    expect(error).toMatchObject({ message: "ResourceNotFoundException: Requested resource not found" });
  });

  it("rethrows server faults untouched", async () => {
    const fault = new InternalServerError({ $metadata: { httpStatusCode: 500 }, message: "boom" });
    const store = new DynamoRecordStore(clientThrowing(fault));

    await expect(store.putItem("Peliculas", { tenant_id: "t1", uuid: "u1" })).rejects.toBe(fault);
  });

  it("rethrows non-SDK errors untouched", async () => {
    const fault = new TypeError("socket hang up");
    const store = new DynamoRecordStore(clientThrowing(fault));

    await expect(store.putItem("Peliculas", { tenant_id: "t1", uuid: "u1" })).rejects.toBe(fault);
  });
});

describe("documentClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("marshals the item into the PutItem request", async () => {
    const { dynamo, sent } = stubbedDocumentClient();
    const store = new DynamoRecordStore(dynamo);

    await expect(store.putItem("Peliculas", { tenant_id: "t1", uuid: "u1", pelicula_datos: { n: 1 } })).resolves.toEqual({
      httpStatus: 200,
    });
    expect(sent).toMatchObject([
      {
        TableName: "Peliculas",
        Item: {
          tenant_id: { S: "t1" },
          uuid: { S: "u1" },
          pelicula_datos: { M: { n: { N: "1" } } },
        },
      },
    ]);
  });

  it("stores numbers beyond the safe integer range", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const { dynamo, sent } = stubbedDocumentClient();

    const res = await crearPelicula(
      { body: '{"tenant_id":"t1","pelicula_datos":{"recaudacion":12345678901234567890}}' },
      { config: { tableName: "Peliculas" }, store: new DynamoRecordStore(dynamo), newId: () => "u1" }
    );

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body).response).toEqual({ http_status: 200 });
    expect(sent).toMatchObject([
      {
        TableName: "Peliculas",
        Item: {
          tenant_id: { S: "t1" },
          uuid: { S: "u1" },
          pelicula_datos: { M: { recaudacion: { N: "12345678901234567000" } } },
        },
      },
    ]);
  });
});
