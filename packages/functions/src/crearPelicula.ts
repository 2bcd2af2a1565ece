import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import type { APIGatewayProxyResult } from "aws-lambda";
import { v4 as uuidv4 } from "uuid";

import { parseEventBody, relevantInput, requireFields } from "./lib/body";
import { type Failure, type Result, STATUS_BY_KIND, fail, messageOf, ok, traceOf } from "./lib/errors";
import { DynamoRecordStore, type PutResult, type RecordStore, StoreClientError, documentClient } from "./lib/store";

const OPERACION = "crear_pelicula";
const GENERIC_ERROR_MESSAGE = "Error interno inesperado.";

export const TABLE_ENV_NAME = "TABLE_NAME";

export interface HandlerConfig {
  tableName?: string;
}

export interface Pelicula {
  tenant_id: unknown;
  uuid: string;
  pelicula_datos: unknown;
}

export interface CrearPeliculaDeps {
  config: HandlerConfig;
  store: RecordStore;
  newId?: () => string;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): HandlerConfig {
  return { tableName: env[TABLE_ENV_NAME] };
}

export function resolveTableName(config: HandlerConfig): Result<string> {
  if (!config.tableName) {
    return fail("ConfigurationError", `Variable de entorno '${TABLE_ENV_NAME}' no definida.`);
  }
  return ok(config.tableName);
}

// one JSON object per line on stdout
function log(tipo: "INFO" | "ERROR", log_datos: Record<string, unknown>) {
  console.log(JSON.stringify({ tipo, log_datos }));
}

function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
  };
}

async function writePelicula(
  store: RecordStore,
  tableName: string,
  pelicula: Pelicula
): Promise<Result<PutResult>> {
  try {
    return ok(await store.putItem(tableName, { ...pelicula }));
  } catch (error) {
    if (error instanceof StoreClientError) {
      return fail("StoreClientError", error.message, error);
    }
    return fail("UnexpectedError", messageOf(error), error);
  }
}

function failed(event: unknown, config: HandlerConfig, failure: Failure): APIGatewayProxyResult {
  log("ERROR", {
    operacion: OPERACION,
    estado: "error",
    mensaje: failure.message,
    tipo_error: failure.kind,
    traceback: traceOf(failure),
    tabla: config.tableName ?? null,
    entrada_relevante: relevantInput(event),
  });

  const statusCode = STATUS_BY_KIND[failure.kind];
  // 5xx never echoes internal exception text
  return jsonResponse(statusCode, {
    error: {
      mensaje: statusCode >= 500 ? GENERIC_ERROR_MESSAGE : failure.message,
      tipo_error: failure.kind,
    },
  });
}

/**
 * Creates one pelicula item for the tenant in the request. Never throws:
 * every failure becomes a 4xx/5xx response plus an ERROR log line.
 */
export async function crearPelicula(
  event: unknown,
  { config, store, newId = uuidv4 }: CrearPeliculaDeps
): Promise<APIGatewayProxyResult> {
  try {
    log("INFO", { evento_entrada: event });

    const table = resolveTableName(config);
    if (!table.ok) return failed(event, config, table.error);

    const body = parseEventBody(event);
    if (!body.ok) return failed(event, config, body.error);

    const input = requireFields(body.value);
    if (!input.ok) return failed(event, config, input.error);

    const pelicula: Pelicula = {
      tenant_id: input.value.tenant_id,
      uuid: newId(),
      pelicula_datos: input.value.pelicula_datos,
    };

    const written = await writePelicula(store, table.value, pelicula);
    if (!written.ok) return failed(event, config, written.error);

    const http_status = written.value.httpStatus;
    log("INFO", {
      operacion: OPERACION,
      estado: "ok",
      tabla: table.value,
      tenant_id: pelicula.tenant_id,
      uuid: pelicula.uuid,
      http_status,
    });

    return jsonResponse(200, {
      pelicula,
      response: { http_status },
    });
  } catch (error) {
    return failed(event, config, { kind: "UnexpectedError", message: messageOf(error), cause: error });
  }
}

const client = new DynamoDBClient({});
const store = new DynamoRecordStore(documentClient(client));

export async function handler(event: unknown) {
  return crearPelicula(event, { config: readConfig(), store });
}
