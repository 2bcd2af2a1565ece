import { type Result, fail, ok } from "./errors";

export type RequestBody = Record<string, unknown>;

export const REQUIRED_FIELDS = ["tenant_id", "pelicula_datos"] as const;

export interface PeliculaInput {
  tenant_id: unknown;
  pelicula_datos: unknown;
}

function isObject(value: unknown): value is RequestBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolves the request body from the invocation envelope, in order:
 *
 * - `event.body` as an object
 * - `event.body` as JSON text (blank text is an empty body)
 * - the event itself when it has no `body` key
 *
 * The last form only shows up on direct invocations; API Gateway always
 * wraps the payload in `body`.
 */
export function parseEventBody(event: unknown): Result<RequestBody> {
  if (!isObject(event)) {
    return ok({});
  }
  if (!("body" in event)) {
    return ok(event);
  }

  const body = event.body;
  if (isObject(body)) {
    return ok(body);
  }
  if (typeof body !== "string") {
    return fail("ValidationError", "El campo 'body' debe ser dict o string JSON.");
  }
  if (!body.trim()) {
    return ok({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return fail("ValidationError", "El body no es un JSON válido.", error);
  }
  if (!isObject(parsed)) {
    return fail("ValidationError", "El body debe ser un objeto JSON.");
  }
  return ok(parsed);
}

// presence only, values are stored as sent
export function requireFields(body: RequestBody): Result<PeliculaInput> {
  for (const field of REQUIRED_FIELDS) {
    if (!(field in body)) {
      return fail("MissingFieldError", `Falta '${field}' en el body.`);
    }
  }
  return ok({ tenant_id: body.tenant_id, pelicula_datos: body.pelicula_datos });
}

/** Input summary for error logs; never includes the payload itself. */
export function relevantInput(event: unknown) {
  const parsed = parseEventBody(event);
  const body = parsed.ok ? parsed.value : {};
  return {
    tenant_id: body.tenant_id ?? null,
    tiene_pelicula_datos: "pelicula_datos" in body,
  };
}
