import { ValidationError } from "@chunkwise/shared";

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function requireJsonObject(body: unknown): Record<string, unknown> {
  if (!isJsonObject(body)) {
    throw new ValidationError("Request body must be a JSON object");
  }
  return body;
}
