import { Document } from "mongodb";
import { ConversionParams, JsonObject, JsonValue } from "../../domain/entities/conversion-task";

function invalid(key: string): Error {
  return new Error(`Stored document has an invalid "${key}" field`);
}

export function requireString(doc: Document, key: string): string {
  const value: unknown = doc[key];
  if (typeof value !== "string") {
    throw invalid(key);
  }
  return value;
}

export function optionalString(doc: Document, key: string): string | undefined {
  const value: unknown = doc[key];
  return typeof value === "string" ? value : undefined;
}

export function requireNumber(doc: Document, key: string): number {
  const value: unknown = doc[key];
  if (typeof value !== "number") {
    throw invalid(key);
  }
  return value;
}

export function optionalNumber(doc: Document, key: string): number | undefined {
  const value: unknown = doc[key];
  return typeof value === "number" ? value : undefined;
}

export function requireDate(doc: Document, key: string): Date {
  const value: unknown = doc[key];
  if (!(value instanceof Date)) {
    throw invalid(key);
  }
  return value;
}

export function optionalDate(doc: Document, key: string): Date | undefined {
  const value: unknown = doc[key];
  return value instanceof Date ? value : undefined;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === "object") {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

export function readJsonObject(doc: Document, key: string): JsonObject {
  const value: unknown = doc[key];
  const result: JsonObject = {};
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return result;
  }
  for (const [entryKey, entryValue] of Object.entries(value)) {
    if (isJsonValue(entryValue)) {
      result[entryKey] = entryValue;
    }
  }
  return result;
}

export function readParams(doc: Document, key: string): ConversionParams {
  const value: unknown = doc[key];
  const params: ConversionParams = {};
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return params;
  }
  for (const [entryKey, entryValue] of Object.entries(value)) {
    if (typeof entryValue === "string" || typeof entryValue === "number" || typeof entryValue === "boolean") {
      params[entryKey] = entryValue;
    }
  }
  return params;
}
