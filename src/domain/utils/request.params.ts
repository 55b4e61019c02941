const TRUTHY = new Set(["true", "1", "on", "yes"]);

export function parseBooleanParam(value: unknown, defaultValue: boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "string") {
    if (value.trim() === "") {
      return defaultValue;
    }
    return TRUTHY.has(value.trim().toLowerCase());
  }
  return defaultValue;
}

export function parseIntParam(value: unknown, defaultValue: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return defaultValue;
}

export function parseFloatParam(value: unknown, defaultValue: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : defaultValue;
  }
  return defaultValue;
}

export function parseStringParam(value: unknown, defaultValue: string): string {
  if (typeof value === "string" && value.trim() !== "") {
    return value.trim();
  }
  return defaultValue;
}

export function parseOptionalFloatParam(value: unknown): number | undefined {
  const parsed = parseFloatParam(value, Number.NaN);
  return Number.isNaN(parsed) ? undefined : parsed;
}
