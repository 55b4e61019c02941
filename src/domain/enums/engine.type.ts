export const EngineTypes = ["video", "image", "audio", "document", "archive"] as const;
export type EngineType = typeof EngineTypes[number];

export function isEngineType(value: unknown): value is EngineType {
  return typeof value === "string" && EngineTypes.some((type) => type === value);
}

export const QualityPresets = ["high", "medium", "low"] as const;
export type QualityPreset = typeof QualityPresets[number];

export function isQualityPreset(value: unknown): value is QualityPreset {
  return typeof value === "string" && QualityPresets.some((preset) => preset === value);
}
