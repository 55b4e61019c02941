export const TaskKinds = ["conversion", "audio_to_text", "images_to_gif"] as const;
export type TaskKind = typeof TaskKinds[number];

export const SourceTypes = ["upload", "url"] as const;
export type SourceType = typeof SourceTypes[number];

export function isTaskKind(value: unknown): value is TaskKind {
  return typeof value === "string" && TaskKinds.some((kind) => kind === value);
}

export function isSourceType(value: unknown): value is SourceType {
  return typeof value === "string" && SourceTypes.some((type) => type === value);
}
