import { TaskKind, SourceType } from "../enums/task.kind";
import { TaskStatus } from "../enums/task.status";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type ParamValue = string | number | boolean;
export type ConversionParams = Record<string, ParamValue>;

export interface TaskInputFile {
  path: string;
  originalName: string;
  size: number;
}

export interface ConversionTask {
  id: string;
  kind: TaskKind;
  status: TaskStatus;
  progress: number; // 0-100
  sourceType: SourceType;
  sourceUrl?: string;
  originalFilename?: string;
  fileSize?: number;
  contentType?: string;
  inputFiles: TaskInputFile[];
  outputPath?: string;
  targetFormat: string;
  conversionParams: ConversionParams;
  queueJobId?: string;
  errorMessage?: string;
  metadata: JsonObject; // Free-form result details written by the worker
  createdBy?: string;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export type NewConversionTask = Omit<
  ConversionTask,
  "id" | "status" | "progress" | "createdAt" | "updatedAt" | "startedAt" | "completedAt" | "errorMessage"
>;
