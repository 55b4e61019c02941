import { TaskKind } from "../enums/task.kind";

export interface ConversionHistory {
  id: string;
  taskId: string;
  kind: TaskKind;
  originalFilename?: string;
  inputFormat?: string;
  outputFormat: string;
  inputSize?: number;
  outputSize?: number;
  status: "done" | "failed";
  processingTimeSeconds?: number;
  errorMessage?: string;
  createdAt: Date;
}
