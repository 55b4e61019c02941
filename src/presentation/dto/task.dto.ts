import { ConversionParams, ConversionTask, JsonObject } from "../../domain/entities/conversion-task";
import { durationSeconds, isActive, isFinished } from "../../domain/utils/conversion-task.state";
import { downloadFilename } from "../../domain/utils/file.naming";
import { PaginationInfo } from "../../domain/utils/pagination";
import { TaskResult } from "../../application/use-cases/get-task-result.use-case";

function iso(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

export function taskApiUrls(taskId: string): { status: string; result: string; download: string } {
  return {
    status: `/api/tasks/${taskId}/status`,
    result: `/api/tasks/${taskId}/result`,
    download: `/api/tasks/${taskId}/download`,
  };
}

export interface TaskCreatedResponse {
  success: true;
  task_id: string;
  status: string;
  message: string;
  api_urls: ReturnType<typeof taskApiUrls>;
}

export function toTaskCreatedResponse(task: ConversionTask, message = "Task created and queued for processing"): TaskCreatedResponse {
  return {
    success: true,
    task_id: task.id,
    status: task.status,
    message,
    api_urls: taskApiUrls(task.id),
  };
}

export interface TaskStatusResponse {
  success: true;
  task_id: string;
  status: string;
  progress: number;
  created_at: string | null;
  updated_at: string | null;
  started_at: string | null;
  completed_at: string | null;
  error_message: string | null;
  is_finished: boolean;
  is_active: boolean;
  metadata: JsonObject;
  duration_seconds?: number;
}

export function toTaskMetadata(task: ConversionTask): JsonObject {
  const base: JsonObject = {
    source_type: task.sourceType,
    source_url: task.sourceUrl ?? null,
    target_format: task.targetFormat,
    conversion_params: task.conversionParams,
    original_filename: task.originalFilename ?? null,
    file_size: task.fileSize ?? null,
    content_type: task.contentType ?? null,
  };
  return { ...base, ...task.metadata };
}

export function toTaskStatusResponse(task: ConversionTask, now: Date = new Date()): TaskStatusResponse {
  const response: TaskStatusResponse = {
    success: true,
    task_id: task.id,
    status: task.status,
    progress: task.progress,
    created_at: iso(task.createdAt),
    updated_at: iso(task.updatedAt),
    started_at: iso(task.startedAt),
    completed_at: iso(task.completedAt),
    error_message: task.errorMessage ?? null,
    is_finished: isFinished(task),
    is_active: isActive(task),
    metadata: toTaskMetadata(task),
  };
  const duration = durationSeconds(task, now);
  if (duration !== null) {
    response.duration_seconds = duration;
  }
  return response;
}

export interface TaskResultPayload {
  output_url: string;
  download_url: string;
  filename: string;
  file_size: number;
  format: string;
  original_filename: string | null;
  conversion_params: ConversionParams;
  metadata: JsonObject;
}

export type TaskResultResponse =
  | {
      success: true;
      task_id: string;
      status: string;
      result: TaskResultPayload;
      completed_at: string | null;
      duration_seconds: number | null;
    }
  | { success: false; task_id: string; status: string; error: string }
  | { success: false; task_id: string; status: string; error_message: string | null; completed_at: string | null }
  | { success: false; task_id: string; status: string; message: string; progress: number };

export function toTaskResultResponse(result: TaskResult, now: Date = new Date()): TaskResultResponse {
  const { task, output } = result;

  if (task.status === "done") {
    if (!output) {
      return { success: false, task_id: task.id, status: task.status, error: "Result file not found" };
    }
    return {
      success: true,
      task_id: task.id,
      status: task.status,
      result: {
        output_url: output.url,
        download_url: taskApiUrls(task.id).download,
        filename: downloadFilename(task.originalFilename, task.targetFormat),
        file_size: output.size,
        format: task.targetFormat,
        original_filename: task.originalFilename ?? null,
        conversion_params: task.conversionParams,
        metadata: task.metadata,
      },
      completed_at: iso(task.completedAt),
      duration_seconds: durationSeconds(task, now),
    };
  }

  if (task.status === "failed") {
    return {
      success: false,
      task_id: task.id,
      status: task.status,
      error_message: task.errorMessage ?? null,
      completed_at: iso(task.completedAt),
    };
  }

  return {
    success: false,
    task_id: task.id,
    status: task.status,
    message: "Task is not completed yet",
    progress: task.progress,
  };
}

export interface TaskSummary {
  task_id: string;
  kind: string;
  status: string;
  progress: number;
  target_format: string;
  original_filename: string | null;
  file_size: number | null;
  error_message: string | null;
  created_at: string | null;
  updated_at: string | null;
  completed_at: string | null;
}

export function toTaskSummary(task: ConversionTask): TaskSummary {
  return {
    task_id: task.id,
    kind: task.kind,
    status: task.status,
    progress: task.progress,
    target_format: task.targetFormat,
    original_filename: task.originalFilename ?? null,
    file_size: task.fileSize ?? null,
    error_message: task.errorMessage ?? null,
    created_at: iso(task.createdAt),
    updated_at: iso(task.updatedAt),
    completed_at: iso(task.completedAt),
  };
}

export interface TaskListResponse {
  success: true;
  tasks: TaskSummary[];
  pagination: PaginationInfo;
}

export function toTaskListResponse(tasks: ConversionTask[], pagination: PaginationInfo): TaskListResponse {
  return { success: true, tasks: tasks.map(toTaskSummary), pagination };
}
