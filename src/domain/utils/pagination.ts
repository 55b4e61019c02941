import { ValidationError } from "../errors/app.error";
import { TaskStatus, isTaskStatus } from "../enums/task.status";

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

export const TaskOrderFields = ["created_at", "updated_at", "completed_at", "status", "progress"] as const;
export type TaskOrderField = typeof TaskOrderFields[number];

export interface PageRequest {
  page: number;
  perPage: number;
}

export interface PaginationInfo {
  page: number;
  per_page: number;
  total: number;
  pages: number;
  has_next: boolean;
  has_previous: boolean;
}

export interface TaskOrdering {
  field: TaskOrderField;
  descending: boolean;
}

export function parsePageRequest(page: unknown, perPage: unknown): PageRequest {
  const parsedPage = parsePositiveNumber(page, 1);
  const parsedPerPage = parsePositiveNumber(perPage, DEFAULT_PAGE_SIZE);
  return {
    page: Math.max(1, parsedPage),
    perPage: Math.min(Math.max(1, parsedPerPage), MAX_PAGE_SIZE),
  };
}

export function buildPagination(request: PageRequest, total: number): PaginationInfo {
  const pages = Math.max(1, Math.ceil(total / request.perPage));
  return {
    page: request.page,
    per_page: request.perPage,
    total,
    pages,
    has_next: request.page < pages,
    has_previous: request.page > 1,
  };
}

/** `-created_at` style ordering; anything outside the whitelist falls back to newest first. */
export function parseTaskOrdering(value: unknown): TaskOrdering {
  if (typeof value === "string") {
    const descending = value.startsWith("-");
    const field = descending ? value.slice(1) : value;
    const match = TaskOrderFields.find((candidate) => candidate === field);
    if (match) {
      return { field: match, descending };
    }
  }
  return { field: "created_at", descending: true };
}

/** Status filter applies only when it names a real status. */
export function parseStatusFilter(value: unknown): TaskStatus | undefined {
  return isTaskStatus(value) ? value : undefined;
}

function parsePositiveNumber(value: unknown, defaultValue: number): number {
  if (value === undefined || value === "") {
    return defaultValue;
  }
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  throw new ValidationError("Invalid pagination parameters");
}
