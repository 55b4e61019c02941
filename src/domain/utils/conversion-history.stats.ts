import { ConversionHistory } from "../entities/conversion-history";
import { ConversionTask } from "../entities/conversion-task";
import { durationSeconds } from "./conversion-task.state";
import { extensionOf } from "./file.naming";

/** Percentage saved by the conversion; negative when the output grew. */
export function compressionRatio(entry: Pick<ConversionHistory, "inputSize" | "outputSize">): number | null {
  if (!entry.inputSize || entry.outputSize === undefined) {
    return null;
  }
  return Math.round((1 - entry.outputSize / entry.inputSize) * 100 * 100) / 100;
}

export function historyFromTask(
  task: ConversionTask,
  outputSize: number | undefined,
  now: Date = new Date()
): Omit<ConversionHistory, "id" | "createdAt"> | null {
  if (task.status !== "done" && task.status !== "failed") {
    return null;
  }
  const inputFormat = task.originalFilename ? extensionOf(task.originalFilename) : undefined;
  const processingTime = durationSeconds(task, now);
  return {
    taskId: task.id,
    kind: task.kind,
    originalFilename: task.originalFilename,
    inputFormat: inputFormat || undefined,
    outputFormat: task.targetFormat,
    inputSize: task.fileSize,
    outputSize,
    status: task.status,
    processingTimeSeconds: processingTime ?? undefined,
    errorMessage: task.errorMessage,
  };
}

export const HistoryPeriods = ["all", "today", "week", "month"] as const;
export type HistoryPeriod = typeof HistoryPeriods[number];

export function parseHistoryPeriod(value: unknown): HistoryPeriod {
  return HistoryPeriods.find((period) => period === value) ?? "all";
}

export function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

/** Earliest createdAt the period covers; undefined for "all". */
export function periodStart(period: HistoryPeriod, now: Date): Date | undefined {
  switch (period) {
    case "today":
      return startOfUtcDay(now);
    case "week":
      return new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000);
    case "month":
      return new Date(now.getTime() - 30 * 24 * 60 * 60 * 1000);
    case "all":
      return undefined;
  }
}

export function successRate(doneCount: number, total: number): number {
  return total > 0 ? Math.round((doneCount / total) * 1000) / 10 : 0;
}

/** Most frequent formats first, ties by name; at most `limit`. */
export function topFormats(counts: Record<string, number>, limit = 5): Array<{ format: string; count: number }> {
  return Object.entries(counts)
    .map(([format, count]) => ({ format, count }))
    .sort((a, b) => b.count - a.count || a.format.localeCompare(b.format))
    .slice(0, limit);
}
