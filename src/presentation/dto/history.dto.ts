import { ConversionHistory } from "../../domain/entities/conversion-history";
import { HistoryStats } from "../../domain/interfaces/iconversion-history.repository";
import { compressionRatio } from "../../domain/utils/conversion-history.stats";
import { AppliedHistoryFilters } from "../../application/use-cases/get-conversion-history.use-case";

export interface HistoryEntryResponse {
  id: string;
  task_id: string;
  kind: string;
  original_filename: string | null;
  input_format: string | null;
  output_format: string;
  input_size: number | null;
  output_size: number | null;
  status: string;
  processing_time_seconds: number | null;
  error_message: string | null;
  compression_ratio: number | null;
  created_at: string;
}

export function toHistoryEntryResponse(entry: ConversionHistory): HistoryEntryResponse {
  return {
    id: entry.id,
    task_id: entry.taskId,
    kind: entry.kind,
    original_filename: entry.originalFilename ?? null,
    input_format: entry.inputFormat ?? null,
    output_format: entry.outputFormat,
    input_size: entry.inputSize ?? null,
    output_size: entry.outputSize ?? null,
    status: entry.status,
    processing_time_seconds: entry.processingTimeSeconds ?? null,
    error_message: entry.errorMessage ?? null,
    compression_ratio: compressionRatio(entry),
    created_at: entry.createdAt.toISOString(),
  };
}

export function toHistoryStatsResponse(stats: HistoryStats) {
  return {
    success: true,
    total: stats.total,
    by_status: stats.byStatus,
    by_output_format: stats.byOutputFormat,
    average_processing_time_seconds: stats.averageProcessingTimeSeconds,
    total_input_size: stats.totalInputSize,
    total_output_size: stats.totalOutputSize,
    today_count: stats.todayCount,
    success_rate: stats.successRate,
    popular_formats: {
      input: stats.popularInputFormats,
      output: stats.popularOutputFormats,
    },
  };
}

export function toHistoryFiltersResponse(filters: AppliedHistoryFilters) {
  return {
    file_type: filters.fileType,
    status: filters.status,
    search: filters.search,
    period: filters.period,
  };
}
