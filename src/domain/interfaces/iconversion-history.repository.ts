import { ConversionHistory } from "../entities/conversion-history";

export interface HistoryFilter {
  /** Matches entries whose input format is one of these extensions. */
  inputFormats?: readonly string[];
  status?: ConversionHistory["status"];
  /** Case-insensitive substring of the original filename. */
  search?: string;
  since?: Date;
}

export interface FormatCount {
  format: string;
  count: number;
}

export interface HistoryStats {
  total: number;
  byStatus: Record<string, number>;
  byOutputFormat: Record<string, number>;
  averageProcessingTimeSeconds: number | null;
  totalInputSize: number;
  totalOutputSize: number;
  todayCount: number;
  successRate: number; // Percent of done entries, one decimal
  popularInputFormats: FormatCount[];
  popularOutputFormats: FormatCount[];
}

export interface IConversionHistoryRepository {
  create(entry: Omit<ConversionHistory, "id" | "createdAt">): Promise<ConversionHistory>;
  list(filter: HistoryFilter, skip: number, limit: number): Promise<{ items: ConversionHistory[]; total: number }>;
  /** Totals over the whole history; `todayStart` bounds the today count. */
  stats(todayStart: Date): Promise<HistoryStats>;
}
