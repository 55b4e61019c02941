import { HistoryStats, IConversionHistoryRepository } from "../../domain/interfaces/iconversion-history.repository";
import { startOfUtcDay } from "../../domain/utils/conversion-history.stats";

export class GetHistoryStatsUseCase {
  constructor(private historyRepository: IConversionHistoryRepository) {}

  async execute(now: Date = new Date()): Promise<HistoryStats> {
    return this.historyRepository.stats(startOfUtcDay(now));
  }
}
