import {
  compressionRatio,
  parseHistoryPeriod,
  periodStart,
  startOfUtcDay,
  successRate,
  topFormats,
} from "../../../src/domain/utils/conversion-history.stats";
import { GetConversionHistoryUseCase } from "../../../src/application/use-cases/get-conversion-history.use-case";
import { GetHistoryStatsUseCase } from "../../../src/application/use-cases/get-history-stats.use-case";
import { InMemoryHistoryRepository } from "../../fakes/in-memory-history.repository";

describe("history helpers", () => {
  const now = new Date("2026-03-15T18:30:00.000Z");

  it("falls back to the whole history for unknown periods", () => {
    expect(parseHistoryPeriod("month")).toBe("month");
    expect(parseHistoryPeriod("year")).toBe("all");
    expect(parseHistoryPeriod(undefined)).toBe("all");
  });

  it("starts periods at the UTC day or a rolling window", () => {
    expect(startOfUtcDay(now).toISOString()).toBe("2026-03-15T00:00:00.000Z");
    expect(periodStart("today", now)?.toISOString()).toBe("2026-03-15T00:00:00.000Z");
    expect(periodStart("week", now)?.toISOString()).toBe("2026-03-08T18:30:00.000Z");
    expect(periodStart("month", now)?.toISOString()).toBe("2026-02-13T18:30:00.000Z");
    expect(periodStart("all", now)).toBeUndefined();
  });

  it("rounds the success rate to one decimal", () => {
    expect(successRate(1, 3)).toBe(33.3);
    expect(successRate(4, 4)).toBe(100);
    expect(successRate(0, 0)).toBe(0);
  });

  it("ranks formats by count, then by name", () => {
    expect(topFormats({ webm: 2, gif: 5, avi: 2, mp3: 1 }, 3)).toEqual([
      { format: "gif", count: 5 },
      { format: "avi", count: 2 },
      { format: "webm", count: 2 },
    ]);
  });

  it("has no compression ratio without both sizes", () => {
    expect(compressionRatio({ inputSize: 1000, outputSize: undefined })).toBeNull();
  });
});

describe("GetConversionHistoryUseCase", () => {
  const now = new Date("2026-03-15T18:30:00.000Z");
  let history: InMemoryHistoryRepository;
  let useCase: GetConversionHistoryUseCase;

  beforeEach(() => {
    history = new InMemoryHistoryRepository();
    useCase = new GetConversionHistoryUseCase(history);
    history.seed({ taskId: "yesterday", kind: "conversion", inputFormat: "flac", outputFormat: "mp3", status: "done", createdAt: new Date("2026-03-14T23:59:00.000Z") });
    history.seed({ taskId: "morning", kind: "conversion", inputFormat: "flac", outputFormat: "ogg", status: "failed", createdAt: new Date("2026-03-15T06:00:00.000Z") });
    history.seed({ taskId: "old", kind: "conversion", inputFormat: "docx", outputFormat: "pdf", status: "done", createdAt: new Date("2026-01-01T00:00:00.000Z") });
  });

  it("counts today from UTC midnight", async () => {
    const result = await useCase.execute({ period: "today", now });

    expect(result.entries.map((entry) => entry.taskId)).toEqual(["morning"]);
    expect(result.filters.period).toBe("today");
  });

  it("combines the file type with the period", async () => {
    const result = await useCase.execute({ fileType: "audio", period: "month", now });

    expect(result.entries.map((entry) => entry.taskId)).toEqual(["morning", "yesterday"]);
    expect(result.pagination.total).toBe(2);
  });

  it("drops a blank search", async () => {
    const result = await useCase.execute({ search: "   ", now });

    expect(result.filters.search).toBeNull();
    expect(result.pagination.total).toBe(3);
  });

  it("reports today's count in the stats", async () => {
    const stats = await new GetHistoryStatsUseCase(history).execute(now);

    expect(stats.todayCount).toBe(1);
    expect(stats.successRate).toBe(66.7);
    expect(stats.popularInputFormats).toEqual([
      { format: "flac", count: 2 },
      { format: "docx", count: 1 },
    ]);
    expect(stats.popularOutputFormats).toHaveLength(3);
  });
});
