import { Db, Document, Filter } from "mongodb";
import { randomUUID } from "crypto";
import { ConversionHistory } from "../../../domain/entities/conversion-history";
import { isTaskKind } from "../../../domain/enums/task.kind";
import { HistoryFilter, HistoryStats, IConversionHistoryRepository } from "../../../domain/interfaces/iconversion-history.repository";
import { successRate, topFormats } from "../../../domain/utils/conversion-history.stats";
import { MongoDBRepository } from "../mongodb.repository";
import { optionalNumber, optionalString, requireDate, requireString } from "../document.readers";

export class ConversionHistoryRepository
  extends MongoDBRepository<ConversionHistory>
  implements IConversionHistoryRepository
{
  constructor(db: Db) {
    super(db, "conversionHistory");
  }

  protected async ensureIndexes(): Promise<void> {
    await super.ensureIndexes();
    await this.collection.createIndex({ createdAt: -1 });
    await this.collection.createIndex({ taskId: 1 });
  }

  protected toDomain(doc: Document): ConversionHistory {
    const kind: unknown = doc.kind;
    const status: unknown = doc.status;
    if (!isTaskKind(kind) || (status !== "done" && status !== "failed")) {
      throw new Error(`History document ${String(doc.id)} is malformed`);
    }
    return {
      id: requireString(doc, "id"),
      taskId: requireString(doc, "taskId"),
      kind,
      originalFilename: optionalString(doc, "originalFilename"),
      inputFormat: optionalString(doc, "inputFormat"),
      outputFormat: requireString(doc, "outputFormat"),
      inputSize: optionalNumber(doc, "inputSize"),
      outputSize: optionalNumber(doc, "outputSize"),
      status,
      processingTimeSeconds: optionalNumber(doc, "processingTimeSeconds"),
      errorMessage: optionalString(doc, "errorMessage"),
      createdAt: requireDate(doc, "createdAt"),
    };
  }

  async create(entry: Omit<ConversionHistory, "id" | "createdAt">): Promise<ConversionHistory> {
    return this.insert({ ...entry, id: randomUUID(), createdAt: new Date() });
  }

  async list(filter: HistoryFilter, skip: number, limit: number): Promise<{ items: ConversionHistory[]; total: number }> {
    const query = toQuery(filter);
    const [docs, total] = await Promise.all([
      this.collection.find(query).sort({ createdAt: -1 }).skip(skip).limit(limit).toArray(),
      this.collection.countDocuments(query),
    ]);
    return { items: docs.map((doc) => this.toDomain(doc)), total };
  }

  async stats(todayStart: Date): Promise<HistoryStats> {
    const [totals] = await this.collection
      .aggregate([
        {
          $group: {
            _id: null,
            total: { $sum: 1 },
            averageProcessingTime: { $avg: "$processingTimeSeconds" },
            totalInputSize: { $sum: { $ifNull: ["$inputSize", 0] } },
            totalOutputSize: { $sum: { $ifNull: ["$outputSize", 0] } },
          },
        },
      ])
      .toArray();

    const byStatus = await this.countBy("$status");
    const byOutputFormat = await this.countBy("$outputFormat");
    const byInputFormat = await this.countBy("$inputFormat");
    const todayCount = await this.collection.countDocuments({ createdAt: { $gte: todayStart } });
    const average: unknown = totals?.averageProcessingTime;
    const total = numberOr(totals?.total, 0);

    return {
      total,
      byStatus,
      byOutputFormat,
      averageProcessingTimeSeconds: typeof average === "number" ? Math.round(average * 100) / 100 : null,
      totalInputSize: numberOr(totals?.totalInputSize, 0),
      totalOutputSize: numberOr(totals?.totalOutputSize, 0),
      todayCount,
      successRate: successRate(byStatus.done ?? 0, total),
      popularInputFormats: topFormats(byInputFormat),
      popularOutputFormats: topFormats(byOutputFormat),
    };
  }

  private async countBy(field: string): Promise<Record<string, number>> {
    const rows = await this.collection.aggregate([{ $group: { _id: field, count: { $sum: 1 } } }]).toArray();
    const counts: Record<string, number> = {};
    for (const row of rows) {
      const key: unknown = row._id;
      const count: unknown = row.count;
      if (typeof key === "string" && typeof count === "number") {
        counts[key] = count;
      }
    }
    return counts;
  }
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function toQuery(filter: HistoryFilter): Filter<Document> {
  const query: Filter<Document> = {};
  if (filter.inputFormats) {
    query.inputFormat = { $in: [...filter.inputFormats] };
  }
  if (filter.status) {
    query.status = filter.status;
  }
  if (filter.search) {
    query.originalFilename = { $regex: escapeRegex(filter.search), $options: "i" };
  }
  if (filter.since) {
    query.createdAt = { $gte: filter.since };
  }
  return query;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" ? value : fallback;
}
