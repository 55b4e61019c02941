import { Db, Document, Filter, Sort } from "mongodb";
import { randomUUID } from "crypto";
import { ConversionTask, NewConversionTask, TaskInputFile } from "../../../domain/entities/conversion-task";
import { TaskStatus, isTaskStatus } from "../../../domain/enums/task.status";
import { isSourceType, isTaskKind } from "../../../domain/enums/task.kind";
import {
  IConversionTaskRepository,
  TaskListPage,
  TaskListQuery,
} from "../../../domain/interfaces/iconversion-task.repository";
import { TaskOrderField } from "../../../domain/utils/pagination";
import { MongoDBRepository } from "../mongodb.repository";
import {
  optionalDate,
  optionalNumber,
  optionalString,
  readJsonObject,
  readParams,
  requireDate,
  requireNumber,
  requireString,
} from "../document.readers";

const ORDER_FIELDS: Record<TaskOrderField, string> = {
  created_at: "createdAt",
  updated_at: "updatedAt",
  completed_at: "completedAt",
  status: "status",
  progress: "progress",
};

export class ConversionTaskRepository
  extends MongoDBRepository<ConversionTask>
  implements IConversionTaskRepository
{
  constructor(db: Db) {
    super(db, "conversionTasks");
  }

  protected async ensureIndexes(): Promise<void> {
    await super.ensureIndexes();
    await this.collection.createIndex({ status: 1, createdAt: -1 });
    await this.collection.createIndex({ targetFormat: 1 });
    await this.collection.createIndex({ completedAt: 1 });
  }

  protected toDomain(doc: Document): ConversionTask {
    const kind: unknown = doc.kind;
    const status: unknown = doc.status;
    const sourceType: unknown = doc.sourceType;
    if (!isTaskKind(kind) || !isTaskStatus(status) || !isSourceType(sourceType)) {
      throw new Error(`Conversion task document ${String(doc.id)} is malformed`);
    }

    return {
      id: requireString(doc, "id"),
      kind,
      status,
      progress: requireNumber(doc, "progress"),
      sourceType,
      sourceUrl: optionalString(doc, "sourceUrl"),
      originalFilename: optionalString(doc, "originalFilename"),
      fileSize: optionalNumber(doc, "fileSize"),
      contentType: optionalString(doc, "contentType"),
      inputFiles: this.readInputFiles(doc),
      outputPath: optionalString(doc, "outputPath"),
      targetFormat: requireString(doc, "targetFormat"),
      conversionParams: readParams(doc, "conversionParams"),
      queueJobId: optionalString(doc, "queueJobId"),
      errorMessage: optionalString(doc, "errorMessage"),
      metadata: readJsonObject(doc, "metadata"),
      createdBy: optionalString(doc, "createdBy"),
      createdAt: requireDate(doc, "createdAt"),
      updatedAt: requireDate(doc, "updatedAt"),
      startedAt: optionalDate(doc, "startedAt"),
      completedAt: optionalDate(doc, "completedAt"),
    };
  }

  private readInputFiles(doc: Document): TaskInputFile[] {
    const value: unknown = doc.inputFiles;
    if (!Array.isArray(value)) {
      return [];
    }
    const files: TaskInputFile[] = [];
    for (const entry of value) {
      if (entry && typeof entry === "object") {
        const path = optionalString(entry, "path");
        const originalName = optionalString(entry, "originalName");
        if (path && originalName) {
          files.push({ path, originalName, size: optionalNumber(entry, "size") ?? 0 });
        }
      }
    }
    return files;
  }

  async create(input: NewConversionTask): Promise<ConversionTask> {
    const now = new Date();
    const task: ConversionTask = {
      ...input,
      id: randomUUID(),
      status: "queued",
      progress: 0,
      createdAt: now,
      updatedAt: now,
    };
    return this.insert(task);
  }

  async updateIfStatus(
    id: string,
    statuses: readonly TaskStatus[],
    updates: Partial<ConversionTask>
  ): Promise<ConversionTask | null> {
    const { id: _ignored, ...fields } = updates;
    const result = await this.collection.findOneAndUpdate(
      { id, status: { $in: [...statuses] } },
      { $set: { ...fields, updatedAt: new Date() } },
      { returnDocument: "after" }
    );
    return result ? this.toDomain(result) : null;
  }

  async list(query: TaskListQuery): Promise<TaskListPage> {
    const filter: Filter<Document> = {};
    if (query.status) {
      filter.status = query.status;
    }
    if (query.targetFormat) {
      filter.targetFormat = query.targetFormat;
    }

    const sort: Sort = { [ORDER_FIELDS[query.ordering.field]]: query.ordering.descending ? -1 : 1 };
    const [docs, total] = await Promise.all([
      this.collection.find(filter).sort(sort).skip(query.skip).limit(query.limit).toArray(),
      this.collection.countDocuments(filter),
    ]);
    return { items: docs.map((doc) => this.toDomain(doc)), total };
  }

  async findCompletedBefore(statuses: readonly TaskStatus[], before: Date): Promise<ConversionTask[]> {
    const docs = await this.collection
      .find({ status: { $in: [...statuses] }, completedAt: { $lt: before } })
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async findRecentOrActive(since: Date, limit: number): Promise<ConversionTask[]> {
    const docs = await this.collection
      .find({ $or: [{ createdAt: { $gte: since } }, { status: { $in: ["queued", "running"] } }] })
      .sort({ createdAt: -1 })
      .limit(limit)
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async countByStatus(): Promise<Record<TaskStatus, number>> {
    const counts: Record<TaskStatus, number> = { queued: 0, running: 0, done: 0, failed: 0 };
    const rows = await this.collection
      .aggregate([{ $group: { _id: "$status", count: { $sum: 1 } } }])
      .toArray();
    for (const row of rows) {
      const status: unknown = row._id;
      const count: unknown = row.count;
      if (isTaskStatus(status) && typeof count === "number") {
        counts[status] = count;
      }
    }
    return counts;
  }
}

