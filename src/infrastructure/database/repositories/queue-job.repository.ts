import { Db, Document } from "mongodb";
import { randomUUID } from "crypto";
import { QueueJob, abandonedMessage } from "../../../domain/entities/queue-job";
import { QueueName, isJobName, isQueueJobStatus, isQueueName } from "../../../domain/enums/queue.name";
import { IQueueJobRepository, NewQueueJob } from "../../../domain/interfaces/iqueue-job.repository";
import { MongoDBRepository } from "../mongodb.repository";
import { optionalDate, optionalString, requireDate, requireNumber, requireString } from "../document.readers";

export class QueueJobRepository extends MongoDBRepository<QueueJob> implements IQueueJobRepository {
  constructor(db: Db) {
    super(db, "queueJobs");
  }

  protected async ensureIndexes(): Promise<void> {
    await super.ensureIndexes();
    // Claim query: pending jobs of a queue, due first
    await this.collection.createIndex({ status: 1, queue: 1, runAt: 1 });
    await this.collection.createIndex({ status: 1, lockExpiresAt: 1 });
  }

  protected toDomain(doc: Document): QueueJob {
    const queue: unknown = doc.queue;
    const name: unknown = doc.name;
    const status: unknown = doc.status;
    if (!isQueueName(queue) || !isJobName(name) || !isQueueJobStatus(status)) {
      throw new Error(`Queue job document ${String(doc.id)} is malformed`);
    }
    const taskId: unknown = doc.payload?.taskId;

    return {
      id: requireString(doc, "id"),
      queue,
      name,
      payload: typeof taskId === "string" ? { taskId } : {},
      status,
      attempts: requireNumber(doc, "attempts"),
      maxRetries: requireNumber(doc, "maxRetries"),
      retryDelayMs: requireNumber(doc, "retryDelayMs"),
      timeLimitMs: requireNumber(doc, "timeLimitMs"),
      runAt: requireDate(doc, "runAt"),
      lockedBy: optionalString(doc, "lockedBy"),
      lockedAt: optionalDate(doc, "lockedAt"),
      lockExpiresAt: optionalDate(doc, "lockExpiresAt"),
      error: optionalString(doc, "error"),
      completedAt: optionalDate(doc, "completedAt"),
      createdAt: requireDate(doc, "createdAt"),
      updatedAt: requireDate(doc, "updatedAt"),
    };
  }

  async create(job: NewQueueJob): Promise<QueueJob> {
    const now = new Date();
    return this.insert({ ...job, id: randomUUID(), createdAt: now, updatedAt: now });
  }

  async claimNext(queues: readonly QueueName[], workerId: string, now: Date): Promise<QueueJob | null> {
    // The lock outlives the time limit by a minute so recovery never races a live worker
    const result = await this.collection.findOneAndUpdate(
      { status: "pending", queue: { $in: [...queues] }, runAt: { $lte: now } },
      [
        {
          $set: {
            status: "active",
            attempts: { $add: ["$attempts", 1] },
            lockedBy: workerId,
            lockedAt: now,
            lockExpiresAt: { $add: [now, { $add: ["$timeLimitMs", 60 * 1000] }] },
            updatedAt: now,
          },
        },
      ],
      { sort: { runAt: 1, createdAt: 1 }, returnDocument: "after" }
    );
    return result ? this.toDomain(result) : null;
  }

  async markCompleted(id: string, now: Date): Promise<void> {
    await this.finish(id, { status: "completed", completedAt: now, updatedAt: now });
  }

  async markFailed(id: string, error: string, now: Date): Promise<void> {
    await this.finish(id, { status: "failed", error, completedAt: now, updatedAt: now });
  }

  async scheduleRetry(id: string, error: string, runAt: Date): Promise<void> {
    await this.collection.updateOne(
      { id, status: "active" },
      {
        $set: { status: "pending", error, runAt, updatedAt: new Date() },
        $unset: { lockedBy: "", lockedAt: "", lockExpiresAt: "" },
      }
    );
  }

  async revoke(id: string, now: Date): Promise<boolean> {
    const result = await this.collection.updateOne(
      { id, status: { $in: ["pending", "active"] } },
      { $set: { status: "revoked", completedAt: now, updatedAt: now } }
    );
    return result.modifiedCount > 0;
  }

  async findRevokedIds(ids: string[]): Promise<string[]> {
    if (ids.length === 0) {
      return [];
    }
    const docs = await this.collection
      .find({ id: { $in: ids }, status: "revoked" }, { projection: { id: 1 } })
      .toArray();
    return docs.map((doc) => requireString(doc, "id"));
  }

  async releaseExpiredLocks(now: Date): Promise<number> {
    const result = await this.collection.updateMany(
      { status: "active", lockExpiresAt: { $lt: now }, $expr: { $lte: ["$attempts", "$maxRetries"] } },
      {
        $set: { status: "pending", runAt: now, updatedAt: now },
        $unset: { lockedBy: "", lockedAt: "", lockExpiresAt: "" },
      }
    );
    if (result.modifiedCount > 0) {
      console.log(`[QueueJobRepository] Released ${result.modifiedCount} expired job lock(s)`);
    }
    return result.modifiedCount;
  }

  async failExhaustedLocks(now: Date): Promise<QueueJob[]> {
    const docs = await this.collection
      .find({ status: "active", lockExpiresAt: { $lt: now }, $expr: { $gt: ["$attempts", "$maxRetries"] } })
      .toArray();

    const failed: QueueJob[] = [];
    for (const doc of docs) {
      const job = this.toDomain(doc);
      const error = abandonedMessage(job);
      const result = await this.collection.updateOne(
        { id: job.id, status: "active", lockExpiresAt: { $lt: now } },
        {
          $set: { status: "failed", error, completedAt: now, updatedAt: now },
          $unset: { lockedBy: "", lockedAt: "", lockExpiresAt: "" },
        }
      );
      if (result.modifiedCount > 0) {
        const { lockedBy, lockedAt, lockExpiresAt, ...unlocked } = job;
        failed.push({ ...unlocked, status: "failed", error, completedAt: now, updatedAt: now });
      }
    }
    if (failed.length > 0) {
      console.warn(`[QueueJobRepository] Failed ${failed.length} job(s) abandoned on their last attempt`);
    }
    return failed;
  }

  async purgeFinished(before: Date): Promise<number> {
    const result = await this.collection.deleteMany({
      status: { $in: ["completed", "failed", "revoked"] },
      completedAt: { $lt: before },
    });
    return result.deletedCount;
  }

  private async finish(id: string, fields: Document): Promise<void> {
    // A revoked job keeps its status even if the handler finishes afterwards
    await this.collection.updateOne(
      { id, status: "active" },
      { $set: fields, $unset: { lockedBy: "", lockedAt: "", lockExpiresAt: "" } }
    );
  }
}
