import { Db, Collection, Document } from "mongodb";

export abstract class MongoDBRepository<T extends { id: string }> {
  protected db: Db;
  protected collection: Collection<Document>;

  constructor(db: Db, collectionName: string) {
    this.db = db;
    this.collection = db.collection(collectionName);
    // Create indexes for efficient queries (fire and forget)
    this.ensureIndexes().catch((error: unknown) => {
      console.error(`[MongoDBRepository] Failed to create indexes for ${collectionName}:`, error);
    });
  }

  protected async ensureIndexes(): Promise<void> {
    // Domain ids are UUIDs stored in `id`; `_id` never leaves the repository
    await this.collection.createIndex({ id: 1 }, { unique: true });
  }

  /** Maps a stored document back to the entity, validating field types. */
  protected abstract toDomain(doc: Document): T;

  async findById(id: string): Promise<T | null> {
    const doc = await this.collection.findOne({ id });
    return doc ? this.toDomain(doc) : null;
  }

  async findByIds(ids: string[]): Promise<T[]> {
    if (ids.length === 0) {
      return [];
    }
    const docs = await this.collection.find({ id: { $in: ids } }).toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  protected async insert(entity: T): Promise<T> {
    // insertOne adds `_id` to the object it is given, so hand it a copy
    const doc: Document = { ...entity };
    await this.collection.insertOne(doc);
    return entity;
  }

  async update(id: string, updates: Partial<T>): Promise<T | null> {
    const { id: _ignored, ...fields } = updates;
    const result = await this.collection.findOneAndUpdate(
      { id },
      { $set: { ...fields, updatedAt: new Date() } },
      { returnDocument: "after" }
    );
    return result ? this.toDomain(result) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.collection.deleteOne({ id });
    return result.deletedCount > 0;
  }
}
