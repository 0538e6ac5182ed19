import { randomUUID } from "crypto";
import { MongoClient, type Collection } from "mongodb";
import type { SourceRecord } from "../../core/records/sourceRecord";
import type { RecordDoc, RecordSink } from "../../ports/RecordSink";
import { retry } from "../../shared/retry/retry";
import { logEvent } from "../../shared/logging/log";
import { mongoIndexes } from "./mongo.indexes";

// Driver errors carrying these labels are safe to send again.
const retryableLabels = ["RetryableWriteError", "TransientTransactionError"];

export const isTransientMongoError = (err: unknown): boolean => {
  if (!(err instanceof Error)) return false;
  if (err.name === "MongoNetworkError" || err.name === "MongoNetworkTimeoutError") return true;

  const labels: unknown = Reflect.get(err, "errorLabels");
  return Array.isArray(labels) && labels.some((label) => retryableLabels.includes(String(label)));
};

/**
 * A job redelivered after its timeout produces the same offset key again;
 * keep only the last record per key inside one batch.
 */
export const dedupeRecordsByJobKey = (records: SourceRecord[]): SourceRecord[] => {
  const byJobKey = new Map<string, SourceRecord>();
  for (const record of records) {
    byJobKey.set(record.sourceOffset.key, record);
  }
  return Array.from(byJobKey.values());
};

export class MongoRecordSink implements RecordSink {
  private client?: MongoClient;
  private collection?: Collection<RecordDoc>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "job-bridge",
    private readonly collectionName = "job_records"
  ) {}

  private async getCollection(): Promise<Collection<RecordDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const col = this.client.db(this.dbName).collection<RecordDoc>(this.collectionName);
    for (const idx of mongoIndexes.recordCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async write(records: SourceRecord[]): Promise<{ upserted: number; modified: number }> {
    if (records.length === 0) {
      return { upserted: 0, modified: 0 };
    }

    const col = await this.getCollection();
    const writtenAt = new Date();
    const ops = dedupeRecordsByJobKey(records).map((record) => ({
      updateOne: {
        filter: { jobKey: record.sourceOffset.key },
        update: {
          $setOnInsert: {
            _id: randomUUID(),
            jobKey: record.sourceOffset.key
          },
          $set: {
            partitionId: record.sourcePartition.partitionId,
            topic: record.topic,
            payload: record.value,
            writtenAt
          }
        },
        upsert: true
      }
    }));

    const res = await retry(() => col.bulkWrite(ops, { ordered: false }), {
      retries: 3,
      minDelayMs: 100,
      maxDelayMs: 2000,
      shouldRetry: isTransientMongoError,
      onRetry: ({ attempt, maxAttempts }) => {
        logEvent("warn", { event: "sink.retry", collection: this.collectionName, attempt, maxAttempts });
      }
    });

    return {
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
