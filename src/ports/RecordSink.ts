import type { SourceRecord } from "../core/records/sourceRecord";

export type RecordDoc = {
  _id: string;          // UUIDv4
  jobKey: string;       // offset key of the record
  partitionId: number;
  topic: string;
  payload: string;      // serialized job
  writtenAt: Date;
};

export interface RecordSink {
  write(records: SourceRecord[]): Promise<{ upserted: number; modified: number }>;
}
