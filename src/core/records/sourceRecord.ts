export type SourcePartition = {
  partitionId: number;
};

// The job key stands in for a log position, which is not known at this layer.
// Keys grow monotonically per partition, so ordering between partitions is not implied.
export type SourceOffset = {
  key: string;
};

export type SourceRecord = {
  sourcePartition: SourcePartition;
  sourceOffset: SourceOffset;
  topic: string;
  key: bigint;
  value: string;
};
