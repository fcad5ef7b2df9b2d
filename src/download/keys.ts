export class KeyRangeError extends Error {}

/**
 * Digit width needed to index `numberSamplePerShard` samples inside one shard.
 */
export function computeOomSamplePerShard(numberSamplePerShard: number): number {
  return Math.ceil(Math.log10(numberSamplePerShard));
}

/**
 * Global key of the sample at `index` in shard `shardId`: the shard id followed by
 * the zero-padded index, `oomSamplePerShard + oomShardCount` digits wide.
 *
 * Computed in bigint so wide keys keep every digit. Inputs outside the digit
 * widths produce a longer string rather than an error;
 * use {@link assertKeyRange} to reject such shards up front.
 */
export function computeKey(index: number, shardId: number, oomSamplePerShard: number, oomShardCount: number): string {
  const trueKey = 10n ** BigInt(oomSamplePerShard) * BigInt(shardId) + BigInt(index);
  return trueKey.toString().padStart(oomSamplePerShard + oomShardCount, "0");
}

export function assertKeyRange(
  recordCount: number,
  shardId: number,
  oomSamplePerShard: number,
  oomShardCount: number,
): void {
  const sampleCapacity = 10 ** oomSamplePerShard;
  if (recordCount > sampleCapacity) {
    throw new KeyRangeError(
      `Shard ${shardId} has ${recordCount} records but keys only fit ${sampleCapacity} per shard (oomSamplePerShard=${oomSamplePerShard})`,
    );
  }
  if (!Number.isInteger(shardId) || shardId < 0 || shardId >= 10 ** oomShardCount) {
    throw new KeyRangeError(`Shard id ${shardId} does not fit in ${oomShardCount} digits`);
  }
}
