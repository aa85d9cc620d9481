/**
 * RecordReader Contract
 *
 * Readers are passive sources of input records. The pipeline pulls one batch
 * at a time and turns the records into capsules.
 *
 * Design principles:
 * - Passive: readers don't push; the pipeline pulls
 * - Bounded: a read returns at most `batchSize` records
 * - May track cursor: readers remember what they already returned
 */

/**
 * Options for reading the next batch.
 */
export interface ReadOptions {
    /** Maximum number of records to return */
    readonly batchSize: number;
}

/**
 * One batch of input records.
 */
export interface ReadResult<TInput> {
    /** Records read, in source order */
    readonly records: readonly TInput[];

    /** Whether more records may follow */
    readonly hasMore: boolean;

    /** Reader-specific position after this batch */
    readonly cursor?: string;
}

/**
 * RecordReader interface.
 *
 * End of input is a result with `hasMore: false`. A page with no records and
 * `hasMore: true` is skipped. More than `batchSize` records is a `ReaderError`.
 * Anything the reader throws aborts the pipeline with a `ReaderError`.
 *
 * @example
 * ```typescript
 * class ArrayReader<T> implements RecordReader<T> {
 *     readonly id = "array";
 *     readonly name = "Array Reader";
 *     private offset = 0;
 *
 *     constructor(private readonly items: T[]) {}
 *
 *     async read({ batchSize }: ReadOptions): Promise<ReadResult<T>> {
 *         const records = this.items.slice(this.offset, this.offset + batchSize);
 *         this.offset += records.length;
 *         return { records, hasMore: this.offset < this.items.length };
 *     }
 * }
 * ```
 */
export interface RecordReader<TInput> {
    /** Unique identifier for this reader */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Optional description */
    readonly description?: string;

    /**
     * Open the source. Called once before the first read.
     */
    initialize?(): Promise<void>;

    /**
     * Read the next batch.
     *
     * @param options - Batch size
     * @returns Records of the batch and whether more may follow
     */
    read(options: ReadOptions): Promise<ReadResult<TInput>>;

    /**
     * Close the source. Called once when the run ends, completed or aborted.
     */
    shutdown?(): Promise<void>;
}
