export type BufferOptions = {
    /** Most requests in flight at once. `0` or unset uses `os.availableParallelism()`. */
    prefetch?: number;
    /** Most requested-but-unconsumed futures. Defaults to `3 × prefetch`, never below `prefetch`. */
    backlog?: number;
};
