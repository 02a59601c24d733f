/**
 * One measurement sample as produced by the line-protocol parser.
 *
 * `timestamp` is nanoseconds since the Unix epoch; a JS Date only
 * resolves milliseconds.
 */
export type Point = Readonly<{
    measurement: string;
    tags: ReadonlyMap<string, string>;
    fields: ReadonlyMap<string, number>;
    timestamp: bigint;
}>;
