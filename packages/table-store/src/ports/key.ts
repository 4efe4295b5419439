/**
 * Scalar types accepted as a partition or sort key.
 *
 * @remarks
 * Each key marshals to exactly one table attribute: strings to `S`, numbers
 * and bigints to `N`, byte arrays to `B`. Numbers must be integers.
 */
export type Key = string | number | bigint | Uint8Array
