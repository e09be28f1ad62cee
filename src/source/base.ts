/**
 * A random-access byte source. `read` returns a fresh array owned by the caller,
 * shorter than `length` only when the end of the data is reached.
 */
export interface ByteSource {
	readonly size: number;
	read(offset: number, length: number): Uint8Array;
}
