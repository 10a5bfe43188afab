/** Response body of a get, consumed chunk by chunk. */
export type ObjectBody = AsyncIterable<Uint8Array>;

/**
 * The minimal capability the stress runner needs from an object store. A get resolves
 * once the store has answered and the body is ready to stream.
 */
export interface ObjectStore {
  get(bucket: string, key: string): Promise<ObjectBody>;
  put(bucket: string, key: string, payload: Uint8Array): Promise<void>;
  close?(): void;
}
