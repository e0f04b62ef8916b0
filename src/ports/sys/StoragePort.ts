/** Keyed text storage. `read` resolves to null when nothing was stored under the key. */
export interface StoragePort {
  write(key: string, value: string): Promise<void>;
  read(key: string): Promise<string | null>;
  remove(key: string): Promise<void>;
}
