/**
 * Common cache interface
 */
export interface Cache<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V, ttlMs: number): Promise<void>;
  del(key: string): Promise<void>;
  clear?(): Promise<void>;
  size?(): number;
  destroy?(): void;
}
