/** Shortcut for Uint8Array based DatabaseController */
export type Db = DatabaseController<Uint8Array, Uint8Array>;

export type DatabaseOptions = {
  name: string;
};

export type DbReqOpts = {
  /** For metrics */
  bucketId?: string;
};

export interface DatabaseController<K, V> {
  // service start / stop

  start(): Promise<void>;
  stop(): Promise<void>;

  // Core API

  get(key: K, opts?: DbReqOpts): Promise<V | null>;
  put(key: K, value: V, opts?: DbReqOpts): Promise<void>;
}
