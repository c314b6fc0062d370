import {Level} from "level";
import {DatabaseController, DatabaseOptions, DbReqOpts} from "./interface.js";
import {LevelDbControllerMetrics} from "./metrics.js";

enum Status {
  started = "started",
  stopped = "stopped",
}

export type LevelDbControllerModules = {
  metrics?: LevelDbControllerMetrics | null;
};

const BUCKET_ID_UNKNOWN = "unknown";

/**
 * The LevelDB implementation of DB
 */
export class LevelDbController implements DatabaseController<Uint8Array, Uint8Array> {
  private status = Status.stopped;
  private readonly db: Level<Uint8Array, Uint8Array>;
  private readonly metrics: LevelDbControllerMetrics | null;

  constructor(opts: DatabaseOptions, {metrics}: LevelDbControllerModules = {}) {
    this.metrics = metrics ?? null;
    this.db = new Level<Uint8Array, Uint8Array>(opts.name, {keyEncoding: "binary", valueEncoding: "binary"});
  }

  async start(): Promise<void> {
    if (this.status === Status.started) return;
    this.status = Status.started;

    await this.db.open();
  }

  async stop(): Promise<void> {
    if (this.status === Status.stopped) return;
    this.status = Status.stopped;

    await this.db.close();
  }

  async get(key: Uint8Array, opts?: DbReqOpts): Promise<Uint8Array | null> {
    try {
      this.metrics?.dbReadReq.inc({bucket: opts?.bucketId ?? BUCKET_ID_UNKNOWN}, 1);
      this.metrics?.dbReadItems.inc({bucket: opts?.bucketId ?? BUCKET_ID_UNKNOWN}, 1);
      return (await this.db.get(key)) ?? null;
    } catch (e) {
      if (isLevelNotFound(e)) {
        return null;
      }
      throw e;
    }
  }

  put(key: Uint8Array, value: Uint8Array, opts?: DbReqOpts): Promise<void> {
    this.metrics?.dbWriteReq.inc({bucket: opts?.bucketId ?? BUCKET_ID_UNKNOWN}, 1);
    this.metrics?.dbWriteItems.inc({bucket: opts?.bucketId ?? BUCKET_ID_UNKNOWN}, 1);

    return this.db.put(key, value);
  }
}

/** From https://www.npmjs.com/package/level */
function isLevelNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "LEVEL_NOT_FOUND";
}
