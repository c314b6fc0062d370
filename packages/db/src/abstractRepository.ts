import {Type} from "@chainsafe/ssz";
import {Db, DbReqOpts} from "./controller/index.js";
import {encodeKey as _encodeKey} from "./util.js";

/**
 * Repository is a high level kv storage
 * managing a Uint8Array to Uint8Array kv database
 * It translates typed values to Uint8Arrays required by the underlying database
 *
 * Values are SSZ-encoded with `type`, every key is prefixed with `bucket`
 */
export abstract class Repository<T> {
  protected db: Db;

  protected bucket: number;
  private readonly dbReqOpts: DbReqOpts;

  protected type: Type<T>;

  protected constructor(db: Db, bucket: number, bucketId: string, type: Type<T>) {
    this.db = db;
    this.bucket = bucket;
    this.dbReqOpts = {bucketId};
    this.type = type;
  }

  encodeValue(value: T): Uint8Array {
    return this.type.serialize(value);
  }

  decodeValue(data: Uint8Array): T {
    return this.type.deserialize(data);
  }

  encodeKey(id: Uint8Array): Uint8Array {
    return _encodeKey(this.bucket, id);
  }

  async get(id: Uint8Array): Promise<T | null> {
    const value = await this.db.get(this.encodeKey(id), this.dbReqOpts);
    if (value === null) return null;
    return this.decodeValue(value);
  }

  async put(id: Uint8Array, value: T): Promise<void> {
    await this.db.put(this.encodeKey(id), this.encodeValue(value), this.dbReqOpts);
  }
}
