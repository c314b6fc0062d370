import {BUCKET_LENGTH} from "./const.js";

/**
 * Prepend a bucket to a key
 */
export function encodeKey(bucket: number, key: Uint8Array): Uint8Array {
  if (!Number.isInteger(bucket) || bucket < 0 || bucket > 0xff) {
    throw Error(`bucket ${bucket} does not fit in ${BUCKET_LENGTH} byte`);
  }
  const buf = new Uint8Array(BUCKET_LENGTH + key.length);
  //bucket prefix on position 0
  buf[0] = bucket;
  buf.set(key, BUCKET_LENGTH);
  return buf;
}
