import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {describe, it, expect, beforeEach, afterEach} from "vitest";
import {ContainerType, UintNumberType} from "@chainsafe/ssz";
import {Counter as MetricCounter} from "@warden/utils";
import {Db, LevelDbController, LevelDbControllerMetrics, Repository} from "../../src/index.js";

const Counter = new ContainerType({count: new UintNumberType(8)});
type CounterValue = {count: number};

/** Sums increments per bucket label */
class BucketCounter implements MetricCounter<{bucket: string}> {
  readonly byBucket = new Map<string, number>();

  inc(labelsOrValue?: {bucket: string} | number, value = 1): void {
    const bucket = typeof labelsOrValue === "object" ? labelsOrValue.bucket : "";
    this.byBucket.set(bucket, (this.byBucket.get(bucket) ?? 0) + value);
  }
}

class CounterRepository extends Repository<CounterValue> {
  constructor(db: Db, bucket: number) {
    super(db, bucket, `counter_${bucket}`, Counter);
  }
}

describe("LevelDbController and Repository", () => {
  let dbLocation: string;
  let controller: LevelDbController;

  beforeEach(async () => {
    dbLocation = await fs.mkdtemp(path.join(os.tmpdir(), "warden-db-"));
    controller = new LevelDbController({name: dbLocation});
    await controller.start();
  });

  afterEach(async () => {
    await controller.stop();
    await fs.rm(dbLocation, {recursive: true, force: true});
  });

  it("should return null for a missing key", async () => {
    expect(await controller.get(Uint8Array.from([9, 9]))).toBeNull();
  });

  it("should put and get raw values", async () => {
    const key = Uint8Array.from([1, 2]);
    await controller.put(key, Uint8Array.from([3]));
    expect(await controller.get(key)).toEqual(Uint8Array.from([3]));
  });

  it("should round trip SSZ values through a repository", async () => {
    const repo = new CounterRepository(controller, 1);
    const id = Uint8Array.from([0xaa, 0xbb]);

    expect(await repo.get(id)).toBeNull();

    await repo.put(id, {count: 7});
    expect(await repo.get(id)).toEqual({count: 7});

    await repo.put(id, {count: 8});
    expect(await repo.get(id)).toEqual({count: 8});
  });

  it("should keep buckets apart", async () => {
    const repoA = new CounterRepository(controller, 1);
    const repoB = new CounterRepository(controller, 2);
    const id = Uint8Array.from([1]);

    await repoA.put(id, {count: 1});
    expect(await repoB.get(id)).toBeNull();

    await repoB.put(id, {count: 10});
    expect(await repoA.get(id)).toEqual({count: 1});
    expect(await controller.get(Uint8Array.from([2, 1]))).toEqual(Counter.serialize({count: 10}));
  });

  it("should count reads and writes by bucket", async () => {
    const metrics = {
      dbReadReq: new BucketCounter(),
      dbReadItems: new BucketCounter(),
      dbWriteReq: new BucketCounter(),
      dbWriteItems: new BucketCounter(),
    } satisfies LevelDbControllerMetrics;
    await controller.stop();
    const metered = new LevelDbController({name: dbLocation}, {metrics});
    await metered.start();

    const repo = new CounterRepository(metered, 3);
    await repo.put(Uint8Array.from([1]), {count: 1});
    await repo.get(Uint8Array.from([1]));
    await repo.get(Uint8Array.from([2]));
    await metered.stop();

    expect(metrics.dbWriteReq.byBucket.get("counter_3")).toBe(1);
    expect(metrics.dbReadReq.byBucket.get("counter_3")).toBe(2);
  });
});
