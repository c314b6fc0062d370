import {describe, it, expect, beforeEach} from "vitest";
import {FAR_FUTURE_EPOCH} from "@warden/params";
import {
  EpochHistoryError,
  EpochHistoryErrorCode,
  EpochHistoryRepository,
  createEmptyEpochHistory,
  markAttestationForTargetEpoch,
} from "../../../src/slashingProtection/index.js";
import {MemoryDbController} from "../../utils/db.js";

describe("slashingProtection / EpochHistoryRepository", () => {
  const pubkey = Buffer.alloc(48, 1);
  let controller: MemoryDbController;

  beforeEach(() => {
    controller = new MemoryDbController();
  });

  it("should load an empty history for an unknown key", async () => {
    const repo = new EpochHistoryRepository(controller, 4);
    expect(await repo.load(pubkey)).toEqual(createEmptyEpochHistory(4));
  });

  it("should round trip a history with unset slots", async () => {
    const repo = new EpochHistoryRepository(controller, 4);
    const history = markAttestationForTargetEpoch(createEmptyEpochHistory(4), 5, 6);
    await repo.save(pubkey, history);

    const loaded = await repo.load(pubkey);
    expect(loaded).toEqual({
      latestEpochWritten: 6,
      targetToSource: [FAR_FUTURE_EPOCH, FAR_FUTURE_EPOCH, 5, FAR_FUTURE_EPOCH],
    });
  });

  it("should keep keys apart", async () => {
    const repo = new EpochHistoryRepository(controller, 4);
    const otherPubkey = Buffer.alloc(48, 2);
    await repo.save(pubkey, markAttestationForTargetEpoch(createEmptyEpochHistory(4), 1, 2));

    expect(await repo.load(otherPubkey)).toEqual(createEmptyEpochHistory(4));
  });

  it("should reject a stored history of another period", async () => {
    await new EpochHistoryRepository(controller, 4).save(pubkey, createEmptyEpochHistory(4));
    await expect(new EpochHistoryRepository(controller, 8).load(pubkey)).rejects.toMatchObject({
      type: {code: EpochHistoryErrorCode.PERIOD_MISMATCH, expected: 8, actual: 4},
    });
  });

  it("should reject saving a history of another period", async () => {
    const repo = new EpochHistoryRepository(controller, 4);
    await expect(repo.save(pubkey, createEmptyEpochHistory(3))).rejects.toBeInstanceOf(EpochHistoryError);
  });

  it("should reject a pubkey of the wrong length", async () => {
    const repo = new EpochHistoryRepository(controller, 4);
    await expect(repo.load(Buffer.alloc(10))).rejects.toMatchObject({
      type: {code: EpochHistoryErrorCode.INVALID_PUBKEY, length: 10},
    });
  });
});
