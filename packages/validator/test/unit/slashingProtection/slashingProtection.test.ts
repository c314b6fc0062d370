import {describe, it, expect, beforeEach} from "vitest";
import {FAR_FUTURE_EPOCH} from "@warden/params";
import {
  InvalidAttestationError,
  InvalidAttestationErrorCode,
  SlashingProtection,
} from "../../../src/slashingProtection/index.js";
import {MemoryDbController} from "../../utils/db.js";

describe("SlashingProtection", () => {
  const pubkey = Buffer.alloc(48, 1);
  let controller: MemoryDbController;
  let slashingProtection: SlashingProtection;

  beforeEach(async () => {
    controller = new MemoryDbController();
    slashingProtection = new SlashingProtection({controller, weakSubjectivityPeriod: 16});
    await slashingProtection.start();
  });

  it("should start and stop the controller", async () => {
    expect(controller.started).toBe(true);
    await slashingProtection.stop();
    expect(controller.started).toBe(false);
  });

  it("should accept votes on an empty history", async () => {
    await expect(
      slashingProtection.checkAttestations(pubkey, [
        {sourceEpoch: 1, targetEpoch: 2},
        {sourceEpoch: 0, targetEpoch: 2},
      ])
    ).resolves.toBeUndefined();
  });

  it("should reject a double vote after commit", async () => {
    await slashingProtection.commitAttestations(pubkey, [{sourceEpoch: 1, targetEpoch: 2}]);
    await expect(slashingProtection.checkAttestations(pubkey, [{sourceEpoch: 1, targetEpoch: 2}])).rejects.toMatchObject({
      type: {code: InvalidAttestationErrorCode.SLASHABLE_ATTESTATION, sourceEpoch: 1, targetEpoch: 2},
    });
  });

  it("should report the first unsafe vote", async () => {
    await slashingProtection.commitAttestations(pubkey, [{sourceEpoch: 5, targetEpoch: 10}]);
    await expect(
      slashingProtection.checkAttestations(pubkey, [
        {sourceEpoch: 10, targetEpoch: 11},
        {sourceEpoch: 3, targetEpoch: 12},
      ])
    ).rejects.toMatchObject({type: {sourceEpoch: 3, targetEpoch: 12}});
  });

  it("should reject a source later than its target", async () => {
    await expect(slashingProtection.checkAttestations(pubkey, [{sourceEpoch: 4, targetEpoch: 3}])).rejects.toMatchObject(
      {type: {code: InvalidAttestationErrorCode.SOURCE_EXCEEDS_TARGET}}
    );
  });

  it("should reject and never record a vote at FAR_FUTURE_EPOCH", async () => {
    const vote = {sourceEpoch: 1, targetEpoch: FAR_FUTURE_EPOCH};
    await expect(slashingProtection.checkAttestations(pubkey, [vote])).rejects.toMatchObject({
      type: {code: InvalidAttestationErrorCode.INVALID_EPOCH},
    });
    await expect(slashingProtection.commitAttestations(pubkey, [vote])).rejects.toMatchObject({
      type: {code: InvalidAttestationErrorCode.INVALID_EPOCH},
    });

    const history = await slashingProtection.loadHistory(pubkey);
    expect(history.latestEpochWritten).toBe(0);
    await slashingProtection.commitAttestations(pubkey, [{sourceEpoch: 1, targetEpoch: 2}]);
    await expect(slashingProtection.checkAttestations(pubkey, [{sourceEpoch: 1, targetEpoch: 2}])).rejects.toMatchObject({
      type: {code: InvalidAttestationErrorCode.SLASHABLE_ATTESTATION},
    });
  });

  it("should commit several votes with a single write", async () => {
    await slashingProtection.commitAttestations(pubkey, [
      {sourceEpoch: 2, targetEpoch: 9},
      {sourceEpoch: 5, targetEpoch: 10},
    ]);
    const history = await slashingProtection.loadHistory(pubkey);
    expect(history.latestEpochWritten).toBe(10);
    expect(history.targetToSource[9]).toBe(2);
    expect(history.targetToSource[10]).toBe(5);
  });

  it("should leave the history untouched when the write fails", async () => {
    await slashingProtection.commitAttestations(pubkey, [{sourceEpoch: 1, targetEpoch: 2}]);
    controller.failNextPut = new Error("disk full");

    await expect(slashingProtection.commitAttestations(pubkey, [{sourceEpoch: 2, targetEpoch: 3}])).rejects.toThrow(
      "disk full"
    );
    const history = await slashingProtection.loadHistory(pubkey);
    expect(history.latestEpochWritten).toBe(2);
    await expect(slashingProtection.checkAttestations(pubkey, [{sourceEpoch: 2, targetEpoch: 3}])).resolves.toBeUndefined();
  });

  it("should throw InvalidAttestationError instances", async () => {
    await slashingProtection.commitAttestations(pubkey, [{sourceEpoch: 0, targetEpoch: 1}]);
    await expect(slashingProtection.checkAttestations(pubkey, [{sourceEpoch: 0, targetEpoch: 1}])).rejects.toBeInstanceOf(
      InvalidAttestationError
    );
  });
});
