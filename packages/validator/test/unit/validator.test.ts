import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {describe, it, expect, beforeEach, afterEach, vi, Mocked} from "vitest";
import {Domain} from "@warden/types";
import {
  AttestationErrorCode,
  BeaconApi,
  DutyStore,
  OptionsError,
  RegistryMetricCreator,
  Validator,
  ValidatorModules,
} from "../../src/index.js";
import {MemoryDbController} from "../utils/db.js";
import {getAttestationData} from "../utils/data.js";
import {MockedLogger, getMockedLogger} from "../utils/logger.js";

describe("Validator", () => {
  const slot = 32;
  const pubkey = Buffer.alloc(48, 1);
  const data = getAttestationData(slot, 0, 1);

  let api: Mocked<BeaconApi>;
  let dutyStore: DutyStore;
  let logger: MockedLogger;

  function getModules(): ValidatorModules {
    return {
      opts: {attestationMode: "single", weakSubjectivityPeriod: 16},
      api,
      dutySource: dutyStore,
      domainSource: {getDomain: async (): Promise<Domain> => Buffer.alloc(32, 0)},
      custody: {sign: async () => Buffer.alloc(96, 0xaa)},
      logger,
    };
  }

  beforeEach(() => {
    api = {
      getAttestationData: vi.fn().mockResolvedValue(data),
      submitAttestation: vi.fn().mockResolvedValue({attestationDataRoot: Buffer.alloc(32, 4)}),
    };
    dutyStore = new DutyStore();
    dutyStore.setDuties([{pubkey, committeeIndex: 0, committee: [1], validatorIndex: 1}]);
    logger = getMockedLogger();
  });

  it("should reject invalid options", () => {
    expect(() => Validator.initializeFromOptions({...getModules(), opts: {weakSubjectivityPeriod: 0}})).toThrow(
      OptionsError
    );
  });

  it("should open the database on start and abort attempts after close", async () => {
    const controller = new MemoryDbController();
    const validator = Validator.initializeFromOptions({...getModules(), controller});
    expect(validator.isRunning).toBe(false);
    expect(validator.opts.weakSubjectivityPeriod).toBe(16);

    await validator.start();
    expect(controller.started).toBe(true);
    expect(validator.isRunning).toBe(true);
    expect(logger.info).toHaveBeenCalledWith("Validator started", {
      protectAttester: true,
      attestationMode: "single",
      weakSubjectivityPeriod: 16,
    });

    const outcomes = await validator.runAttestationDuties(slot);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["success"]);

    await validator.stop();
    expect(controller.started).toBe(false);
    expect(validator.isRunning).toBe(false);

    const outcome = await validator.submitAttestation(slot, pubkey);
    expect(outcome.status === "failed" && outcome.error.type.code).toBe(AttestationErrorCode.ABORTED);
  });

  it("should flush the attestation log", async () => {
    const validator = Validator.initializeFromOptions({...getModules(), controller: new MemoryDbController()});
    await validator.start();
    await validator.submitAttestation(slot, pubkey);
    logger.info.mockClear();

    await validator.flushAttestationLogs();
    expect(logger.info).toHaveBeenCalledWith(
      "Submitted new attestations",
      expect.objectContaining({slot, attesterIndices: "1"})
    );
    await validator.stop();
  });

  describe("with LevelDB", () => {
    let dbPath: string;

    beforeEach(async () => {
      dbPath = await fs.mkdtemp(path.join(os.tmpdir(), "warden-validator-"));
    });

    afterEach(async () => {
      await fs.rm(dbPath, {recursive: true, force: true});
    });

    it("should keep the history across restarts", async () => {
      const register = new RegistryMetricCreator();
      const opts = {attestationMode: "single" as const, weakSubjectivityPeriod: 16, dbPath};
      const first = Validator.initializeFromOptions({...getModules(), opts, register});
      await first.start();
      expect((await first.submitAttestation(slot, pubkey)).status).toBe("success");
      await first.stop();

      const lines = (await register.metrics()).split("\n");
      expect(lines).toContain('vc_db_write_req_total{bucket="slashingProtectionEpochHistory"} 1');

      const second = Validator.initializeFromOptions({...getModules(), opts});
      await second.start();
      const outcome = await second.submitAttestation(slot, pubkey);
      expect(outcome.status === "failed" && outcome.error.type.code).toBe(AttestationErrorCode.SLASHABLE_ATTESTATION);
      expect(api.submitAttestation).toHaveBeenCalledTimes(1);
      await second.stop();
    });

    it("should commit a vote already being submitted when stopped", async () => {
      const opts = {attestationMode: "single" as const, weakSubjectivityPeriod: 16, dbPath};
      let releaseSubmit = (): void => {};
      const submitStarted = new Promise<void>((resolveStarted) => {
        api.submitAttestation.mockImplementationOnce(
          () =>
            new Promise((resolve) => {
              releaseSubmit = () => resolve({attestationDataRoot: Buffer.alloc(32, 4)});
              resolveStarted();
            })
        );
      });

      const first = Validator.initializeFromOptions({...getModules(), opts});
      await first.start();
      const pendingOutcome = first.submitAttestation(slot, pubkey);
      await submitStarted;

      const stopped = first.stop();
      releaseSubmit();
      const [outcome] = await Promise.all([pendingOutcome, stopped]);
      expect(outcome.status).toBe("success");
      expect(logger.error).not.toHaveBeenCalled();

      const second = Validator.initializeFromOptions({...getModules(), opts});
      await second.start();
      const retry = await second.submitAttestation(slot, pubkey);
      expect(retry.status === "failed" && retry.error.type.code).toBe(AttestationErrorCode.SLASHABLE_ATTESTATION);
      expect(api.submitAttestation).toHaveBeenCalledTimes(1);
      await second.stop();
    });
  });
});
