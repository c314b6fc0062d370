import {BitArray, byteArrayEquals} from "@chainsafe/ssz";
import {BLSPubkey, BLSSignature, CommitteeIndex, Root, Slot, phase0} from "@warden/types";
import {Logger, prettyBytes, toError, toHex, truncBytes} from "@warden/utils";
import {Metrics} from "../metrics.js";
import {AttestationMode, ValidatorOptions} from "../options.js";
import {
  ISlashingProtection,
  InvalidAttestationError,
  SlashingProtectionAttestation,
} from "../slashingProtection/index.js";
import {AttesterDuty, BeaconApi, DutySource} from "../types.js";
import {computeEpochAtSlot} from "../util/epoch.js";
import {KeyedMutex} from "../util/mutex.js";
import {AttestationLog} from "./attestationLog.js";
import {AttestationError, AttestationErrorCode} from "./errors.js";
import {AttestationSigner} from "./signer.js";

export type AttestationOutcome =
  | {status: "success"; attestations: phase0.Attestation[]; responseRoots: Root[]}
  | {status: "failed"; error: AttestationError};

export type AttestationServiceModules = {
  api: BeaconApi;
  dutySource: DutySource;
  signer: AttestationSigner;
  slashingProtection: ISlashingProtection;
  logger: Logger;
  metrics: Metrics | null;
  /** Read at the start of every attempt, changes apply to the next attempt */
  opts: Pick<ValidatorOptions, "protectAttester" | "attestationMode">;
  attestationLog?: AttestationLog;
};

type LogCtx = {slot: Slot; pubkey: string};

/**
 * Attester duty of a set of keys: fetch vote data, check it against slashing protection, sign,
 * submit, then record the submitted votes in the history.
 *
 * Attempts for the same key run one at a time from duty resolution to history commit.
 */
export class AttestationService {
  private readonly api: BeaconApi;
  private readonly dutySource: DutySource;
  private readonly signer: AttestationSigner;
  private readonly slashingProtection: ISlashingProtection;
  private readonly logger: Logger;
  private readonly metrics: Metrics | null;
  private readonly opts: Pick<ValidatorOptions, "protectAttester" | "attestationMode">;
  private readonly attestationLog: AttestationLog;
  private readonly keyedMutex = new KeyedMutex<string>();
  private readonly pendingAttempts = new Set<Promise<AttestationOutcome>>();

  constructor(modules: AttestationServiceModules) {
    this.api = modules.api;
    this.dutySource = modules.dutySource;
    this.signer = modules.signer;
    this.slashingProtection = modules.slashingProtection;
    this.logger = modules.logger;
    this.metrics = modules.metrics;
    this.opts = modules.opts;
    this.attestationLog = modules.attestationLog ?? new AttestationLog();
  }

  /**
   * Run the attester duty of `pubkey` at `slot`. Never throws, failures are logged, counted and returned
   */
  async submitAttestation(slot: Slot, pubkey: BLSPubkey, signal?: AbortSignal): Promise<AttestationOutcome> {
    const attempt = this.runAttemptAndReport(slot, pubkey, signal);
    this.pendingAttempts.add(attempt);
    try {
      return await attempt;
    } finally {
      this.pendingAttempts.delete(attempt);
    }
  }

  /**
   * Resolve once every attempt started so far has settled, including their history commits
   */
  async waitForPendingAttempts(): Promise<void> {
    await Promise.all(Array.from(this.pendingAttempts));
  }

  private async runAttemptAndReport(slot: Slot, pubkey: BLSPubkey, signal?: AbortSignal): Promise<AttestationOutcome> {
    const pubkeyHex = toHex(pubkey);
    const pubkeyLabel = truncBytes(pubkeyHex);
    const logCtx: LogCtx = {slot, pubkey: pubkeyLabel};

    try {
      const {attestations, responseRoots} = await this.keyedMutex.runExclusive(pubkeyHex, () =>
        this.runAttempt(slot, pubkey, logCtx, signal)
      );
      this.updateMetric(() => this.metrics?.successfulAttestations.inc({pubkey: pubkeyLabel}));
      return {status: "success", attestations, responseRoots};
    } catch (e) {
      const error =
        e instanceof AttestationError
          ? e
          : new AttestationError({code: AttestationErrorCode.INTERNAL, reason: toError(e).message});
      this.logger.error("Failed to submit attestation", logCtx, error);
      this.updateMetric(() => this.metrics?.failedAttestations.inc({pubkey: pubkeyLabel, error: error.type.code}));
      return {status: "failed", error};
    }
  }

  /**
   * Run `submitAttestation` for every key of the current duty set concurrently
   */
  async runAttestationDuties(slot: Slot, signal?: AbortSignal): Promise<AttestationOutcome[]> {
    const duties = this.dutySource.currentDuties();
    if (duties === null) {
      this.logger.warn("No attester duties available", {slot});
      return [];
    }
    return Promise.all(duties.map((duty) => this.submitAttestation(slot, duty.pubkey, signal)));
  }

  /**
   * Log one line per distinct submitted AttestationData with the attester indices that signed it, then clear the log
   */
  async flushAttestationLogs(): Promise<void> {
    const entries = await this.attestationLog.flush();
    for (const {data, attesterIndices} of entries) {
      this.logger.info("Submitted new attestations", {
        slot: data.slot,
        committeeIndex: data.index,
        beaconBlockRoot: prettyBytes(data.beaconBlockRoot),
        sourceEpoch: data.source.epoch,
        targetEpoch: data.target.epoch,
        attesterIndices: attesterIndices.join(","),
      });
    }
  }

  private async runAttempt(
    slot: Slot,
    pubkey: BLSPubkey,
    logCtx: LogCtx,
    signal?: AbortSignal
  ): Promise<{attestations: phase0.Attestation[]; responseRoots: Root[]}> {
    const {protectAttester, attestationMode} = this.opts;
    const timer = this.metrics?.attestationAttemptTime.startTimer();

    const duty = this.resolveDuty(pubkey);
    const candidates = await this.fetchCandidates(slot, duty.committeeIndex, attestationMode, signal);
    const votes = candidates.map(toSlashingProtectionAttestation);

    if (protectAttester) {
      assertNotAborted(signal);
      await this.checkSlashingProtection(pubkey, votes);
    }

    assertNotAborted(signal);
    const signatures: BLSSignature[] = [];
    for (const data of candidates) {
      try {
        signatures.push(await this.signer.signAttestation(pubkey, data));
      } catch (e) {
        throw new AttestationError({code: AttestationErrorCode.SIGN_FAILED, reason: toError(e).message});
      }
    }

    const indexInCommittee = duty.committee.indexOf(duty.validatorIndex);
    if (indexInCommittee < 0) {
      throw new AttestationError({
        code: AttestationErrorCode.INDEX_NOT_IN_COMMITTEE,
        validatorIndex: duty.validatorIndex,
        committeeIndex: duty.committeeIndex,
        committeeSize: duty.committee.length,
      });
    }

    const attestations: phase0.Attestation[] = candidates.map((data, i) => ({
      aggregationBits: BitArray.fromSingleBit(duty.committee.length, indexInCommittee),
      data,
      signature: signatures[i],
    }));

    // Last point to cancel, once a vote is out the history must record it
    assertNotAborted(signal);
    const responseRoots: Root[] = [];
    for (const attestation of attestations) {
      try {
        const {attestationDataRoot} = await this.api.submitAttestation(attestation);
        responseRoots.push(attestationDataRoot);
      } catch (e) {
        throw new AttestationError({code: AttestationErrorCode.SUBMIT_FAILED, reason: toError(e).message});
      }
    }

    for (const [i, {data}] of attestations.entries()) {
      this.logger.info("Published attestation", {
        ...logCtx,
        epoch: computeEpochAtSlot(data.slot),
        committeeIndex: data.index,
        sourceEpoch: data.source.epoch,
        targetEpoch: data.target.epoch,
        responseRoot: prettyBytes(responseRoots[i]),
      });
    }

    if (protectAttester) {
      try {
        await this.slashingProtection.commitAttestations(pubkey, votes);
      } catch (e) {
        throw new AttestationError({
          code: AttestationErrorCode.PROTECTION_PERSIST_FAILED,
          sourceEpochs: votes.map((vote) => vote.sourceEpoch).join(","),
          targetEpochs: votes.map((vote) => vote.targetEpoch).join(","),
          reason: toError(e).message,
        });
      }
    }

    try {
      for (const data of candidates) {
        await this.attestationLog.addAttesterIndex(data, duty.validatorIndex);
      }
    } catch (e) {
      this.logger.warn("Could not save validator index for logging", logCtx, toError(e));
    }

    if (timer) this.updateMetric(timer);
    return {attestations, responseRoots};
  }

  private resolveDuty(pubkey: BLSPubkey): AttesterDuty {
    let duties: AttesterDuty[] | null;
    try {
      duties = this.dutySource.currentDuties();
    } catch (e) {
      throw new AttestationError({code: AttestationErrorCode.DUTIES_UNAVAILABLE, reason: toError(e).message});
    }

    if (duties === null) {
      throw new AttestationError({code: AttestationErrorCode.DUTIES_UNAVAILABLE, reason: "no duties for validators"});
    }

    const duty = duties.find((d) => byteArrayEquals(d.pubkey, pubkey));
    if (!duty) {
      throw new AttestationError({code: AttestationErrorCode.NO_DUTY});
    }
    return duty;
  }

  /**
   * In conflicting mode a second vote is requested until its source epoch differs from the first one
   */
  private async fetchCandidates(
    slot: Slot,
    committeeIndex: CommitteeIndex,
    attestationMode: AttestationMode,
    signal?: AbortSignal
  ): Promise<phase0.AttestationData[]> {
    const data1 = await this.fetchAttestationData(slot, committeeIndex, signal);
    if (attestationMode === "single") {
      return [data1];
    }

    let data2 = data1;
    while (data2.source.epoch === data1.source.epoch) {
      data2 = await this.fetchAttestationData(slot, committeeIndex, signal);
    }
    return [data1, data2];
  }

  private async fetchAttestationData(
    slot: Slot,
    committeeIndex: CommitteeIndex,
    signal?: AbortSignal
  ): Promise<phase0.AttestationData> {
    assertNotAborted(signal);
    try {
      return await this.api.getAttestationData(slot, committeeIndex);
    } catch (e) {
      throw new AttestationError({code: AttestationErrorCode.DATA_UNAVAILABLE, reason: toError(e).message});
    }
  }

  private async checkSlashingProtection(pubkey: BLSPubkey, votes: SlashingProtectionAttestation[]): Promise<void> {
    try {
      await this.slashingProtection.checkAttestations(pubkey, votes);
    } catch (e) {
      if (e instanceof InvalidAttestationError) {
        this.updateMetric(() => this.metrics?.slashingProtectionRejections.inc());
        throw new AttestationError({
          code: AttestationErrorCode.SLASHABLE_ATTESTATION,
          sourceEpoch: e.type.sourceEpoch,
          targetEpoch: e.type.targetEpoch,
          reason: e.type.code,
        });
      }
      throw new AttestationError({code: AttestationErrorCode.HISTORY_UNAVAILABLE, reason: toError(e).message});
    }
  }

  /** A broken metric never fails an attempt */
  private updateMetric(fn: () => void): void {
    try {
      fn();
    } catch (e) {
      this.logger.debug("Error updating attestation metric", {}, toError(e));
    }
  }
}

function toSlashingProtectionAttestation(data: phase0.AttestationData): SlashingProtectionAttestation {
  return {sourceEpoch: data.source.epoch, targetEpoch: data.target.epoch};
}

function assertNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AttestationError({code: AttestationErrorCode.ABORTED});
  }
}
