import {DatabaseService, Db} from "@warden/db";
import {BLSPubkey} from "@warden/types";
import {
  EpochHistory,
  EpochHistoryRepository,
  SlashingProtectionAttestation,
  assertValidAttestationEpochs,
  isSlashableAttestation,
  markAttestationForTargetEpoch,
} from "./epochHistory/index.js";
import {InvalidAttestationError, InvalidAttestationErrorCode} from "./errors.js";
import {EpochHistoryStore, ISlashingProtection} from "./interface.js";

export * from "./epochHistory/index.js";
export * from "./errors.js";
export type {EpochHistoryStore, ISlashingProtection};

export type SlashingProtectionOpts = {
  controller: Db;
  weakSubjectivityPeriod: number;
};

/**
 * Guards the attester against double and surround votes with a bounded history per key.
 * Callers must serialize check and commit for the same key.
 */
export class SlashingProtection extends DatabaseService implements ISlashingProtection {
  private readonly epochHistoryStore: EpochHistoryStore;

  constructor(opts: SlashingProtectionOpts) {
    super(opts);
    this.epochHistoryStore = new EpochHistoryRepository(this.db, opts.weakSubjectivityPeriod);
  }

  async loadHistory(pubkey: BLSPubkey): Promise<EpochHistory> {
    return this.epochHistoryStore.load(pubkey);
  }

  async checkAttestations(pubkey: BLSPubkey, attestations: SlashingProtectionAttestation[]): Promise<void> {
    const history = await this.epochHistoryStore.load(pubkey);
    for (const attestation of attestations) {
      assertValidAttestationEpochs(attestation);
      const {sourceEpoch, targetEpoch} = attestation;
      if (isSlashableAttestation(history, sourceEpoch, targetEpoch)) {
        throw new InvalidAttestationError({
          code: InvalidAttestationErrorCode.SLASHABLE_ATTESTATION,
          sourceEpoch,
          targetEpoch,
        });
      }
    }
  }

  async commitAttestations(pubkey: BLSPubkey, attestations: SlashingProtectionAttestation[]): Promise<void> {
    let history = await this.epochHistoryStore.load(pubkey);
    for (const attestation of attestations) {
      assertValidAttestationEpochs(attestation);
      history = markAttestationForTargetEpoch(history, attestation.sourceEpoch, attestation.targetEpoch);
    }
    await this.epochHistoryStore.save(pubkey, history);
  }
}
