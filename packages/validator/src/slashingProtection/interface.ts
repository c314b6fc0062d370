import {BLSPubkey} from "@warden/types";
import {EpochHistory, SlashingProtectionAttestation} from "./epochHistory/index.js";

/**
 * Persistent per-key attester history. `load` never fails for a key that was never saved
 */
export interface EpochHistoryStore {
  load(pubkey: BLSPubkey): Promise<EpochHistory>;
  save(pubkey: BLSPubkey, history: EpochHistory): Promise<void>;
}

export interface ISlashingProtection {
  /**
   * Check votes for slash safety against the stored history, throws InvalidAttestationError for the first unsafe one
   */
  checkAttestations(pubkey: BLSPubkey, attestations: SlashingProtectionAttestation[]): Promise<void>;
  /**
   * Record votes that were submitted, in order, with a single save
   */
  commitAttestations(pubkey: BLSPubkey, attestations: SlashingProtectionAttestation[]): Promise<void>;
}
