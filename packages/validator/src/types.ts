import {BLSPubkey, CommitteeIndex, Root, Slot, ValidatorIndex, phase0} from "@warden/types";

/**
 * The validator's BLS public key, uniquely identifying them. _48-bytes, hex encoded with 0x prefix, case insensitive._
 */
export type PubkeyHex = string;

/**
 * Committee assignment of one validator key, as given by the duty source
 */
export type AttesterDuty = {
  pubkey: BLSPubkey;
  committeeIndex: CommitteeIndex;
  /** Ordered validator indices of the committee */
  committee: ValidatorIndex[];
  validatorIndex: ValidatorIndex;
};

export interface DutySource {
  /** `null` when no duty set has been fetched yet */
  currentDuties(): AttesterDuty[] | null;
}

/**
 * Subset of the beacon node API used by the attester
 */
export interface BeaconApi {
  getAttestationData(slot: Slot, committeeIndex: CommitteeIndex): Promise<phase0.AttestationData>;
  submitAttestation(attestation: phase0.Attestation): Promise<{attestationDataRoot: Root}>;
}
