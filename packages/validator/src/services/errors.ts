import {CommitteeIndex, Epoch, ValidatorIndex} from "@warden/types";
import {WardenError} from "@warden/utils";

export enum AttestationErrorCode {
  /** No duty set has been fetched */
  DUTIES_UNAVAILABLE = "ERR_ATTESTATION_DUTIES_UNAVAILABLE",
  /** The duty set has no entry for the key */
  NO_DUTY = "ERR_ATTESTATION_NO_DUTY",
  DATA_UNAVAILABLE = "ERR_ATTESTATION_DATA_UNAVAILABLE",
  HISTORY_UNAVAILABLE = "ERR_ATTESTATION_HISTORY_UNAVAILABLE",
  /** Rejected by slashing protection, nothing signed */
  SLASHABLE_ATTESTATION = "ERR_ATTESTATION_SLASHABLE",
  SIGN_FAILED = "ERR_ATTESTATION_SIGN_FAILED",
  INDEX_NOT_IN_COMMITTEE = "ERR_ATTESTATION_INDEX_NOT_IN_COMMITTEE",
  /** History untouched */
  SUBMIT_FAILED = "ERR_ATTESTATION_SUBMIT_FAILED",
  /** Votes were submitted but the history was not saved */
  PROTECTION_PERSIST_FAILED = "ERR_ATTESTATION_PROTECTION_PERSIST_FAILED",
  ABORTED = "ERR_ATTESTATION_ABORTED",
  /** A step threw outside of its expected failure modes */
  INTERNAL = "ERR_ATTESTATION_INTERNAL",
}

export type AttestationErrorType =
  | {code: AttestationErrorCode.DUTIES_UNAVAILABLE; reason: string}
  | {code: AttestationErrorCode.NO_DUTY}
  | {code: AttestationErrorCode.DATA_UNAVAILABLE; reason: string}
  | {code: AttestationErrorCode.HISTORY_UNAVAILABLE; reason: string}
  | {code: AttestationErrorCode.SLASHABLE_ATTESTATION; sourceEpoch: Epoch; targetEpoch: Epoch; reason: string}
  | {code: AttestationErrorCode.SIGN_FAILED; reason: string}
  | {
      code: AttestationErrorCode.INDEX_NOT_IN_COMMITTEE;
      validatorIndex: ValidatorIndex;
      committeeIndex: CommitteeIndex;
      committeeSize: number;
    }
  | {code: AttestationErrorCode.SUBMIT_FAILED; reason: string}
  | {code: AttestationErrorCode.PROTECTION_PERSIST_FAILED; sourceEpochs: string; targetEpochs: string; reason: string}
  | {code: AttestationErrorCode.ABORTED}
  | {code: AttestationErrorCode.INTERNAL; reason: string};

export class AttestationError extends WardenError<AttestationErrorType> {}
