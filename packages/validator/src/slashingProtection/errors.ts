import {Epoch} from "@warden/types";
import {WardenError} from "@warden/utils";

export enum InvalidAttestationErrorCode {
  /**
   * A vote for the same target or one that surrounds or is surrounded by a recorded vote
   */
  SLASHABLE_ATTESTATION = "ERR_INVALID_ATTESTATION_SLASHABLE",
  /**
   * The source epoch is later than the target epoch
   */
  SOURCE_EXCEEDS_TARGET = "ERR_INVALID_ATTESTATION_SOURCE_EXCEEDS_TARGET",
  /**
   * An epoch that is not a safe integer, or collides with the FAR_FUTURE_EPOCH sentinel
   */
  INVALID_EPOCH = "ERR_INVALID_ATTESTATION_INVALID_EPOCH",
}

type InvalidAttestationErrorType =
  | {code: InvalidAttestationErrorCode.SLASHABLE_ATTESTATION; sourceEpoch: Epoch; targetEpoch: Epoch}
  | {code: InvalidAttestationErrorCode.SOURCE_EXCEEDS_TARGET; sourceEpoch: Epoch; targetEpoch: Epoch}
  | {code: InvalidAttestationErrorCode.INVALID_EPOCH; sourceEpoch: Epoch; targetEpoch: Epoch};

export class InvalidAttestationError extends WardenError<InvalidAttestationErrorType> {}
