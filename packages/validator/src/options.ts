import {WEAK_SUBJECTIVITY_PERIOD} from "@warden/params";
import {WardenError} from "@warden/utils";
import {MAX_EPOCH_HISTORY_PERIOD} from "./slashingProtection/epochHistory/index.js";

/**
 * - conflicting: fetch a second vote whose source epoch differs from the first, sign and submit both
 * - single: one vote per slot
 */
export type AttestationMode = "conflicting" | "single";
export const attestationModes: AttestationMode[] = ["conflicting", "single"];

export type ValidatorOptions = {
  /** Check every vote against the local history before signing. Read once per attempt */
  protectAttester: boolean;
  attestationMode: AttestationMode;
  /** Epochs of attester history retained per key */
  weakSubjectivityPeriod: number;
  /** Location of the slashing protection database */
  dbPath: string;
  /** Also write logs to this file, only used when no logger is given */
  logFile: string | null;
  /** Daily log files kept, 0 writes to a single file */
  logFileDailyRotate: number;
};

export const defaultOptions: ValidatorOptions = {
  protectAttester: true,
  attestationMode: "conflicting",
  weakSubjectivityPeriod: WEAK_SUBJECTIVITY_PERIOD,
  dbPath: "./validator-db",
  logFile: null,
  logFileDailyRotate: 5,
};

export enum OptionsErrorCode {
  INVALID_PERIOD = "ERR_OPTIONS_INVALID_PERIOD",
  INVALID_ATTESTATION_MODE = "ERR_OPTIONS_INVALID_ATTESTATION_MODE",
  INVALID_LOG_FILE_DAILY_ROTATE = "ERR_OPTIONS_INVALID_LOG_FILE_DAILY_ROTATE",
}

type OptionsErrorType =
  | {code: OptionsErrorCode.INVALID_PERIOD; period: number}
  | {code: OptionsErrorCode.INVALID_ATTESTATION_MODE; mode: string}
  | {code: OptionsErrorCode.INVALID_LOG_FILE_DAILY_ROTATE; dailyRotate: number};

export class OptionsError extends WardenError<OptionsErrorType> {}

/**
 * Fill missing options with defaults and validate the result
 */
export function parseValidatorOptions(opts: Partial<ValidatorOptions> = {}): ValidatorOptions {
  const parsed: ValidatorOptions = {
    protectAttester: opts.protectAttester ?? defaultOptions.protectAttester,
    attestationMode: opts.attestationMode ?? defaultOptions.attestationMode,
    weakSubjectivityPeriod: opts.weakSubjectivityPeriod ?? defaultOptions.weakSubjectivityPeriod,
    dbPath: opts.dbPath ?? defaultOptions.dbPath,
    logFile: opts.logFile ?? defaultOptions.logFile,
    logFileDailyRotate: opts.logFileDailyRotate ?? defaultOptions.logFileDailyRotate,
  };

  const period = parsed.weakSubjectivityPeriod;
  if (!Number.isSafeInteger(period) || period <= 0 || period > MAX_EPOCH_HISTORY_PERIOD) {
    throw new OptionsError({code: OptionsErrorCode.INVALID_PERIOD, period});
  }

  if (!isAttestationMode(parsed.attestationMode)) {
    throw new OptionsError({code: OptionsErrorCode.INVALID_ATTESTATION_MODE, mode: parsed.attestationMode});
  }

  const dailyRotate = parsed.logFileDailyRotate;
  if (!Number.isSafeInteger(dailyRotate) || dailyRotate < 0) {
    throw new OptionsError({code: OptionsErrorCode.INVALID_LOG_FILE_DAILY_ROTATE, dailyRotate});
  }

  return parsed;
}

function isAttestationMode(mode: string): mode is AttestationMode {
  return attestationModes.some((m) => m === mode);
}
