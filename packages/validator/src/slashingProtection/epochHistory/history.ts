import {FAR_FUTURE_EPOCH} from "@warden/params";
import {Epoch} from "@warden/types";
import {InvalidAttestationError, InvalidAttestationErrorCode} from "../errors.js";

/**
 * Bounded record of the votes of one key: `targetToSource[target % period]` holds the source epoch
 * voted for `target`, or FAR_FUTURE_EPOCH. Only targets in `(latestEpochWritten - period, latestEpochWritten]`
 * are meaningful, older slots may hold a newer epoch after wraparound.
 */
export type EpochHistory = {
  latestEpochWritten: Epoch;
  targetToSource: Epoch[];
};

export type SlashingProtectionAttestation = {
  sourceEpoch: Epoch;
  targetEpoch: Epoch;
};

export function createEmptyEpochHistory(period: number): EpochHistory {
  return {
    latestEpochWritten: 0,
    targetToSource: Array.from({length: period}, () => FAR_FUTURE_EPOCH),
  };
}

/**
 * Recorded source epoch for `epoch`, FAR_FUTURE_EPOCH if nothing is recorded or the epoch is outside the window
 */
export function safeTargetToSource(history: EpochHistory, epoch: Epoch): Epoch {
  const period = history.targetToSource.length;
  if (epoch > history.latestEpochWritten || epoch <= history.latestEpochWritten - period) {
    return FAR_FUTURE_EPOCH;
  }
  return history.targetToSource[epoch % period];
}

/**
 * Returns true if signing (sourceEpoch, targetEpoch) would be a double vote, surround the vote
 * of a recorded target or be surrounded by one.
 *
 * Targets older than the retained window are unknown and treated as not slashable.
 */
export function isSlashableAttestation(history: EpochHistory, sourceEpoch: Epoch, targetEpoch: Epoch): boolean {
  const period = history.targetToSource.length;
  const {latestEpochWritten} = history;

  // Pruned
  if (targetEpoch <= latestEpochWritten - period) {
    return false;
  }

  // Double vote, even for the same source
  if (safeTargetToSource(history, targetEpoch) !== FAR_FUTURE_EPOCH) {
    return true;
  }

  // Surrounding a recorded vote. Epochs outside the window read as FAR_FUTURE_EPOCH, skip them
  const fromEpoch = Math.max(sourceEpoch, latestEpochWritten - period + 1);
  const toEpoch = Math.min(targetEpoch, latestEpochWritten);
  for (let i = fromEpoch; i <= toEpoch; i++) {
    const recordedSource = safeTargetToSource(history, i);
    if (recordedSource === FAR_FUTURE_EPOCH) {
      continue;
    }
    if (recordedSource > sourceEpoch) {
      return true;
    }
  }

  // Surrounded by a recorded vote
  for (let i = targetEpoch; i <= latestEpochWritten; i++) {
    if (safeTargetToSource(history, i) < sourceEpoch) {
      return true;
    }
  }

  return false;
}

/**
 * Returns a copy of `history` with the vote recorded. Moving the watermark forward first clears the
 * skipped targets, at most one period of them, so that stale slots are not read as votes.
 */
export function markAttestationForTargetEpoch(
  history: EpochHistory,
  sourceEpoch: Epoch,
  targetEpoch: Epoch
): EpochHistory {
  const period = history.targetToSource.length;
  const targetToSource = history.targetToSource.slice();
  let latestEpochWritten = history.latestEpochWritten;

  if (targetEpoch > latestEpochWritten) {
    const maxToWrite = latestEpochWritten + period;
    for (let i = latestEpochWritten + 1; i < targetEpoch && i <= maxToWrite; i++) {
      targetToSource[i % period] = FAR_FUTURE_EPOCH;
    }
    latestEpochWritten = targetEpoch;
  }

  targetToSource[targetEpoch % period] = sourceEpoch;
  return {latestEpochWritten, targetToSource};
}

export function assertValidAttestationEpochs({sourceEpoch, targetEpoch}: SlashingProtectionAttestation): void {
  if (!isValidEpoch(sourceEpoch) || !isValidEpoch(targetEpoch)) {
    throw new InvalidAttestationError({code: InvalidAttestationErrorCode.INVALID_EPOCH, sourceEpoch, targetEpoch});
  }
  if (sourceEpoch > targetEpoch) {
    throw new InvalidAttestationError({
      code: InvalidAttestationErrorCode.SOURCE_EXCEEDS_TARGET,
      sourceEpoch,
      targetEpoch,
    });
  }
}

function isValidEpoch(epoch: Epoch): boolean {
  return Number.isSafeInteger(epoch) && epoch >= 0 && epoch !== FAR_FUTURE_EPOCH;
}
