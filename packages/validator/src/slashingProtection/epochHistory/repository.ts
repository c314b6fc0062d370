import {ContainerType, ListBasicType} from "@chainsafe/ssz";
import {Db, Repository} from "@warden/db";
import {BLS_PUBKEY_LENGTH} from "@warden/params";
import {BLSPubkey, ssz} from "@warden/types";
import {WardenError, toHex} from "@warden/utils";
import {Bucket, getBucketNameByValue} from "../../buckets.js";
import {EpochHistoryStore} from "../interface.js";
import {EpochHistory, createEmptyEpochHistory} from "./history.js";

/** Upper bound of the retained period, fixes the depth of the SSZ list */
export const MAX_EPOCH_HISTORY_PERIOD = 2 ** 24;

export const EpochHistorySsz = new ContainerType(
  {
    latestEpochWritten: ssz.Epoch,
    targetToSource: new ListBasicType(ssz.Epoch, MAX_EPOCH_HISTORY_PERIOD),
  },
  {typeName: "EpochHistory", jsonCase: "eth2"}
);

export enum EpochHistoryErrorCode {
  PERIOD_MISMATCH = "ERR_EPOCH_HISTORY_PERIOD_MISMATCH",
  INVALID_PUBKEY = "ERR_EPOCH_HISTORY_INVALID_PUBKEY",
}

type EpochHistoryErrorType =
  | {code: EpochHistoryErrorCode.PERIOD_MISMATCH; pubkey: string; expected: number; actual: number}
  | {code: EpochHistoryErrorCode.INVALID_PUBKEY; length: number};

export class EpochHistoryError extends WardenError<EpochHistoryErrorType> {}

/**
 * One EpochHistory per validator pubkey. Every save is a single put, the old record is either
 * fully replaced or left as is
 */
export class EpochHistoryRepository extends Repository<EpochHistory> implements EpochHistoryStore {
  constructor(
    db: Db,
    private readonly period: number
  ) {
    const bucket = Bucket.slashingProtectionEpochHistory;
    super(db, bucket, getBucketNameByValue(bucket), EpochHistorySsz);
  }

  async load(pubkey: BLSPubkey): Promise<EpochHistory> {
    assertPubkey(pubkey);
    const history = await this.get(pubkey);
    if (history === null) {
      return createEmptyEpochHistory(this.period);
    }
    this.assertPeriod(pubkey, history);
    return history;
  }

  async save(pubkey: BLSPubkey, history: EpochHistory): Promise<void> {
    assertPubkey(pubkey);
    this.assertPeriod(pubkey, history);
    await this.put(pubkey, history);
  }

  private assertPeriod(pubkey: BLSPubkey, history: EpochHistory): void {
    if (history.targetToSource.length !== this.period) {
      throw new EpochHistoryError({
        code: EpochHistoryErrorCode.PERIOD_MISMATCH,
        pubkey: toHex(pubkey),
        expected: this.period,
        actual: history.targetToSource.length,
      });
    }
  }
}

function assertPubkey(pubkey: BLSPubkey): void {
  if (pubkey.length !== BLS_PUBKEY_LENGTH) {
    throw new EpochHistoryError({code: EpochHistoryErrorCode.INVALID_PUBKEY, length: pubkey.length});
  }
}
