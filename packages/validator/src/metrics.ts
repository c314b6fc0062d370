import {MetricsRegister} from "@warden/utils";

export type Metrics = ReturnType<typeof getMetrics>;

/**
 * Metrics of the attester, labelled by the first 8 bytes of the validator pubkey
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function getMetrics(register: MetricsRegister) {
  // Using function style instead of class to prevent having to re-declare all metric types.

  return {
    successfulAttestations: register.counter<{pubkey: string}>({
      name: "vc_successful_attestations_total",
      help: "Total count of attestation attempts that submitted every vote",
      labelNames: ["pubkey"],
    }),
    failedAttestations: register.counter<{pubkey: string; error: string}>({
      name: "vc_failed_attestations_total",
      help: "Total count of failed attestation attempts by error code",
      labelNames: ["pubkey", "error"],
    }),
    slashingProtectionRejections: register.counter({
      name: "vc_slashing_protection_rejections_total",
      help: "Total count of votes refused by slashing protection",
    }),
    attestationAttemptTime: register.histogram({
      name: "vc_attestation_attempt_seconds",
      help: "Time from duty resolution to history commit of one attestation attempt",
      buckets: [0.1, 0.25, 0.5, 1, 2, 4, 8],
    }),

    db: {
      dbReadReq: register.counter<{bucket: string}>({
        name: "vc_db_read_req_total",
        help: "Total count of db read requests, may read 0 or more items",
        labelNames: ["bucket"],
      }),
      dbReadItems: register.counter<{bucket: string}>({
        name: "vc_db_read_items_total",
        help: "Total count of db read items, item = key | value | entry",
        labelNames: ["bucket"],
      }),
      dbWriteReq: register.counter<{bucket: string}>({
        name: "vc_db_write_req_total",
        help: "Total count of db write requests, may write 0 or more items",
        labelNames: ["bucket"],
      }),
      dbWriteItems: register.counter<{bucket: string}>({
        name: "vc_db_write_items_total",
        help: "Total count of db write items",
        labelNames: ["bucket"],
      }),
    },
  };
}
