import {BLSPubkey} from "@warden/types";
import {toHex} from "@warden/utils";
import {AttesterDuty, DutySource, PubkeyHex} from "../types.js";

/**
 * Latest duty set, replaced out-of-band by whoever polls the beacon node
 */
export class DutyStore implements DutySource {
  private duties: Map<PubkeyHex, AttesterDuty> | null = null;

  setDuties(duties: AttesterDuty[]): void {
    this.duties = new Map(duties.map((duty) => [toHex(duty.pubkey), duty]));
  }

  clear(): void {
    this.duties = null;
  }

  currentDuties(): AttesterDuty[] | null {
    return this.duties ? Array.from(this.duties.values()) : null;
  }

  getDuty(pubkey: BLSPubkey): AttesterDuty | null {
    return this.duties?.get(toHex(pubkey)) ?? null;
  }
}
