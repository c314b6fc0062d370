import {SLOTS_PER_EPOCH} from "@warden/params";
import {Epoch, Slot} from "@warden/types";

/**
 * Return the epoch number at the given slot.
 */
export function computeEpochAtSlot(slot: Slot): Epoch {
  return Math.floor(slot / SLOTS_PER_EPOCH);
}
