import {BeaconPreset} from "../interface.js";

export const mainnetPreset: BeaconPreset = {
  // Misc
  // ---------------------------------------------------------------
  // 2**11 (= 2,048)
  MAX_VALIDATORS_PER_COMMITTEE: 2048,

  // Time parameters
  // ---------------------------------------------------------------
  // 2**5 (= 32) slots 6.4 minutes
  SLOTS_PER_EPOCH: 32,

  // Slashing protection
  // ---------------------------------------------------------------
  // 54,000 epochs ~8 months
  WEAK_SUBJECTIVITY_PERIOD: 54000,
};
