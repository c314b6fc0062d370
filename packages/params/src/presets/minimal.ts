import {BeaconPreset} from "../interface.js";

export const minimalPreset: BeaconPreset = {
  // Misc
  // ---------------------------------------------------------------
  // 2**11 (= 2,048)
  MAX_VALIDATORS_PER_COMMITTEE: 2048,

  // Time parameters
  // ---------------------------------------------------------------
  // [customized] fast epochs
  SLOTS_PER_EPOCH: 8,

  // Slashing protection
  // ---------------------------------------------------------------
  // [customized] 2**8 (= 256) epochs
  WEAK_SUBJECTIVITY_PERIOD: 256,
};
