/**
 * Compile-time protocol values. The active set is picked once at load time
 */
export type BeaconPreset = {
  // Misc
  MAX_VALIDATORS_PER_COMMITTEE: number;

  // Time parameters
  SLOTS_PER_EPOCH: number;

  // Slashing protection
  /** Number of epochs of attester history retained per key */
  WEAK_SUBJECTIVITY_PERIOD: number;
};
