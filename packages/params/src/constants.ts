// Misc

/** Marks an empty slot of attester history. Never equal to a real epoch */
export const FAR_FUTURE_EPOCH = Infinity;

// Domain types

export const DOMAIN_BEACON_ATTESTER = Uint8Array.from([1, 0, 0, 0]);

// Lengths

export const BLS_PUBKEY_LENGTH = 48;
