export type Bytes4 = Uint8Array;
export type Bytes32 = Uint8Array;
export type Bytes48 = Uint8Array;
export type Bytes96 = Uint8Array;

export type Slot = number;
export type Epoch = number;
export type CommitteeIndex = number;
export type ValidatorIndex = number;
export type Root = Bytes32;
export type Version = Bytes4;
export type DomainType = Bytes4;
export type BLSPubkey = Bytes48;
export type BLSSignature = Bytes96;
export type Domain = Bytes32;

/** `0x` prefixed hex of a BLSPubkey */
export type PubkeyHex = string;
/** `0x` prefixed hex of a Root */
export type RootHex = string;
