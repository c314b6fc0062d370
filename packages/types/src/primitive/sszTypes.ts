import {ByteVectorType, UintNumberType} from "@chainsafe/ssz";

// Misc types
// ==========

export const Bytes4 = new ByteVectorType(4);
export const Bytes32 = new ByteVectorType(32);
export const Bytes48 = new ByteVectorType(48);
export const Bytes96 = new ByteVectorType(96);
export const UintNum64 = new UintNumberType(8);
/** Serializes Infinity as 2**64-1 and reads it back as Infinity */
export const UintNumInf64 = new UintNumberType(8, {clipInfinity: true});

// Custom types, defined for type hinting and readability

export const Slot = UintNumInf64;
export const Epoch = UintNumInf64;
export const CommitteeIndex = UintNum64;
export const ValidatorIndex = UintNum64;
export const Root = Bytes32;
export const Version = Bytes4;
export const DomainType = Bytes4;
export const BLSPubkey = Bytes48;
export const BLSSignature = Bytes96;
export const Domain = Bytes32;
