import {ValueOf} from "@chainsafe/ssz";
import * as ssz from "./sszTypes.js";

export type Fork = ValueOf<typeof ssz.Fork>;
export type ForkData = ValueOf<typeof ssz.ForkData>;
export type Checkpoint = ValueOf<typeof ssz.Checkpoint>;
export type SigningData = ValueOf<typeof ssz.SigningData>;
export type CommitteeBits = ValueOf<typeof ssz.CommitteeBits>;
export type AttestationData = ValueOf<typeof ssz.AttestationData>;
export type Attestation = ValueOf<typeof ssz.Attestation>;
