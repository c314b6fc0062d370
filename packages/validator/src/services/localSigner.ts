import bls, {init} from "@chainsafe/bls/switchable";
import type {SecretKey} from "@chainsafe/bls/types";
import {BLSPubkey, BLSSignature, Domain, DomainType, Epoch, Root, Version, phase0, ssz} from "@warden/types";
import {WardenError, toHex, truncBytes} from "@warden/utils";
import {PubkeyHex} from "../types.js";
import {Custody, DomainSource} from "./signer.js";

/**
 * Return the domain for the [[domainType]] and [[forkVersion]].
 */
export function computeDomain(domainType: DomainType, forkVersion: Version, genesisValidatorRoot: Root): Domain {
  const forkDataRoot = computeForkDataRoot(forkVersion, genesisValidatorRoot);
  const domain = new Uint8Array(32);
  domain.set(domainType, 0);
  domain.set(forkDataRoot.slice(0, 28), 4);
  return domain;
}

/**
 * Return the ForkVersion at an epoch from a Fork type
 */
export function getForkVersion(fork: phase0.Fork, epoch: Epoch): Version {
  return epoch < fork.epoch ? fork.previousVersion : fork.currentVersion;
}

export function computeForkDataRoot(currentVersion: Version, genesisValidatorsRoot: Root): Uint8Array {
  const forkData: phase0.ForkData = {
    currentVersion,
    genesisValidatorsRoot,
  };
  return ssz.phase0.ForkData.hashTreeRoot(forkData);
}

/**
 * Return the signing root of an object root mixed with its domain
 */
export function computeSigningRoot(objectRoot: Root, domain: Domain): Uint8Array {
  const domainWrappedObject: phase0.SigningData = {
    objectRoot,
    domain,
  };
  return ssz.phase0.SigningData.hashTreeRoot(domainWrappedObject);
}

/**
 * Domains computed from a known fork, no beacon node round trip
 */
export class LocalDomainSource implements DomainSource {
  constructor(
    private readonly fork: phase0.Fork,
    private readonly genesisValidatorsRoot: Root
  ) {}

  async getDomain(epoch: Epoch, domainType: DomainType): Promise<Domain> {
    return computeDomain(domainType, getForkVersion(this.fork, epoch), this.genesisValidatorsRoot);
  }
}

export enum CustodyErrorCode {
  UNKNOWN_PUBKEY = "ERR_CUSTODY_UNKNOWN_PUBKEY",
}

type CustodyErrorType = {code: CustodyErrorCode.UNKNOWN_PUBKEY; pubkey: string};

export class CustodyError extends WardenError<CustodyErrorType> {}

/**
 * Prepares the BLS implementation, must resolve before any key is created
 */
export async function initBls(): Promise<void> {
  await init("herumi");
}

/**
 * In-memory secret keys indexed by pubkey hex
 */
export class LocalKeyCustody implements Custody {
  private readonly secretKeys = new Map<PubkeyHex, SecretKey>();

  constructor(secretKeys: SecretKey[]) {
    for (const secretKey of secretKeys) {
      this.secretKeys.set(toHex(secretKey.toPublicKey().toBytes()), secretKey);
    }
  }

  static async fromSecretKeyBytes(secretKeys: Uint8Array[]): Promise<LocalKeyCustody> {
    await initBls();
    return new LocalKeyCustody(secretKeys.map((bytes) => bls.SecretKey.fromBytes(bytes)));
  }

  get pubkeys(): BLSPubkey[] {
    return Array.from(this.secretKeys.values(), (secretKey) => secretKey.toPublicKey().toBytes());
  }

  async sign(pubkey: BLSPubkey, objectRoot: Root, domain: Domain): Promise<BLSSignature> {
    const pubkeyHex = toHex(pubkey);
    const secretKey = this.secretKeys.get(pubkeyHex);
    if (!secretKey) {
      throw new CustodyError({code: CustodyErrorCode.UNKNOWN_PUBKEY, pubkey: truncBytes(pubkeyHex)});
    }
    return secretKey.sign(computeSigningRoot(objectRoot, domain)).toBytes();
  }
}
