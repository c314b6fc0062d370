import {DOMAIN_BEACON_ATTESTER} from "@warden/params";
import {BLSPubkey, BLSSignature, Domain, DomainType, Epoch, Root, phase0, ssz} from "@warden/types";

export interface DomainSource {
  getDomain(epoch: Epoch, domainType: DomainType): Promise<Domain>;
}

/**
 * Holds the secret keys. Signs `objectRoot` mixed with `domain`
 */
export interface Custody {
  sign(pubkey: BLSPubkey, objectRoot: Root, domain: Domain): Promise<BLSSignature>;
}

/**
 * Signs AttestationData for a key under the attester domain of its target epoch
 */
export class AttestationSigner {
  constructor(
    private readonly domainSource: DomainSource,
    private readonly custody: Custody
  ) {}

  async signAttestation(pubkey: BLSPubkey, data: phase0.AttestationData): Promise<BLSSignature> {
    const domain = await this.domainSource.getDomain(data.target.epoch, DOMAIN_BEACON_ATTESTER);
    const objectRoot = ssz.phase0.AttestationData.hashTreeRoot(data);
    return this.custody.sign(pubkey, objectRoot, domain);
  }
}
