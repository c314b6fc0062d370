import {ValidatorIndex, RootHex, phase0, ssz} from "@warden/types";
import {toHex} from "@warden/utils";
import {Mutex} from "../util/mutex.js";

export type AttestationLogEntry = {
  data: phase0.AttestationData;
  attesterIndices: ValidatorIndex[];
};

/**
 * Groups submitted votes by AttestationData root so that keys signing the same payload log as one line.
 * Shared by all keys, guarded by its own lock.
 */
export class AttestationLog {
  private readonly entries = new Map<RootHex, AttestationLogEntry>();
  private readonly mutex = new Mutex();

  async addAttesterIndex(data: phase0.AttestationData, attesterIndex: ValidatorIndex): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const root = toHex(ssz.phase0.AttestationData.hashTreeRoot(data));
      const entry = this.entries.get(root);
      if (entry) {
        entry.attesterIndices.push(attesterIndex);
      } else {
        this.entries.set(root, {data, attesterIndices: [attesterIndex]});
      }
    });
  }

  /**
   * Returns every entry and empties the log
   */
  async flush(): Promise<AttestationLogEntry[]> {
    return this.mutex.runExclusive(async () => {
      const entries = Array.from(this.entries.values());
      this.entries.clear();
      return entries;
    });
  }
}
