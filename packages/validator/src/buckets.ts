// Buckets are separate database namespaces
export enum Bucket {
  // validator slashing protection
  slashingProtectionEpochHistory = 25,
}

export function getBucketNameByValue(enumValue: Bucket): string {
  const name = Bucket[enumValue];
  if (name === undefined) {
    throw new Error("Missing bucket for value " + enumValue);
  }
  return name;
}
