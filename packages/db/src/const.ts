export const BUCKET_LENGTH = 1;
