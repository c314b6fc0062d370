export {Validator, type ValidatorModules} from "./validator.js";
export * from "./options.js";
export * from "./logger.js";
export * from "./metrics.js";
export * from "./types.js";
export * from "./buckets.js";
export * from "./slashingProtection/index.js";
export * from "./services/attestation.js";
export * from "./services/errors.js";
export * from "./services/signer.js";
export * from "./services/localSigner.js";
export * from "./services/dutyStore.js";
export * from "./services/attestationLog.js";
export * from "./util/index.js";
