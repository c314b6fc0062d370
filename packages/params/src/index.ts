import {PresetName} from "./presetName.js";
import {mainnetPreset} from "./presets/mainnet.js";
import {minimalPreset} from "./presets/minimal.js";
import {BeaconPreset} from "./interface.js";

export type {BeaconPreset};
export {PresetName};
export * from "./constants.js";

const presets: Record<PresetName, BeaconPreset> = {
  [PresetName.mainnet]: mainnetPreset,
  [PresetName.minimal]: minimalPreset,
};

export function isPresetName(name: string | undefined): name is PresetName {
  return name !== undefined && Object.values<string>(PresetName).includes(name);
}

export function getPreset(name: PresetName): BeaconPreset {
  return presets[name];
}

/**
 * The preset name currently exported by this library
 *
 * The `WARDEN_PRESET` environment variable is used to select the active preset
 * If `WARDEN_PRESET` is not set, the default is `mainnet`.
 */
const envPreset = process.env.WARDEN_PRESET;
export const ACTIVE_PRESET: PresetName = isPresetName(envPreset) ? envPreset : PresetName.mainnet;
export const activePreset = presets[ACTIVE_PRESET];

// These variables must be exported individually and explicitly
// in order to be accessible as top-level exports
export const {MAX_VALIDATORS_PER_COMMITTEE, SLOTS_PER_EPOCH, WEAK_SUBJECTIVITY_PERIOD} = activePreset;
