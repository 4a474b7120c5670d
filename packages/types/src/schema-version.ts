/**
 * Schema versioning for preset records.
 * v1: core bake fields.
 * v2: mixed shader strategy and colour space policy.
 * v3: atlas, UDIM and naming mode.
 */

export const CURRENT_PRESET_SCHEMA_VERSION = 3

export const MIN_PRESET_SCHEMA_VERSION = 1
