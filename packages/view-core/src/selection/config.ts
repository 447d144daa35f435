import type { SelectionConfig } from "./types";

export const DEFAULT_SELECTION_CONFIG: SelectionConfig = {
  handleThreshold: 10
};

export function resolveSelectionConfig(overrides?: Partial<SelectionConfig>): SelectionConfig {
  const config = { ...DEFAULT_SELECTION_CONFIG, ...(overrides ?? {}) };
  if (!(config.handleThreshold >= 0)) {
    throw new RangeError(`handleThreshold must be non-negative, got ${config.handleThreshold}`);
  }
  return config;
}
