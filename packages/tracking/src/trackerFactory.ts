import { TemplateTracker } from "./adapters/templateTracker";
import type { TemplateTrackerPreset } from "./adapters/templateTracker";
import type { TrackerFactory, TrackerHandle, TrackerKind } from "./TrackerPort";

export const DEFAULT_TRACKER_KIND: TrackerKind = "csrt";

export function createTracker(
  kind: TrackerKind = DEFAULT_TRACKER_KIND,
  overrides?: Partial<TemplateTrackerPreset>
): TrackerHandle {
  return new TemplateTracker(kind, overrides);
}

/** Binds preset overrides once so callers only pick the kind. */
export function createTrackerFactory(overrides?: Partial<TemplateTrackerPreset>): TrackerFactory {
  return (kind) => createTracker(kind, overrides);
}
