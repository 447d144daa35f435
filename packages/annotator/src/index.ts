export type { AnnotatorConfig, AnnotatorConfigInput, DepthBand } from "./config";
export { ConfigError, DEFAULT_ANNOTATOR_CONFIG, annotatorConfigSchema, depthBandSchema, loadAnnotatorConfig } from "./config";
export type { DepthGrid, DepthStats, DepthStatsResult } from "./depth/depthStats";
export { computeDepthStats, formatDepthStats, isValidDepth, normalizeDepthBand } from "./depth/depthStats";
export type { RgbaImage } from "./depth/depthColormap";
export { cropDepthGrid, jetColor, renderDepthColormap } from "./depth/depthColormap";
export type { FrameSource } from "./frames/FrameSource";
export type { FrameNavigatorOptions, NavigationResult, RedrawRequest } from "./navigation/FrameNavigator";
export { FrameNavigator } from "./navigation/FrameNavigator";
export { InMemoryFrameSource, createUniformDepth } from "./mock/memoryFrameSource";
