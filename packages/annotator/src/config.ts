import { TRACKER_KINDS } from "@depthmark/tracking";
import { z } from "zod";

export const depthBandSchema = z
  .object({
    minDepth: z.number().nonnegative().default(1),
    maxDepth: z.number().positive().default(20)
  })
  .refine((band) => band.minDepth < band.maxDepth, {
    message: "minDepth must be below maxDepth",
    path: ["maxDepth"]
  });

export type DepthBand = z.infer<typeof depthBandSchema>;

export const annotatorConfigSchema = z.object({
  zoom: z
    .object({
      minZoom: z.number().min(1).default(1),
      maxZoom: z.number().min(1).default(10),
      wheelStep: z.number().gt(1).default(1.2)
    })
    .refine((zoom) => zoom.minZoom <= zoom.maxZoom, {
      message: "minZoom must not exceed maxZoom",
      path: ["maxZoom"]
    })
    .default({}),
  depthView: z
    .object({
      wheelStep: z.number().gt(1).default(1.1)
    })
    .default({}),
  selection: z
    .object({
      handleThreshold: z.number().nonnegative().default(10)
    })
    .default({}),
  depthBand: depthBandSchema.default({}),
  tracker: z
    .object({
      kind: z.enum(TRACKER_KINDS).default("csrt")
    })
    .default({}),
  navigation: z
    .object({
      jumpSize: z.number().int().positive().default(5)
    })
    .default({}),
  debug: z.boolean().default(false)
});

export type AnnotatorConfig = z.infer<typeof annotatorConfigSchema>;
export type AnnotatorConfigInput = z.input<typeof annotatorConfigSchema>;

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid annotator config: ${issues.map(formatIssue).join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

export function loadAnnotatorConfig(input: unknown = {}): AnnotatorConfig {
  const result = annotatorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

export const DEFAULT_ANNOTATOR_CONFIG: AnnotatorConfig = loadAnnotatorConfig();
