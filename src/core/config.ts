import { z } from "zod";

export const DEFAULT_POLL_INTERVAL_SECONDS = 7200;

// Limit on the total number of ref filters handed to `git ls-remote`.
export const DEFAULT_MAX_REF_FILTERS = 5;

const WorkflowSchema = z.object({
  alias: z.string().min(1),
  // Relative paths resolve against the config file's directory.
  build_config: z.string().min(1),
  source_archive: z.string().min(1).optional(),
  substitutions: z.record(z.string(), z.coerce.string()).default({}),
});

const TargetSchema = z.object({
  alias: z.string().min(1),
  url: z.string().min(1),
  // Count and syntax are checked per target at startup, so one bad target
  // does not reject the whole file.
  ref_filters: z.array(z.string()).default([]),
  workflows: z.array(WorkflowSchema).default([]),
});

export const PatrolConfigSchema = z
  .object({
    poll_interval_seconds: z.number().positive().default(DEFAULT_POLL_INTERVAL_SECONDS),
    max_ref_filters: z.number().int().nonnegative().default(DEFAULT_MAX_REF_FILTERS),
    journal_path: z.string().min(1).optional(),
    targets: z.array(TargetSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.targets.forEach((target, index) => {
      if (seen.has(target.alias)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["targets", index, "alias"],
          message: `Duplicate target alias "${target.alias}"`,
        });
      }
      seen.add(target.alias);
    });
  });

export type PatrolConfig = z.infer<typeof PatrolConfigSchema>;
export type TargetConfig = PatrolConfig["targets"][number];
export type WorkflowConfig = TargetConfig["workflows"][number];
