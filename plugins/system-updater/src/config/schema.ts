import { z } from "zod";

/** Keys every manager block accepts; anything else is manager-specific. */
export const COMMON_MANAGER_KEYS = ["enabled", "exclude_packages", "cleanup", "self_update"] as const;

export const managerBlockSchema = z
  .object({
    enabled: z.boolean().default(true),
    exclude_packages: z.array(z.string().min(1)).default([]),
    cleanup: z.boolean().default(true),
    self_update: z.boolean().default(true),
  })
  .passthrough();

export const sudoStrategyNames = ["prompt", "whitelist", "passwordless", "skip"] as const;

/** Shape of the YAML file after merging over defaults. */
export const configFileSchema = z
  .object({
    log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    log_file: z.string().min(1).nullable().default(null),
    dry_run: z.boolean().default(false),
    timeout_seconds: z.number().positive().default(600),
    parallelism: z.number().int().min(1).max(16).default(1),
    run_deadline_seconds: z.number().min(0).default(0),
    sudo: z
      .object({
        strategy: z.enum(sudoStrategyNames).default("prompt"),
        whitelist: z.array(z.string().min(1)).default([]),
      })
      .default({}),
    exclude_packages: z.array(z.string().min(1)).default([]),
    // A bare `npm:` key in YAML parses as null and means "all defaults".
    managers: z.record(z.string(), managerBlockSchema.nullable()).default({}),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.sudo.strategy === "whitelist" && cfg.sudo.whitelist.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sudo", "whitelist"],
        message: "strategy 'whitelist' requires at least one command prefix",
      });
    }
  });

export type ConfigFile = z.output<typeof configFileSchema>;
