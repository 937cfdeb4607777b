import { z } from "zod";

export const DEFAULTS = {
  prefixLength: 32,
  verifyViaHash: true,
  details: false,
  hashBatchSize: 64,
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

export const PrefixLengthSchema = z.number().int().min(8).max(64);

export const HostConfigSchema = z.object({
  hostname: z
    .string()
    .min(1)
    .optional()
    .describe("Defaults to the host alias"),
  port: z.number().int().min(1).max(65535).optional(),
  user: z.string().min(1).optional(),
  folder: z.string().min(1).describe("Store root on the remote machine"),
  url: z.url().describe("Public URL the store root is served under"),
  group: z.string().min(1).optional(),
  prefixLength: PrefixLengthSchema.optional(),
  sshOptions: z
    .record(z.string(), z.string())
    .default({})
    .describe("Extra `ssh -o Key=Value` options"),
});

export const StoreConfigSchema = z.object({
  defaultHost: z.string().min(1).optional(),
  prefixLength: PrefixLengthSchema.default(DEFAULTS.prefixLength),
  verifyViaHash: z.boolean().default(DEFAULTS.verifyViaHash),
  details: z.boolean().default(DEFAULTS.details),
  hashBatchSize: z
    .number()
    .int()
    .min(16)
    .max(128)
    .default(DEFAULTS.hashBatchSize),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  hosts: z.record(z.string(), HostConfigSchema).default({}),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type HostConfig = z.infer<typeof HostConfigSchema>;
export type LoggingConfig = StoreConfig["logging"];
