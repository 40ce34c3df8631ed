import { z } from "zod";

const allowlistEntrySchema = z.object({
  id: z.string().min(1),
  label: z.string(),
});

export const userConfigSchema = z
  .object({
    discord: z
      .object({
        token: z.string().optional(),
        channelId: z.string().optional(),
        botId: z.string().optional(),
        requestTimeoutMs: z.number().int().positive().optional(),
      })
      .optional(),
    allowlist: z.union([z.string(), z.array(allowlistEntrySchema)]).optional(),
    rateLimitSeconds: z.number().nonnegative().optional(),
    paths: z
      .object({
        stateDir: z.string().optional(),
        flagPath: z.string().optional(),
        activityLogPath: z.string().optional(),
        launchAgentDir: z.string().optional(),
      })
      .optional(),
    poll: z
      .object({
        pageSize: z.number().int().min(1).max(100).optional(),
        activityLogMaxLines: z.number().int().positive().optional(),
        previewChars: z.number().int().positive().optional(),
        source: z.string().optional(),
        notificationSound: z.string().optional(),
      })
      .optional(),
    read: z
      .object({
        pageSize: z.number().int().min(1).max(100).optional(),
        unreadPageSize: z.number().int().min(1).max(100).optional(),
        contextPageSize: z.number().int().min(1).max(100).optional(),
        contentChars: z.number().int().positive().optional(),
      })
      .optional(),
    desktop: z
      .object({
        notify: z.boolean().optional(),
        inject: z.boolean().optional(),
        injectSessionMatch: z.string().optional(),
        injectCommand: z.string().optional(),
        commandTimeoutMs: z.number().int().positive().optional(),
      })
      .optional(),
    hooks: z
      .object({
        checkEvery: z.number().int().positive().optional(),
        sessionStartSinceMinutes: z.number().int().positive().optional(),
        postToolUseSinceMinutes: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .passthrough();

export const mergedConfigSchema = z.object({
  discord: z.object({
    token: z.string(),
    channelId: z.string(),
    botId: z.string().optional(),
    requestTimeoutMs: z.number().int().positive(),
  }),
  rateLimitSeconds: z.number().nonnegative(),
  paths: z.object({
    stateDir: z.string().min(1),
    flagPath: z.string().min(1),
    activityLogPath: z.string().min(1).optional(),
    launchAgentDir: z.string().min(1),
  }),
  poll: z.object({
    pageSize: z.number().int().min(1).max(100),
    activityLogMaxLines: z.number().int().positive(),
    previewChars: z.number().int().positive(),
    source: z.string().min(1),
    notificationSound: z.string(),
  }),
  read: z.object({
    pageSize: z.number().int().min(1).max(100),
    unreadPageSize: z.number().int().min(1).max(100),
    contextPageSize: z.number().int().min(1).max(100),
    contentChars: z.number().int().positive(),
  }),
  desktop: z.object({
    notify: z.boolean(),
    inject: z.boolean(),
    injectSessionMatch: z.string().min(1),
    injectCommand: z.string().optional(),
    commandTimeoutMs: z.number().int().positive(),
  }),
  hooks: z.object({
    checkEvery: z.number().int().positive(),
    sessionStartSinceMinutes: z.number().int().positive(),
    postToolUseSinceMinutes: z.number().int().positive(),
  }),
});

export type UserConfigInput = z.infer<typeof userConfigSchema>;
export type MergedConfigInput = z.infer<typeof mergedConfigSchema>;
