import { z } from "zod";
import { SNOWFLAKE_PATTERN } from "../../core/domain/snowflake.utils";

const snowflakeSchema = z.string().regex(SNOWFLAKE_PATTERN, "expected a numeric snowflake id");

export const discordAuthorSchema = z.object({
  id: snowflakeSchema,
  username: z.string(),
  global_name: z.string().nullish(),
  bot: z.boolean().optional(),
});

export const discordMessageSchema = z.object({
  id: snowflakeSchema,
  content: z.string(),
  timestamp: z.string(),
  author: discordAuthorSchema,
});

export const discordMessageListSchema = z.array(discordMessageSchema);

export type DiscordMessagePayload = z.infer<typeof discordMessageSchema>;
