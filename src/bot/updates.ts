import { z } from "zod";

const ChatSchema = z.object({ id: z.number() });

const MessageSchema = z.object({
  message_id: z.number(),
  chat: ChatSchema,
  text: z.string().optional()
});

// Only the parts of an Update the bot reads; unknown keys are stripped.
export const UpdateSchema = z.object({
  update_id: z.number(),
  message: MessageSchema.optional(),
  callback_query: z
    .object({
      id: z.string(),
      data: z.string().optional(),
      message: MessageSchema.optional()
    })
    .optional()
});

export type Update = z.infer<typeof UpdateSchema>;

export type ParsedCommand = {
  name: string;
  args: string[];
};

export const parseUpdate = (body: unknown): Update | null => {
  const parsed = UpdateSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
};

/** `/property@SomeBot 12` -> { name: "property", args: ["12"] } */
export const parseCommand = (text: string): ParsedCommand | null => {
  const [head, ...args] = text.trim().split(/\s+/);
  const match = head?.match(/^\/([A-Za-z0-9_]+)(?:@\w+)?$/);
  if (!match) return null;
  return { name: match[1].toLowerCase(), args };
};
