import type { Telegram } from "telegraf";
import { z } from "zod";

// Only the fields the bot reads are validated; everything else passes through
// untouched so it can be echoed back to the Bot API (caption entities, etc.).

const UserSchema = z
  .object({
    id: z.number().int(),
    is_bot: z.boolean(),
    first_name: z.string(),
    last_name: z.string().optional(),
    username: z.string().optional(),
    language_code: z.string().optional()
  })
  .passthrough();

const ChatSchema = z
  .object({
    id: z.number().int(),
    type: z.string(),
    title: z.string().optional(),
    username: z.string().optional()
  })
  .passthrough();

const FileSchema = z
  .object({
    file_id: z.string(),
    file_unique_id: z.string()
  })
  .passthrough();

type CopyMessageExtra = NonNullable<Parameters<Telegram["copyMessage"]>[3]>;

/** Entity as the Bot API types it, so captions can be copied with their formatting. */
export type MessageEntity = NonNullable<CopyMessageExtra["caption_entities"]>[number];

const EntityShapeSchema = z.object({
  type: z.string(),
  offset: z.number().int().nonnegative(),
  length: z.number().int().positive(),
  url: z.string().optional(),
  user: UserSchema.optional(),
  custom_emoji_id: z.string().optional()
});

// Entity types that are unusable without their extra field.
const ENTITY_REQUIRED_FIELD: Partial<Record<string, "url" | "user" | "custom_emoji_id">> = {
  text_link: "url",
  text_mention: "user",
  custom_emoji: "custom_emoji_id"
};

const MessageEntitySchema = z.custom<MessageEntity>(
  (value) => {
    const shape = EntityShapeSchema.safeParse(value);
    if (!shape.success) return false;
    const required = ENTITY_REQUIRED_FIELD[shape.data.type];
    return required === undefined || shape.data[required] !== undefined;
  },
  { message: "Invalid message entity" }
);

const MessageSchema = z
  .object({
    message_id: z.number().int(),
    date: z.number().int(),
    chat: ChatSchema,
    from: UserSchema.optional(),
    text: z.string().optional(),
    caption: z.string().optional(),
    caption_entities: z.array(MessageEntitySchema).optional(),
    photo: z.array(FileSchema).optional(),
    audio: FileSchema.optional(),
    video: FileSchema.optional(),
    voice: FileSchema.optional(),
    document: FileSchema.optional(),
    sticker: FileSchema.optional()
  })
  .passthrough();

const CallbackQuerySchema = z
  .object({
    id: z.string(),
    from: UserSchema,
    message: MessageSchema.optional(),
    data: z.string().optional()
  })
  .passthrough();

const UpdateSchema = z
  .object({
    update_id: z.number().int(),
    message: MessageSchema.optional(),
    callback_query: CallbackQuerySchema.optional()
  })
  .passthrough();

export type TelegramUser = z.infer<typeof UserSchema>;
export type Chat = z.infer<typeof ChatSchema>;
export type Message = z.infer<typeof MessageSchema>;
export type CallbackQuery = z.infer<typeof CallbackQuerySchema>;
export type Update = z.infer<typeof UpdateSchema>;

/** Throws a ZodError when the payload does not look like an Update. */
export function parseUpdate(payload: unknown): Update {
  return UpdateSchema.parse(payload);
}

export const MEDIA_KINDS = ["photo", "audio", "video", "voice", "document", "sticker"] as const;

export type MediaKind = (typeof MEDIA_KINDS)[number];

/**
 * First present media field in priority order, or null for a non-media message.
 * An empty photo array does not count as a photo.
 */
export function detectMediaKind(message: Message): MediaKind | null {
  for (const kind of MEDIA_KINDS) {
    const value = message[kind];
    if (Array.isArray(value) ? value.length > 0 : value !== undefined) {
      return kind;
    }
  }
  return null;
}

export function isCommandText(text: string | undefined): text is string {
  return typeof text === "string" && text.startsWith("/");
}
