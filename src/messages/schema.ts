import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Tables of Library/SMS/sms.db (HomeDomain) read by the messaging extractor.

export const chat = sqliteTable("chat", {
  rowId: integer("ROWID").primaryKey(),
  guid: text("guid").notNull(),
});

/** One remote address (phone number or email) per service. */
export const handle = sqliteTable("handle", {
  rowId: integer("ROWID").primaryKey(),
  id: text("id").notNull(),
  country: text("country"),
  service: text("service"),
});

export const chatHandleJoin = sqliteTable("chat_handle_join", {
  chatId: integer("chat_id").notNull(),
  handleId: integer("handle_id").notNull(),
});

export const message = sqliteTable("message", {
  rowId: integer("ROWID").primaryKey(),
  guid: text("guid").notNull(),
  /** Nanoseconds (seconds on old iOS releases) since 2001-01-01 UTC */
  date: integer("date"),
  /** 0 for messages sent from this device */
  handleId: integer("handle_id").notNull().default(0),
  text: text("text"),
  replyToGuid: text("reply_to_guid"),
});

export const chatMessageJoin = sqliteTable("chat_message_join", {
  chatId: integer("chat_id").notNull(),
  messageId: integer("message_id").notNull(),
});

export const attachment = sqliteTable("attachment", {
  rowId: integer("ROWID").primaryKey(),
  guid: text("guid").notNull(),
  createdDate: integer("created_date"),
  filename: text("filename"),
  uti: text("uti"),
  mimeType: text("mime_type"),
  transferName: text("transfer_name"),
  totalBytes: integer("total_bytes"),
});

export const messageAttachmentJoin = sqliteTable("message_attachment_join", {
  messageId: integer("message_id").notNull(),
  attachmentId: integer("attachment_id").notNull(),
});
