import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { SQLiteColumn } from "drizzle-orm/sqlite-core";
import type { CountryCode } from "libphonenumber-js";
import type { Backup } from "../backup/backup.js";
import { cocoaTimestampToIso } from "../backup/cocoa-time.js";
import { ContactsNotLoadedError } from "../backup/errors.js";
import { logger } from "../config/logger.js";
import type { ContactResolutionTable, ResolvedContact } from "../contacts/contact-resolution-table.js";
import { contactKey, DEFAULT_REGION } from "../contacts/phone.js";
import type { Pipeline } from "../runner/types.js";
import { attachment, chat, chatHandleJoin, chatMessageJoin, handle, message, messageAttachmentJoin } from "./schema.js";
import type { Chat, ChatMessage, ChatWithMessages, Member, MessageAttachment, MessagingExtraction } from "./types.js";

export const SMS_DOMAIN = "HomeDomain";
export const SMS_PATH = "Library/SMS/sms.db";

/** handle_id of messages written on the backed-up device itself. */
const OWN_HANDLE_ID = 0;

/** Integer timestamp as text; nanosecond dates do not fit a JS number. */
function exactTimestamp(column: SQLiteColumn) {
  return sql<string | null>`cast(${column} as text)`;
}

/**
 * Join chats, participants, messages and attachments from sms.db, attaching
 * people from the contact resolution table where the normalized address
 * matches.
 */
export function extractMessages(
  backup: Backup,
  contacts: ContactResolutionTable | undefined,
  region: CountryCode = DEFAULT_REGION,
): MessagingExtraction {
  if (!contacts) throw new ContactsNotLoadedError();
  const table: ContactResolutionTable = contacts;

  const sqlite = backup.openDatabase(backup.file(SMS_DOMAIN, SMS_PATH));
  try {
    const db = drizzle(sqlite);

    const unresolved = new Set<string>();
    function resolve(raw: string): ResolvedContact | undefined {
      const key = contactKey(raw, region);
      const resolved = table.resolve(key);
      if (!resolved && !unresolved.has(key)) {
        unresolved.add(key);
        logger.warn(`Unknown contact ${key}`);
      }
      return resolved;
    }

    const chats = new Map<number, ChatWithMessages>();
    for (const row of db.select({ id: chat.rowId, guid: chat.guid }).from(chat).orderBy(chat.rowId).all()) {
      chats.set(row.id, { ...row, members: [], messages: [] });
    }

    const handles = new Map<number, Member>();
    const handleRows = db
      .select({ id: handle.rowId, contact: handle.id, country: handle.country, service: handle.service })
      .from(handle)
      .orderBy(handle.rowId)
      .all();
    for (const row of handleRows) {
      const person = resolve(row.contact);
      handles.set(row.id, person ? { ...row, uuid: person.personId, name: person.displayName } : row);
    }

    let skippedJoins = 0;
    const memberships = db
      .select({ chatId: chatHandleJoin.chatId, handleId: chatHandleJoin.handleId })
      .from(chatHandleJoin)
      .orderBy(chatHandleJoin.chatId, chatHandleJoin.handleId)
      .all();
    for (const { chatId, handleId } of memberships) {
      const target = chats.get(chatId);
      const member = handles.get(handleId);
      if (!target || !member) {
        skippedJoins++;
        continue;
      }
      target.members.push(member);
    }

    const messages = new Map<number, ChatMessage>();
    let droppedMessages = 0;
    const messageRows = db
      .select({
        id: message.rowId,
        guid: message.guid,
        date: exactTimestamp(message.date),
        handleId: message.handleId,
        text: message.text,
        replyToGuid: message.replyToGuid,
      })
      .from(message)
      .orderBy(message.rowId)
      .all();
    for (const row of messageRows) {
      const fromMe = row.handleId === OWN_HANDLE_ID;
      const sender = fromMe ? undefined : handles.get(row.handleId);
      if (!fromMe && !sender) {
        droppedMessages++;
        continue;
      }
      messages.set(row.id, {
        ...row,
        sentAt: cocoaTimestampToIso(row.date),
        fromMe,
        ...(sender?.uuid ? { senderUuid: sender.uuid } : {}),
        ...(sender?.name ? { senderName: sender.name } : {}),
        attachments: [],
      });
    }

    const attachments = new Map<number, MessageAttachment>();
    const attachmentRows = db
      .select({
        id: attachment.rowId,
        guid: attachment.guid,
        date: exactTimestamp(attachment.createdDate),
        filename: attachment.filename,
        uti: attachment.uti,
        mimeType: attachment.mimeType,
        transferName: attachment.transferName,
        totalBytes: attachment.totalBytes,
      })
      .from(attachment)
      .orderBy(attachment.rowId)
      .all();
    for (const row of attachmentRows) {
      attachments.set(row.id, { ...row, createdAt: cocoaTimestampToIso(row.date) });
    }

    const messageAttachments = db
      .select({ messageId: messageAttachmentJoin.messageId, attachmentId: messageAttachmentJoin.attachmentId })
      .from(messageAttachmentJoin)
      .orderBy(messageAttachmentJoin.messageId, messageAttachmentJoin.attachmentId)
      .all();
    for (const { messageId, attachmentId } of messageAttachments) {
      const target = messages.get(messageId);
      const file = attachments.get(attachmentId);
      if (!target || !file) {
        skippedJoins++;
        continue;
      }
      target.attachments.push(file);
    }

    const chatMessages = db
      .select({ chatId: chatMessageJoin.chatId, messageId: chatMessageJoin.messageId })
      .from(chatMessageJoin)
      .orderBy(chatMessageJoin.chatId, chatMessageJoin.messageId)
      .all();
    for (const { chatId, messageId } of chatMessages) {
      const target = chats.get(chatId);
      const entry = messages.get(messageId);
      if (!target || !entry) {
        skippedJoins++;
        continue;
      }
      target.messages.push(entry);
    }

    if (droppedMessages > 0) {
      logger.warn(`Dropped ${droppedMessages} message(s) whose handle is missing from the handle table`);
    }
    if (skippedJoins > 0) {
      logger.debug(`Skipped ${skippedJoins} join row(s) referencing missing records`);
    }

    return { chats: [...chats.values()], unresolvedContacts: [...unresolved], droppedMessages };
  } finally {
    sqlite.close();
  }
}

function withoutMessages({ messages: _messages, ...rest }: ChatWithMessages): Chat {
  return rest;
}

export function createMessagesPipeline(opts: { region: CountryCode }): Pipeline {
  return {
    name: "messages",
    async run({ backup, output, contacts }) {
      const { chats } = extractMessages(backup, contacts, opts.region);

      await output.writeRecords("messages/chats.json", chats.map(withoutMessages));
      await output.writeRecords("messages/chats-full.json", chats);
      for (const entry of chats) {
        if (entry.messages.length === 0) continue;
        await output.writeRecords(`messages/message-data/${entry.id}.json`, entry.messages);
      }

      const total = chats.reduce((sum, entry) => sum + entry.messages.length, 0);
      logger.info(`Extracted ${chats.length} chats with ${total} messages`, { backup: backup.id });
    },
  };
}
