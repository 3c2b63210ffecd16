import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Tables of Library/AddressBook/AddressBook.sqlitedb (HomeDomain) that the
// contacts extractor reads. Only the columns used are declared.

export const abPerson = sqliteTable("ABPerson", {
  rowId: integer("ROWID").primaryKey(),
  guid: text("GUID"),
  first: text("First"),
  last: text("Last"),
  nickname: text("Nickname"),
  organization: text("Organization"),
});

/** Phone numbers, emails, URLs and other multi-valued properties of a person. */
export const abMultiValue = sqliteTable("ABMultiValue", {
  uid: integer("UID").primaryKey(),
  recordId: integer("record_id").notNull(),
  property: integer("property"),
  value: text("value"),
});
