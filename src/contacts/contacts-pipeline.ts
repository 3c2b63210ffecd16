import { drizzle } from "drizzle-orm/better-sqlite3";
import type { CountryCode } from "libphonenumber-js";
import type { Backup } from "../backup/backup.js";
import { logger } from "../config/logger.js";
import type { Pipeline } from "../runner/types.js";
import { ContactResolutionTable } from "./contact-resolution-table.js";
import { classifyContact, DEFAULT_REGION } from "./phone.js";
import { abMultiValue, abPerson } from "./schema.js";
import type { NameParts, Person } from "./types.js";

export const ADDRESS_BOOK_DOMAIN = "HomeDomain";
export const ADDRESS_BOOK_PATH = "Library/AddressBook/AddressBook.sqlitedb";

/**
 * `First "Nickname" Last (Organization)`, skipping empty parts. An
 * organization on its own is used bare.
 */
export function displayName(parts: NameParts): string {
  const words: string[] = [];
  if (parts.firstName) words.push(parts.firstName);
  if (parts.nickname) words.push(`"${parts.nickname}"`);
  if (parts.lastName) words.push(parts.lastName);
  if (parts.organization) {
    words.push(words.length > 0 ? `(${parts.organization})` : parts.organization);
  }
  return words.join(" ");
}

export interface ContactsExtraction {
  people: Person[];
  table: ContactResolutionTable;
}

/** Read the address book and build the people list and its resolution table. */
export function extractContacts(backup: Backup, region: CountryCode = DEFAULT_REGION): ContactsExtraction {
  const sqlite = backup.openDatabase(backup.file(ADDRESS_BOOK_DOMAIN, ADDRESS_BOOK_PATH));
  try {
    const db = drizzle(sqlite);

    const rows = db
      .select({
        id: abPerson.rowId,
        uuid: abPerson.guid,
        firstName: abPerson.first,
        lastName: abPerson.last,
        nickname: abPerson.nickname,
        organization: abPerson.organization,
      })
      .from(abPerson)
      .orderBy(abPerson.rowId)
      .all();

    const people = new Map<number, Person>();
    const withoutGuid: number[] = [];
    for (const row of rows) {
      if (row.uuid === null) withoutGuid.push(row.id);
      people.set(row.id, {
        id: row.id,
        uuid: row.uuid ?? String(row.id),
        ...(row.firstName ? { firstName: row.firstName } : {}),
        ...(row.lastName ? { lastName: row.lastName } : {}),
        ...(row.nickname ? { nickname: row.nickname } : {}),
        ...(row.organization ? { organization: row.organization } : {}),
        displayName: displayName(row),
        contacts: {},
      });
    }
    if (withoutGuid.length > 0) {
      logger.warn(`Using the row id as uuid for ${withoutGuid.length} address book person(s) without a GUID`, {
        rowIds: withoutGuid,
      });
    }

    const values = db
      .select({ personId: abMultiValue.recordId, value: abMultiValue.value })
      .from(abMultiValue)
      .orderBy(abMultiValue.uid)
      .all();

    let orphaned = 0;
    for (const { personId, value } of values) {
      if (!value) continue;
      const person = people.get(personId);
      if (!person) {
        orphaned++;
        continue;
      }
      const point = classifyContact(value, region);
      const existing = person.contacts[point.kind];
      if (existing) {
        existing.push(point.value);
      } else {
        person.contacts[point.kind] = [point.value];
      }
    }
    if (orphaned > 0) {
      logger.warn(`Ignored ${orphaned} address book value(s) without a matching person`);
    }

    const list = [...people.values()];
    return { people: list, table: ContactResolutionTable.fromPeople(list) };
  } finally {
    sqlite.close();
  }
}

export function createContactsPipeline(opts: { region: CountryCode }): Pipeline {
  return {
    name: "contacts",
    async run({ backup, output }) {
      const { people, table } = extractContacts(backup, opts.region);
      await output.writeRecords("messages/contacts.json", people);
      logger.info(`Extracted ${people.length} contacts`, { backup: backup.id, contactValues: table.size });
      return { contacts: table };
    },
  };
}
