import { logger } from "../config/logger.js";
import type { Person } from "./types.js";

export interface ResolvedContact {
  /** Address book GUID of the person */
  personId: string;
  displayName: string;
}

/** The same contact string appears under two different people; the later one won. */
export interface ContactConflict {
  contact: string;
  previous: ResolvedContact;
  winner: ResolvedContact;
}

/**
 * Normalized contact string → person lookup, built once from the address
 * book and handed to the messaging extractor.
 */
export class ContactResolutionTable {
  private readonly entries = new Map<string, ResolvedContact>();
  private readonly conflictList: ContactConflict[] = [];

  static fromPeople(people: Iterable<Person>): ContactResolutionTable {
    const table = new ContactResolutionTable();
    for (const person of people) {
      for (const values of Object.values(person.contacts)) {
        for (const contact of values ?? []) {
          table.add(contact, { personId: person.uuid, displayName: person.displayName });
        }
      }
    }
    if (table.conflictList.length > 0) {
      logger.warn(`${table.conflictList.length} contact value(s) are shared by more than one person`, {
        contacts: table.conflictList.map((c) => c.contact),
      });
    }
    return table;
  }

  /** Last write wins; overwriting a different person is recorded as a conflict. */
  add(contact: string, resolved: ResolvedContact): void {
    const previous = this.entries.get(contact);
    if (previous && previous.personId !== resolved.personId) {
      this.conflictList.push({ contact, previous, winner: resolved });
    }
    this.entries.set(contact, resolved);
  }

  resolve(contact: string): ResolvedContact | undefined {
    return this.entries.get(contact);
  }

  get size(): number {
    return this.entries.size;
  }

  get conflicts(): readonly ContactConflict[] {
    return this.conflictList;
  }
}
