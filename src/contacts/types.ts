import type { ContactKind } from "./phone.js";

/** An address book entry with its contact values grouped by kind. */
export interface Person {
  /** ABPerson ROWID */
  id: number;
  /** ABPerson GUID, stable across backups */
  uuid: string;
  firstName?: string;
  lastName?: string;
  nickname?: string;
  organization?: string;
  displayName: string;
  contacts: Partial<Record<ContactKind, string[]>>;
}

export interface NameParts {
  firstName?: string | null;
  lastName?: string | null;
  nickname?: string | null;
  organization?: string | null;
}
