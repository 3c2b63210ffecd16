/** Base class for every failure raised while reading a backup. */
export class BackupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BackupError";
  }
}

/** The directory is not a usable backup: missing or unreadable Info.plist / Manifest.db. */
export class InvalidBackupError extends BackupError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`${path} is not a valid backup: ${reason}`);
    this.name = "InvalidBackupError";
    this.path = path;
  }
}

export class ApplicationNotFoundError extends BackupError {
  readonly bundleId: string;

  constructor(bundleId: string, backupId: string) {
    super(`Application ${bundleId} is not installed in backup ${backupId}`);
    this.name = "ApplicationNotFoundError";
    this.bundleId = bundleId;
  }
}

export class FileNotFoundError extends BackupError {
  readonly domain: string;
  readonly path: string;

  constructor(domain: string, path: string, message = `File ${path} not found in domain ${domain}`) {
    super(message);
    this.name = "FileNotFoundError";
    this.domain = domain;
    this.path = path;
  }
}

/** A (domain, path) lookup matched more than one manifest row. */
export class AmbiguousFileError extends FileNotFoundError {
  readonly matches: number;

  constructor(domain: string, path: string, matches: number) {
    super(domain, path, `File ${path} in domain ${domain} matches ${matches} manifest rows`);
    this.name = "AmbiguousFileError";
    this.matches = matches;
  }
}

export class EmptyFileQueryError extends BackupError {
  constructor() {
    super("A file query needs a domain or a path pattern");
    this.name = "EmptyFileQueryError";
  }
}

export class ScratchPathError extends BackupError {
  constructor(segment: string) {
    super(`Scratch path segment "${segment}" escapes the scratch directory`);
    this.name = "ScratchPathError";
  }
}

/** Messaging extraction was started without a contact resolution table. */
export class ContactsNotLoadedError extends BackupError {
  constructor() {
    super("Contacts must be extracted before messages");
    this.name = "ContactsNotLoadedError";
  }
}

export class PhotosNotConfiguredError extends BackupError {
  constructor(reason: string) {
    super(`Photo export is not configured: ${reason}`);
    this.name = "PhotosNotConfiguredError";
  }
}
