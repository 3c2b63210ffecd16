import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import BetterSqlite3 from "better-sqlite3";
import { stringify as stringifyPlist } from "simple-plist";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FixtureBackup } from "../test/fixture-backup.js";
import { Backup } from "./backup.js";
import {
  AmbiguousFileError,
  ApplicationNotFoundError,
  EmptyFileQueryError,
  FileNotFoundError,
  InvalidBackupError,
} from "./errors.js";

describe("Backup", () => {
  let fixture: FixtureBackup;
  let backup: Backup | undefined;

  function open(): Backup {
    fixture.finish();
    backup = new Backup(fixture.root, { scratchRoot: fixture.scratchRoot });
    return backup;
  }

  beforeEach(() => {
    fixture = new FixtureBackup("device-1");
    backup = undefined;
  });

  afterEach(() => {
    backup?.close();
    fixture.cleanup();
  });

  describe("construction", () => {
    it("rejects a directory without Info.plist", () => {
      const dir = mkdtempSync(join(tmpdir(), "not-a-backup-"));
      try {
        expect(() => new Backup(dir, { scratchRoot: join(dir, "scratch") })).toThrow(InvalidBackupError);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("rejects an unparseable Info.plist", () => {
      writeFileSync(join(fixture.root, "Info.plist"), "not a property list");
      expect(() => open()).toThrow(InvalidBackupError);
    });

    it("rejects an Info.plist without a unique identifier", () => {
      writeFileSync(join(fixture.root, "Info.plist"), stringifyPlist({ "Display Name": "Nameless" }));
      expect(() => open()).toThrow(/Unique Identifier/);
    });

    it("rejects a directory without Manifest.db", () => {
      fixture.finish();
      rmSync(join(fixture.root, "Manifest.db"));
      expect(() => new Backup(fixture.root, { scratchRoot: fixture.scratchRoot })).toThrow(/missing Manifest.db/);
    });

    it("rejects a Manifest.db that is not a SQLite database", () => {
      fixture.finish();
      writeFileSync(join(fixture.root, "Manifest.db"), "this is plain text, not a catalog");
      expect(() => new Backup(fixture.root, { scratchRoot: fixture.scratchRoot })).toThrow(
        /unreadable Manifest.db/,
      );
    });

    it("rejects a Manifest.db without a Files table", () => {
      fixture.finish();
      rmSync(join(fixture.root, "Manifest.db"));
      new BetterSqlite3(join(fixture.root, "Manifest.db")).exec("CREATE TABLE Other (id INTEGER)").close();
      expect(() => new Backup(fixture.root, { scratchRoot: fixture.scratchRoot })).toThrow(InvalidBackupError);
    });

    it("rejects a Manifest.db that cannot be copied", () => {
      fixture.finish();
      rmSync(join(fixture.root, "Manifest.db"));
      mkdirSync(join(fixture.root, "Manifest.db"));
      expect(() => new Backup(fixture.root, { scratchRoot: fixture.scratchRoot })).toThrow(InvalidBackupError);
    });

    it("reads the unique identifier and display fields", () => {
      const b = open();
      expect(b.id).toBe("device-1");
      expect(b.summary()).toEqual({
        path: fixture.root,
        name: "Test iPhone",
        guid: "A1B2C3D4",
        date: "2024-03-01T12:00:00.000Z",
        number: null,
        hardware: "iPhone14,2",
        software: "17.3",
      });
    });
  });

  describe("get", () => {
    it("returns present keys and undefined for absent ones", () => {
      const b = open();
      expect(b.get("Product Version")).toBe("17.3");
      expect(b.get("Target Identifier")).toBeUndefined();
    });
  });

  describe("file", () => {
    it("resolves a domain and path to a sharded physical path", () => {
      const id = "abcd1234abcd1234abcd1234abcd1234abcd1234";
      fixture.addFile("HomeDomain", "a/b.db", "payload", { contentId: id });
      const file = open().file("HomeDomain", "a/b.db");
      expect(file.contentId).toBe(id);
      expect(file.physicalPath).toBe(join(fixture.root, "ab", id));
      expect(file.physicalPath.endsWith(join("ab", id))).toBe(true);
    });

    it("fails with FileNotFoundError when nothing matches", () => {
      fixture.addFile("HomeDomain", "a/b.db", "payload");
      const b = open();
      expect(() => b.file("HomeDomain", "a/c.db")).toThrow(FileNotFoundError);
      expect(() => b.file("MediaDomain", "a/b.db")).toThrow(FileNotFoundError);
    });

    it("fails with AmbiguousFileError when two rows share domain and path", () => {
      fixture.addFile("HomeDomain", "a/b.db", "one", { contentId: "1111" });
      fixture.addFile("HomeDomain", "a/b.db", "two", { contentId: "2222" });
      const b = open();
      expect(() => b.file("HomeDomain", "a/b.db")).toThrow(AmbiguousFileError);
      expect(() => b.file("HomeDomain", "a/b.db")).toThrow(FileNotFoundError);
    });

    it("decodes metadata lazily", () => {
      fixture.addFile("HomeDomain", "notes.txt", "hello", { lastModified: 1_700_000_000 });
      const metadata = open().file("HomeDomain", "notes.txt").metadata();
      expect(metadata.lastModified).toEqual(new Date(1_700_000_000_000));
      expect(metadata.size).toBe(5);
      expect(metadata.mode).toBe(33188);
    });
  });

  describe("files", () => {
    beforeEach(() => {
      fixture.addFile("CameraRollDomain", "Media/DCIM/100APPLE/IMG_0001.HEIC", "a");
      fixture.addFile("CameraRollDomain", "Media/DCIM/100APPLE/IMG_0002.MOV", "b");
      fixture.addFile("CameraRollDomain", "Media/PhotoData/Photos.sqlite", "c");
      fixture.addFile("HomeDomain", "Media/DCIM/stray.jpg", "d");
    });

    it("combines exact domain with a path wildcard", () => {
      const paths = [...open().files({ domain: "CameraRollDomain", path: "Media/DCIM/%" })].map((f) => f.relativePath);
      expect(paths.sort()).toEqual(["Media/DCIM/100APPLE/IMG_0001.HEIC", "Media/DCIM/100APPLE/IMG_0002.MOV"]);
    });

    it("supports a domain wildcard on its own", () => {
      const domains = [...open().files({ domain: "%Domain" })].map((f) => f.domain);
      expect(domains).toHaveLength(4);
    });

    it("throws immediately for an empty filter", () => {
      const b = open();
      expect(() => b.files({})).toThrow(EmptyFileQueryError);
    });

    it("is single-use", () => {
      const sequence = open().files({ domain: "CameraRollDomain" });
      expect([...sequence]).toHaveLength(3);
      expect([...sequence]).toHaveLength(0);
    });

    it("decodes metadata while the sequence is still open", () => {
      const dates: Date[] = [];
      for (const file of open().files({ domain: "CameraRollDomain", path: "Media/DCIM/%" })) {
        dates.push(file.metadata().lastModified);
      }
      expect(dates).toEqual([new Date(1_700_000_000_000), new Date(1_700_000_000_000)]);
    });
  });

  describe("application", () => {
    it("indexes the files of an installed application", () => {
      fixture.installApplication("com.example.notes");
      fixture.addFile("AppDomain-com.example.notes", "Documents/notes.sqlite", "x");
      fixture.addFile("AppDomain-com.example.notes", "Library/Preferences/com.example.notes.plist", "y");
      fixture.addFile("AppDomain-com.example.other", "Documents/notes.sqlite", "z");

      const app = open().application("com.example.notes");
      expect(app.domain).toBe("AppDomain-com.example.notes");
      expect(app.size).toBe(2);
      expect(app.file("Documents/notes.sqlite").domain).toBe("AppDomain-com.example.notes");
      expect(app.has("Library/Preferences/com.example.notes.plist")).toBe(true);
      expect(() => app.file("Documents/missing.sqlite")).toThrow(FileNotFoundError);
    });

    it("accepts bundle ids from Installed Applications", () => {
      fixture.setInfo({ "Installed Applications": ["com.example.listed"] });
      expect(open().application("com.example.listed").size).toBe(0);
    });

    it("lists installed bundle ids", () => {
      fixture.installApplication("com.example.notes");
      fixture.setInfo({ "Installed Applications": ["com.example.listed"] });
      expect([...open().installedApplications].sort()).toEqual(["com.example.listed", "com.example.notes"]);
    });

    it("fails with ApplicationNotFoundError for a bundle id that is not installed", () => {
      const b = open();
      expect(() => b.application("com.example.missing")).toThrow(ApplicationNotFoundError);
    });
  });

  describe("openDatabase", () => {
    it("opens a local copy scoped to backup and domain", () => {
      fixture.addDatabase("HomeDomain", "Library/Test/test.db", (db) => {
        db.exec("CREATE TABLE item (name TEXT); INSERT INTO item VALUES ('first');");
      });
      const b = open();
      const file = b.file("HomeDomain", "Library/Test/test.db");
      const db = b.openDatabase(file);
      try {
        expect(db.prepare("SELECT name FROM item").all()).toEqual([{ name: "first" }]);
      } finally {
        db.close();
      }
      expect(file.localPath).toBe(join(fixture.scratchRoot, "device-1", "HomeDomain", "Library", "Test", "test.db"));
    });
  });
});
