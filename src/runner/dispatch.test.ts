import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Backup } from "../backup/backup.js";
import { PhotosNotConfiguredError } from "../backup/errors.js";
import { ContactResolutionTable } from "../contacts/contact-resolution-table.js";
import { JsonOutput } from "../output/json-output.js";
import { FixtureBackup } from "../test/fixture-backup.js";
import { runPipelines } from "./dispatch.js";
import type { Pipeline } from "./types.js";

describe("runPipelines", () => {
  let fixture: FixtureBackup;
  let backup: Backup;
  let outDir: string;

  beforeEach(() => {
    fixture = new FixtureBackup("device-1").finish();
    backup = new Backup(fixture.root, { scratchRoot: fixture.scratchRoot });
    outDir = mkdtempSync(join(tmpdir(), "dispatch-out-"));
  });

  afterEach(() => {
    backup.close();
    fixture.cleanup();
    rmSync(outDir, { recursive: true, force: true });
  });

  it("skips a pipeline whose application is not installed and continues", async () => {
    const ran: string[] = [];
    const pipelines: Pipeline[] = [
      {
        name: "missing-app",
        async run(ctx) {
          ctx.backup.application("com.example.missing");
          ran.push("missing-app");
        },
      },
      {
        name: "next",
        async run() {
          ran.push("next");
        },
      },
    ];

    const reports = await runPipelines(backup, pipelines, new JsonOutput(outDir));
    expect(reports.map((r) => [r.pipeline, r.status])).toEqual([
      ["missing-app", "skipped"],
      ["next", "completed"],
    ]);
    expect(ran).toEqual(["next"]);
  });

  it("treats unconfigured photo export as a skip", async () => {
    const reports = await runPipelines(
      backup,
      [
        {
          name: "photos",
          async run() {
            throw new PhotosNotConfiguredError("BACKUP_PHOTOS_ROOT is not set");
          },
        },
      ],
      new JsonOutput(outDir),
    );
    expect(reports[0].status).toBe("skipped");
  });

  it("records failures without stopping later pipelines", async () => {
    const reports = await runPipelines(
      backup,
      [
        {
          name: "broken",
          async run() {
            throw new Error("disk on fire");
          },
        },
        { name: "after", async run() {} },
      ],
      new JsonOutput(outDir),
    );
    expect(reports[0]).toMatchObject({ pipeline: "broken", status: "failed", error: "disk on fire" });
    expect(reports[1]).toMatchObject({ pipeline: "after", status: "completed" });
  });

  it("hands the contact resolution table to later pipelines", async () => {
    const table = new ContactResolutionTable();
    const seen: Array<ContactResolutionTable | undefined> = [];
    const observe: Pipeline["run"] = async (ctx) => {
      seen.push(ctx.contacts);
    };

    await runPipelines(
      backup,
      [
        { name: "before", run: observe },
        {
          name: "contacts",
          async run() {
            return { contacts: table };
          },
        },
        { name: "messages", run: observe },
      ],
      new JsonOutput(outDir),
    );
    expect(seen).toEqual([undefined, table]);
    expect(seen[1]).toBe(table);
  });
});
