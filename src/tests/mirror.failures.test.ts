import fsp from "node:fs/promises";
import { join } from "node:path";
import os from "node:os";
import * as hash from "../hash.js";
import { synchronize } from "../mirror.js";
import { ReplicaRootError, SourceRootMissingError } from "../errors.js";
import { memoryLogger, mirror, mkCase, readTree, writeTree } from "./util";

function permissionDenied(): NodeJS.ErrnoException {
  return Object.assign(new Error("EACCES: permission denied"), {
    code: "EACCES",
  });
}

describe("mirror: failures stay with the entry that caused them", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(join(os.tmpdir(), "mirror-failures-"));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("a failed copy is skipped and the rest of the tree still syncs", async () => {
    const r = await mkCase(tmp, "t-copy-fails");
    await writeTree(r.source, { "a.txt": "A", "b.txt": "B" });
    await fsp.mkdir(r.replica);
    jest.spyOn(fsp, "copyFile").mockRejectedValueOnce(permissionDenied());
    const { logger, entries } = memoryLogger();

    const report = await mirror(r, { logger });

    expect(report.changed).toBe(true);
    expect(report.failures).toBe(1);
    const skipped = report.results.filter((x) => x.status === "skipped");
    expect(skipped).toEqual([
      {
        action: "copy",
        path: expect.any(String),
        status: "skipped",
        reason: "EACCES: permission denied",
        code: "EACCES",
      },
    ]);
    const failedPath = skipped[0].path;
    const warnings = entries.filter((e) => e.level === "warn");
    expect(warnings.map((e) => e.message)).toEqual([
      `Error processing ${join(r.source, failedPath)}: EACCES: permission denied`,
    ]);

    // next cycle picks it up
    jest.restoreAllMocks();
    const next = await mirror(r);
    expect(next.results).toEqual([
      { action: "copy", path: failedPath, status: "done" },
    ]);
    expect(await readTree(r.replica)).toEqual({ "a.txt": "A", "b.txt": "B" });
  });

  test("a failure alone does not count as a change", async () => {
    const r = await mkCase(tmp, "t-only-failure");
    await writeTree(r.source, { "only.txt": "x" });
    await fsp.mkdir(r.replica);
    jest.spyOn(fsp, "copyFile").mockRejectedValueOnce(permissionDenied());

    const report = await mirror(r);

    expect(report.changed).toBe(false);
    expect(report.failures).toBe(1);
  });

  test("unreadable files count as different and get overwritten", async () => {
    const r = await mkCase(tmp, "t-compare-fails");
    await writeTree(r.source, { "same.txt": "same" });
    await writeTree(r.replica, { "same.txt": "same" });
    jest.spyOn(hash, "fileDigest").mockRejectedValueOnce(permissionDenied());
    const { logger, entries } = memoryLogger();

    const report = await mirror(r, { logger });

    expect(report.results).toEqual([
      { action: "update", path: "same.txt", status: "done" },
    ]);
    expect(
      entries.filter((e) => e.level === "warn").map((e) => e.message),
    ).toEqual([
      `Error comparing files ${join(r.source, "same.txt")} and ` +
        `${join(r.replica, "same.txt")}: EACCES: permission denied`,
    ]);
  });

  test("a source file that vanishes before its copy is skipped", async () => {
    const r = await mkCase(tmp, "t-vanished");
    await writeTree(r.source, { "a.txt": "A", "b.txt": "B" });
    await fsp.mkdir(r.replica);
    const realCopyFile = fsp.copyFile;
    jest
      .spyOn(fsp, "copyFile")
      .mockImplementationOnce(async (src, dst, mode) => {
        await fsp.rm(src);
        return realCopyFile(src, dst, mode);
      });

    const report = await mirror(r);

    expect(report.results).toEqual([
      {
        action: "copy",
        path: "a.txt",
        status: "skipped",
        reason: expect.stringMatching(/^ENOENT/),
        code: "ENOENT",
      },
      { action: "copy", path: "b.txt", status: "done" },
    ]);
    expect(report.changed).toBe(true);

    jest.restoreAllMocks();
    const next = await mirror(r);
    expect(next.results).toEqual([]);
    expect(await readTree(r.replica)).toEqual({ "b.txt": "B" });
  });

  test("a failed file delete does not stop the other deletions", async () => {
    const r = await mkCase(tmp, "t-delete-fails");
    await writeTree(r.replica, { "extra1.txt": "1", "extra2.txt": "2" });
    jest.spyOn(fsp, "rm").mockRejectedValueOnce(permissionDenied());

    const report = await mirror(r);

    expect(report.results).toEqual([
      {
        action: "delete-file",
        path: "extra1.txt",
        status: "skipped",
        reason: "EACCES: permission denied",
        code: "EACCES",
      },
      { action: "delete-file", path: "extra2.txt", status: "done" },
    ]);
    expect(report.failures).toBe(1);
    expect(await readTree(r.replica)).toEqual({ "extra1.txt": "1" });
  });

  test("a failed delete alone does not count as a change", async () => {
    const r = await mkCase(tmp, "t-delete-only-failure");
    await writeTree(r.replica, { "stuck.txt": "s" });
    jest.spyOn(fsp, "rm").mockRejectedValueOnce(permissionDenied());

    const report = await mirror(r);

    expect(report.changed).toBe(false);
    expect(report.failures).toBe(1);
  });

  test("a failed directory delete does not stop the next one", async () => {
    const r = await mkCase(tmp, "t-dir-delete-fails");
    await fsp.mkdir(join(r.replica, "d1"), { recursive: true });
    await fsp.mkdir(join(r.replica, "d2"));
    jest.spyOn(fsp, "rm").mockRejectedValueOnce(permissionDenied());

    const report = await mirror(r);

    expect(report.results).toEqual([
      {
        action: "delete-dir",
        path: "d1",
        status: "skipped",
        reason: "EACCES: permission denied",
        code: "EACCES",
      },
      { action: "delete-dir", path: "d2", status: "done" },
    ]);
    expect(report.changed).toBe(true);
    expect(await readTree(r.replica)).toEqual({ "d1/": "" });
  });

  test("a source root reached through a symlink is mirrored", async () => {
    const r = await mkCase(tmp, "t-source-link");
    await writeTree(r.source, { "a.txt": "A" });
    const link = join(tmp, "t-source-link", "source-link");
    await fsp.symlink(r.source, link);

    const report = await synchronize({
      sourceRoot: link,
      replicaRoot: r.replica,
    });

    expect(report.results).toEqual([
      { action: "create-root", path: "", status: "done" },
      { action: "copy", path: "a.txt", status: "done" },
    ]);
    expect(await readTree(r.replica)).toEqual({ "a.txt": "A" });
  });

  test("a replica root reached through a symlink is used in place", async () => {
    const r = await mkCase(tmp, "t-replica-link");
    await writeTree(r.source, { "a.txt": "A" });
    await writeTree(r.replica, { "stale.txt": "old" });
    const link = join(tmp, "t-replica-link", "replica-link");
    await fsp.symlink(r.replica, link);

    const report = await synchronize({
      sourceRoot: r.source,
      replicaRoot: link,
    });

    expect(report.results).toEqual([
      { action: "copy", path: "a.txt", status: "done" },
      { action: "delete-file", path: "stale.txt", status: "done" },
    ]);
    expect((await fsp.lstat(link)).isSymbolicLink()).toBe(true);
    expect(await readTree(r.replica)).toEqual({ "a.txt": "A" });
  });

  test("missing source root is rejected before anything is touched", async () => {
    const r = await mkCase(tmp, "t-no-source");
    const missing = join(r.source, "nope");
    await expect(
      synchronize({ sourceRoot: missing, replicaRoot: r.replica }),
    ).rejects.toBeInstanceOf(SourceRootMissingError);
    await expect(fsp.stat(r.replica)).rejects.toMatchObject({
      code: "ENOENT",
    });
  });

  test("replica root that is a file fails the whole cycle", async () => {
    const r = await mkCase(tmp, "t-replica-file");
    await writeTree(r.source, { "a.txt": "a" });
    await fsp.writeFile(r.replica, "not a dir");
    await expect(mirror(r)).rejects.toBeInstanceOf(ReplicaRootError);
  });
});
