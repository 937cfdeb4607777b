import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmod, mkdir, mkdtemp, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildCatalog } from "@hashdrop/core/catalog";
import { RemoteCommandFailureError } from "@hashdrop/core/errors";
import { hashLocal, hashRemote } from "@hashdrop/core/hash";
import { verifyEntries } from "@hashdrop/core/verify";
import { SshRemoteSite, listCommand, statCommand } from "./site.js";

// Stands in for the OpenSSH client: runs the last argument with the local shell
const FAKE_SSH = '#!/bin/sh\nfor last; do :; done\nexec sh -c "$last"\n';

describe("command builders", () => {
  it("quotes the store root", () => {
    expect(listCommand("/srv/it's")).toBe(
      "cd '/srv/it'\\''s' || exit 3; set -- */*; [ -e \"$1\" ] || exit 0; ls -1rtd -- \"$@\"",
    );
  });

  it("falls back to BSD stat", () => {
    expect(statCommand("/s/h/a")).toBe(
      "stat -c '%s %Y' -- '/s/h/a' 2>/dev/null || stat -f '%z %m' -- '/s/h/a'",
    );
  });
});

describe("SshRemoteSite", () => {
  let dir: string;
  let storeRoot: string;
  let site: SshRemoteSite;

  async function storeFile(relativePath: string, content: string, mtime: number) {
    const path = join(storeRoot, relativePath);
    await mkdir(join(path, ".."), { recursive: true });
    await writeFile(path, content);
    await utimes(path, mtime, mtime);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hashdrop-ssh-"));
    storeRoot = join(dir, "store");
    await mkdir(storeRoot);
    const sshCommand = join(dir, "fake-ssh");
    await writeFile(sshCommand, FAKE_SSH);
    await chmod(sshCommand, 0o755);
    site = new SshRemoteSite({ hostname: "localhost", port: 2222, storeRoot, sshCommand });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists an empty store as no entries", async () => {
    expect(await site.listStoreEntries()).toEqual([]);
  });

  it("lists entries oldest first", async () => {
    await storeFile("bbb/new.txt", "new", 1_700_000_200);
    await storeFile("aaa/old.txt", "old", 1_700_000_100);

    expect(await site.listStoreEntries()).toEqual(["aaa/old.txt", "bbb/new.txt"]);
  });

  it("fails listing a missing store root", async () => {
    const missing = new SshRemoteSite({
      hostname: "localhost",
      storeRoot: join(dir, "nope"),
      sshCommand: join(dir, "fake-ssh"),
    });
    await expect(missing.listStoreEntries()).rejects.toThrow(RemoteCommandFailureError);
  });

  it("stats a single entry", async () => {
    await storeFile("aaa/file.txt", "12345", 1_700_000_100);

    expect(await site.statEntry("aaa/file.txt")).toEqual({ size: 5, mtime: 1_700_000_100 });
  });

  it("runs commands and reports exit codes", async () => {
    expect(await site.runCommand("echo out; echo err >&2; exit 4")).toEqual({
      exitCode: 4,
      stdout: "out\n",
      stderr: "err\n",
    });
  });

  it("uploads a local file", async () => {
    const local = join(dir, "local.txt");
    await writeFile(local, "uploaded content\n");
    await mkdir(join(storeRoot, "abc"));

    await site.uploadFile(local, "abc/remote name.txt");

    expect(await readFile(join(storeRoot, "abc", "remote name.txt"), "utf-8")).toBe(
      "uploaded content\n",
    );
  });

  it("fails uploading into a missing folder", async () => {
    const local = join(dir, "local.txt");
    await writeFile(local, "x");

    await expect(site.uploadFile(local, "missing/x.txt")).rejects.toThrow(
      RemoteCommandFailureError,
    );
  });

  it("hashes and verifies through the remote shell", async () => {
    const token = await hashLocal("hello\n", 16);
    await storeFile(`${token}/hello.txt`, "hello\n", 1_700_000_100);
    await storeFile("AAAAAAAAAAAAAAAA/bad.txt", "not matching", 1_700_000_200);

    expect(await hashRemote(site, [`${token}/hello.txt`], 16)).toEqual([token]);

    const catalog = await buildCatalog(site);
    const report = await verifyEntries(site, catalog.entries);
    expect(report.results.map((r) => r.outcome.status)).toEqual(["verified", "mismatch"]);
  });

  it("rejects when the client cannot be started", async () => {
    const broken = new SshRemoteSite({
      hostname: "localhost",
      storeRoot,
      sshCommand: join(dir, "does-not-exist"),
    });
    await expect(broken.runCommand("true")).rejects.toThrow("Failed to start");
  });
});
