import { describe, it, expect } from "vitest";
import { FakeRemoteSite, parseQuotedArgs } from "./fake-site.js";
import { quoteShellArg } from "../remote/shell.js";

describe("parseQuotedArgs", () => {
  it("undoes quoteShellArg", () => {
    const values = ["plain", "with space", "it's", "''"];
    const command = `tool -- ${values.map(quoteShellArg).join(" ")}`;
    expect(parseQuotedArgs(command)).toEqual(values);
  });
});

describe("FakeRemoteSite", () => {
  it("lists by mtime, then path", async () => {
    const site = new FakeRemoteSite();
    site.addFile("h2/b", "b", 5);
    site.addFile("h1/a", "a", 5);
    site.addFile("h0/z", "z", 1);
    expect(await site.listStoreEntries()).toEqual(["h0/z", "h1/a", "h2/b"]);
  });

  it("answers unknown commands with exit 127", async () => {
    const site = new FakeRemoteSite();
    expect(await site.runCommand("frobnicate")).toEqual({
      exitCode: 127,
      stdout: "",
      stderr: "sh: frobnicate: command not found",
    });
  });

  it("rejects uploads into folders that do not exist", async () => {
    const site = new FakeRemoteSite();
    await expect(site.uploadFile("/dev/null", "h1/a")).rejects.toThrow("exited with 1");
  });
});
