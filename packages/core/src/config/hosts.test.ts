import { describe, it, expect } from "vitest";
import { entryUrl, resolveHost } from "./hosts.js";
import {
  AmbiguousHostError,
  NoHostsConfiguredError,
  UnknownHostError,
} from "../errors/catalog.js";
import { StoreConfigSchema } from "../schemas/store-config.js";

const web = { folder: "/srv/web", url: "https://web.example.org/files" };
const backup = { folder: "/srv/backup", url: "https://backup.example.org", prefixLength: 48 };

describe("resolveHost", () => {
  it("uses the only host when no alias is given", () => {
    const config = StoreConfigSchema.parse({ hosts: { web } });

    expect(resolveHost(config)).toEqual({
      ...web,
      alias: "web",
      hostname: "web",
      prefixLength: 32,
      sshOptions: {},
    });
  });

  it("prefers the explicit alias, then defaultHost", () => {
    const config = StoreConfigSchema.parse({ defaultHost: "web", hosts: { web, backup } });

    expect(resolveHost(config).alias).toBe("web");
    expect(resolveHost(config, "backup").prefixLength).toBe(48);
  });

  it("keeps an explicit hostname", () => {
    const config = StoreConfigSchema.parse({
      hosts: { web: { ...web, hostname: "files.example.org" } },
    });
    expect(resolveHost(config).hostname).toBe("files.example.org");
  });

  it("fails without hosts", () => {
    const config = StoreConfigSchema.parse({});
    expect(() => resolveHost(config)).toThrow(NoHostsConfiguredError);
  });

  it("fails on an unknown alias", () => {
    const config = StoreConfigSchema.parse({ hosts: { web } });
    expect(() => resolveHost(config, "nope")).toThrow(UnknownHostError);
    expect(() => resolveHost(config, "constructor")).toThrow(UnknownHostError);
  });

  it("fails when several hosts exist without a default", () => {
    const config = StoreConfigSchema.parse({ hosts: { web, backup } });
    expect(() => resolveHost(config)).toThrow(AmbiguousHostError);
  });
});

describe("entryUrl", () => {
  it("joins the public url and the entry path", () => {
    expect(entryUrl(web, "abc/photo.png")).toBe("https://web.example.org/files/abc/photo.png");
  });

  it("percent-encodes spaces, quotes, angle brackets and backticks", () => {
    expect(entryUrl({ url: "https://x.org/" }, 'h/a b"<c>`.txt')).toBe(
      "https://x.org/h/a%20b%22%3Cc%3E%60.txt",
    );
  });

  it("leaves other characters alone", () => {
    expect(entryUrl({ url: "https://x.org" }, "h-_/ä+#.txt")).toBe("https://x.org/h-_/ä+#.txt");
  });
});
