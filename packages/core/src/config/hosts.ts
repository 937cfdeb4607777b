import {
  AmbiguousHostError,
  NoHostsConfiguredError,
  UnknownHostError,
} from "../errors/catalog.js";
import type { HostConfig, StoreConfig } from "../schemas/store-config.js";

/** A configured host with its alias and effective settings filled in. */
export interface ResolvedHost extends HostConfig {
  alias: string;
  hostname: string;
  prefixLength: number;
}

/**
 * Pick the host to talk to: the explicit alias, else `defaultHost`,
 * else the only configured host.
 */
export function resolveHost(config: StoreConfig, alias?: string): ResolvedHost {
  const aliases = Object.keys(config.hosts);
  const chosen = alias ?? config.defaultHost ?? (aliases.length === 1 ? aliases[0] : undefined);

  if (chosen === undefined) {
    if (aliases.length === 0) throw new NoHostsConfiguredError();
    throw new AmbiguousHostError({ aliases });
  }

  const host = Object.hasOwn(config.hosts, chosen) ? config.hosts[chosen] : undefined;
  if (!host) {
    if (aliases.length === 0) throw new NoHostsConfiguredError();
    throw new UnknownHostError({ alias: chosen });
  }

  return {
    ...host,
    alias: chosen,
    hostname: host.hostname ?? chosen,
    prefixLength: host.prefixLength ?? config.prefixLength,
  };
}

// Control characters, space, quotes, angle brackets and backtick
const URL_UNSAFE = /[\u0000-\u001f\u007f "<>`]/g;

function percentEncode(char: string): string {
  return [...Buffer.from(char)]
    .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, "0")}`)
    .join("");
}

/** Public URL of an entry: `${url}/${relativePath}` with unsafe characters escaped. */
export function entryUrl(host: Pick<HostConfig, "url">, relativePath: string): string {
  const base = host.url.replace(/\/+$/, "");
  return `${base}/${relativePath.replace(URL_UNSAFE, percentEncode)}`;
}
