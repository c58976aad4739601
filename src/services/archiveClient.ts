import type { IndexRange } from "../lib/filters.js";
import type { ArchiveSchema } from "../types.js";
import { NetcdfFileClient } from "./netcdfArchive.js";
import { OpendapClient, type OpendapClientOptions } from "./opendapClient.js";

/**
 * Read-only access to one gridded archive. `describe` is expected to be
 * cheap after the first call for a URL; nothing bulk is read until
 * `readVariable`.
 */
export interface ArchiveClient {
  describe(url: string): Promise<ArchiveSchema>;
  readAxis(url: string, name: string): Promise<number[]>;
  /** Raw (undecoded) values of the hyperslab, row-major, one range per dimension. */
  readVariable(url: string, name: string, ranges: IndexRange[]): Promise<number[]>;
}

export function isLocalArchive(url: string): boolean {
  return url.startsWith("file:") || !/^[a-z][a-z0-9+.-]*:\/\//i.test(url);
}

/** Sends http(s) URLs to the OPeNDAP client and file paths to the NetCDF reader. */
export class DispatchingArchiveClient implements ArchiveClient {
  private readonly remote: ArchiveClient;
  private readonly local: ArchiveClient;

  constructor(remote: ArchiveClient, local: ArchiveClient) {
    this.remote = remote;
    this.local = local;
  }

  private pick(url: string): ArchiveClient {
    return isLocalArchive(url) ? this.local : this.remote;
  }

  describe(url: string): Promise<ArchiveSchema> {
    return this.pick(url).describe(url);
  }

  readAxis(url: string, name: string): Promise<number[]> {
    return this.pick(url).readAxis(url, name);
  }

  readVariable(url: string, name: string, ranges: IndexRange[]): Promise<number[]> {
    return this.pick(url).readVariable(url, name, ranges);
  }
}

export function createArchiveClient(options: OpendapClientOptions): ArchiveClient {
  return new DispatchingArchiveClient(new OpendapClient(options), new NetcdfFileClient());
}
