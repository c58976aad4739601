import { Buffer } from "node:buffer";
import { RemoteAccessError, VariableNotFoundError } from "../errors.js";
import { buildSchema, findAsciiBlock, parseAscii } from "../lib/dap.js";
import type { IndexRange } from "../lib/filters.js";
import { rangeLength } from "../lib/grid.js";
import type { ArchiveSchema } from "../types.js";
import type { ArchiveClient } from "./archiveClient.js";

export type OpendapClientOptions = {
  timeoutMs: number;
  username?: string;
  password?: string;
  fetchImpl?: typeof fetch;
};

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "request timed out" : err.message;
  }
  return String(err);
}

export function buildConstraint(name: string, ranges: readonly IndexRange[]): string {
  return name + ranges.map((range) => `[${range.start}:${range.stop}]`).join("");
}

/** DAP2 client speaking the `.dds`, `.das` and `.ascii` responses. */
export class OpendapClient implements ArchiveClient {
  private readonly timeoutMs: number;
  private readonly authHeader: string | null;
  private readonly fetchImpl: typeof fetch;
  private readonly schemas = new Map<string, Promise<ArchiveSchema>>();

  constructor(options: OpendapClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.authHeader = options.username
      ? `Basic ${Buffer.from(`${options.username}:${options.password ?? ""}`).toString("base64")}`
      : null;
  }

  private async fetchText(url: string): Promise<string> {
    const headers: Record<string, string> = { Accept: "text/plain" };
    if (this.authHeader) headers.Authorization = this.authHeader;

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: "GET", headers, signal: AbortSignal.timeout(this.timeoutMs) });
    }
    catch (err) {
      throw new RemoteAccessError(url, `OPeNDAP request failed: ${describeError(err)}`, { cause: err });
    }
    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new RemoteAccessError(url, `OPeNDAP request failed (${response.status}): ${text.trim() || response.statusText}`, {
        status: response.status
      });
    }
    try {
      return await response.text();
    }
    catch (err) {
      throw new RemoteAccessError(url, `OPeNDAP response unreadable: ${describeError(err)}`, { cause: err });
    }
  }

  describe(url: string): Promise<ArchiveSchema> {
    const cached = this.schemas.get(url);
    if (cached) return cached;
    const pending = Promise.all([this.fetchText(`${url}.dds`), this.fetchText(`${url}.das`)])
      .then(([dds, das]) => buildSchema(dds, das));
    pending.catch(() => {
      this.schemas.delete(url);
    });
    this.schemas.set(url, pending);
    return pending;
  }

  async readAxis(url: string, name: string): Promise<number[]> {
    const text = await this.fetchText(`${url}.ascii?${encodeURIComponent(name)}`);
    const block = findAsciiBlock(parseAscii(text), name);
    if (!block) {
      throw new VariableNotFoundError(name, url);
    }
    return block.values;
  }

  async readVariable(url: string, name: string, ranges: IndexRange[]): Promise<number[]> {
    const constraint = buildConstraint(name, ranges);
    const requestUrl = `${url}.ascii?${encodeURIComponent(constraint)}`;
    const block = findAsciiBlock(parseAscii(await this.fetchText(requestUrl)), name);
    if (!block) {
      throw new RemoteAccessError(requestUrl, `OPeNDAP response did not contain ${name}`);
    }
    const expected = ranges.reduce((total, range) => total * rangeLength(range), 1);
    if (block.values.length !== expected) {
      throw new RemoteAccessError(requestUrl, `OPeNDAP returned ${block.values.length} values for ${constraint}, expected ${expected}`);
    }
    return block.values;
  }
}
