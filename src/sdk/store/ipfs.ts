/**
 * Kubo (go-ipfs) RPC client via native fetch.
 *
 * Every RPC endpoint is a POST under /api/v0. The client is constructed
 * with an explicit API URL and injected where needed; there is no shared
 * module-level instance.
 */

import { z } from "zod";

import {
  FormatError,
  NotFoundError,
  StoreTimeoutError,
  StoreUnavailableError,
  UnresolvedNameError,
} from "../../protocol/errors.js";
import { ContentStore, type StoreKey } from "./base.js";

const AVAILABILITY_TIMEOUT_MS = 2_000;

const AddResponseSchema = z.object({ Hash: z.string() });
const NamePublishResponseSchema = z.object({ Name: z.string() });
const NameResolveResponseSchema = z.object({ Path: z.string() });
const KeyListResponseSchema = z.object({
  Keys: z.array(z.object({ Name: z.string(), Id: z.string() })).nullable(),
});
const ErrorResponseSchema = z.object({ Message: z.string() });

type ErrorKind = "not-found" | "unresolved" | "timeout" | "unavailable";

function classifyError(message: string): ErrorKind {
  const m = message.toLowerCase();
  if (m.includes("deadline exceeded")) return "timeout";
  if (m.includes("could not resolve")) return "unresolved";
  if (m.includes("not found") || m.includes("no link named")) return "not-found";
  return "unavailable";
}

function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export class IpfsClient extends ContentStore {
  private _apiUrl: string;

  constructor(apiUrl: string) {
    super();
    this._apiUrl = apiUrl.replace(/\/+$/, "");
  }

  get apiUrl(): string {
    return this._apiUrl;
  }

  async put(data: Uint8Array | string): Promise<string> {
    const form = new FormData();
    form.append("file", new Blob([data]), "data");
    const resp = await this._post("add", {}, { body: form });
    return this._parse(AddResponseSchema, await resp.json(), "add").Hash;
  }

  async get(cid: string, timeoutMs?: number): Promise<Uint8Array> {
    const resp = await this._post("cat", { arg: cid }, { timeoutMs, notFound: NotFoundError });
    return new Uint8Array(await resp.arrayBuffer());
  }

  async pin(cid: string): Promise<void> {
    await this._post("pin/add", { arg: cid }, { notFound: NotFoundError });
  }

  async publishName(cid: string, keyName: string): Promise<string> {
    const resp = await this._post("name/publish", {
      arg: `/ipfs/${cid}`,
      key: keyName,
    });
    return this._parse(NamePublishResponseSchema, await resp.json(), "name/publish").Name;
  }

  async resolveName(name: string, timeoutMs: number): Promise<string> {
    const resp = await this._post(
      "name/resolve",
      { arg: name, timeout: `${Math.ceil(timeoutMs / 1000)}s` },
      { timeoutMs, notFound: UnresolvedNameError }
    );
    const { Path } = this._parse(NameResolveResponseSchema, await resp.json(), "name/resolve");
    return Path.replace(/^\/ipfs\//, "");
  }

  async importKey(keyName: string, pem: string): Promise<void> {
    const form = new FormData();
    form.append("file", new Blob([pem]), "key.pem");
    await this._post(
      "key/import",
      { arg: keyName, format: "pem-pkcs8-cleartext" },
      { body: form }
    );
  }

  async listKeys(): Promise<StoreKey[]> {
    const resp = await this._post("key/list", {});
    const { Keys } = this._parse(KeyListResponseSchema, await resp.json(), "key/list");
    return (Keys ?? []).map((k) => ({ name: k.Name, id: k.Id }));
  }

  async isAvailable(): Promise<boolean> {
    try {
      const resp = await fetch(`${this._apiUrl}/id`, {
        method: "POST",
        signal: AbortSignal.timeout(AVAILABILITY_TIMEOUT_MS),
      });
      return resp.ok;
    } catch {
      return false;
    }
  }

  // -- Internal -------------------------------------------------------------

  private async _post(
    endpoint: string,
    params: Record<string, string>,
    options?: {
      body?: FormData;
      timeoutMs?: number;
      notFound?: new (message: string) => Error;
    }
  ): Promise<Response> {
    const url = new URL(`${this._apiUrl}/${endpoint}`);
    for (const [k, v] of Object.entries(params)) {
      url.searchParams.set(k, v);
    }

    let resp: Response;
    try {
      resp = await fetch(url.toString(), {
        method: "POST",
        body: options?.body,
        signal:
          options?.timeoutMs !== undefined
            ? AbortSignal.timeout(options.timeoutMs)
            : undefined,
      });
    } catch (err) {
      if (isAbort(err)) {
        throw new StoreTimeoutError(
          `${endpoint} timed out after ${options?.timeoutMs ?? 0}ms`
        );
      }
      throw new StoreUnavailableError(
        `IPFS API unreachable at ${this._apiUrl}: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (resp.ok) {
      return resp;
    }

    const text = await resp.text();
    const parsed = ErrorResponseSchema.safeParse(parseJsonOrNull(text));
    const message = parsed.success ? parsed.data.Message : text.trim() || resp.statusText;

    const detail = `${endpoint} failed: ${resp.status} ${message}`;
    switch (classifyError(message)) {
      case "timeout":
        throw new StoreTimeoutError(detail);
      case "unresolved":
        throw new UnresolvedNameError(detail);
      case "not-found":
        if (options?.notFound) throw new options.notFound(detail);
        throw new StoreUnavailableError(detail);
      default:
        throw new StoreUnavailableError(detail);
    }
  }

  private _parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, endpoint: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new FormatError(`Unexpected ${endpoint} response from IPFS API`);
    }
    return result.data;
  }
}
