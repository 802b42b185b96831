/**
 * `$ref` expansion for specification documents.
 *
 * Internal refs (`#/components/...`) are looked up from the root of the
 * document that contains them; `http(s)://` refs fetch the target document
 * once per resolve() call. A ref that is re-entered while it is still being
 * expanded comes back as `{ ref, circular: true }` instead of recursing.
 */

import { GatewayError, MalformedReferenceError, UnsupportedReferenceError, errorMessage } from "./errors.js";
import { isRecord, parseDocument } from "./spec.js";
import type { JsonObject } from "./types.js";

export interface CircularRef {
  ref: string;
  circular: true;
}

export type DocumentFetcher = (url: string) => Promise<JsonObject>;

export interface RefResolverOptions {
  fetchDocument?: DocumentFetcher;
  timeoutMs?: number;
}

export function isCircularRef(value: unknown): value is CircularRef {
  return isRecord(value) && value.circular === true && typeof value.ref === "string";
}

export class RefResolver {
  private fetchDocument: DocumentFetcher;

  constructor(options: RefResolverOptions = {}) {
    const timeoutMs = options.timeoutMs ?? 30000;
    this.fetchDocument = options.fetchDocument ?? ((url) => fetchRemoteDocument(url, timeoutMs));
  }

  /**
   * Return a copy of `document` with every resolvable `$ref` inlined.
   */
  async resolve(document: JsonObject): Promise<JsonObject> {
    const run = new ResolutionRun(document, this.fetchDocument);
    const resolved = await run.walk(document, "");
    if (!isRecord(resolved)) {
      throw new MalformedReferenceError("#", "document root resolved to a non-object");
    }
    return resolved;
  }
}

/** State for one resolve() call: in-progress stack, memo, external cache. */
class ResolutionRun {
  private inProgress = new Set<string>();
  private memo = new Map<string, unknown>();
  private externals = new Map<string, Promise<JsonObject>>();

  constructor(
    private root: JsonObject,
    private fetchDocument: DocumentFetcher,
  ) {}

  // `base` is "" for the root document, else the URL of the external
  // document the node came from. Children are walked one at a time since
  // the in-progress set is shared.
  async walk(node: unknown, base: string): Promise<unknown> {
    if (Array.isArray(node)) {
      const out: unknown[] = [];
      for (const item of node) out.push(await this.walk(item, base));
      return out;
    }
    if (!isRecord(node)) return node;

    const ref = node.$ref;
    if (typeof ref === "string") return this.resolveRef(ref, base);

    const out: JsonObject = {};
    for (const [key, value] of Object.entries(node)) {
      out[key] = await this.walk(value, base);
    }
    return out;
  }

  private async resolveRef(ref: string, base: string): Promise<unknown> {
    const { docUrl, fragment } = splitRef(ref, base);
    const key = `${docUrl}#${fragment}`;

    if (this.inProgress.has(key)) return { ref, circular: true } satisfies CircularRef;
    if (this.memo.has(key)) return this.memo.get(key);

    const doc = docUrl ? await this.external(docUrl, ref) : this.root;
    const target = lookupPointer(doc, fragment, ref);

    this.inProgress.add(key);
    try {
      const resolved = await this.walk(target, docUrl);
      this.memo.set(key, resolved);
      return resolved;
    } finally {
      this.inProgress.delete(key);
    }
  }

  private external(url: string, ref: string): Promise<JsonObject> {
    let pending = this.externals.get(url);
    if (!pending) {
      pending = this.fetchDocument(url).catch((err: unknown) => {
        if (err instanceof GatewayError) throw err;
        throw new MalformedReferenceError(ref, `could not load ${url}: ${errorMessage(err)}`);
      });
      this.externals.set(url, pending);
    }
    return pending;
  }
}

function splitRef(ref: string, base: string): { docUrl: string; fragment: string } {
  if (ref.startsWith("#")) return { docUrl: base, fragment: ref.slice(1) };

  if (/^https?:\/\//i.test(ref)) {
    const hash = ref.indexOf("#");
    if (hash === -1) return { docUrl: ref, fragment: "" };
    return { docUrl: ref.slice(0, hash), fragment: ref.slice(hash + 1) };
  }

  throw new UnsupportedReferenceError(ref);
}

/**
 * Navigate an RFC 6901 JSON pointer (already stripped of the leading "#").
 */
export function lookupPointer(doc: JsonObject, pointer: string, ref = `#${pointer}`): unknown {
  if (pointer === "") return doc;
  if (!pointer.startsWith("/")) {
    throw new MalformedReferenceError(ref, "fragment is not a JSON pointer");
  }

  let current: unknown = doc;
  for (const rawSegment of pointer.slice(1).split("/")) {
    const segment = decodeSegment(rawSegment, ref);
    if (Array.isArray(current)) {
      const index = /^\d+$/.test(segment) ? Number(segment) : -1;
      if (index < 0 || index >= current.length) {
        throw new MalformedReferenceError(ref, `index "${segment}" out of range`);
      }
      current = current[index];
    } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = current[segment];
    } else {
      throw new MalformedReferenceError(ref, `segment "${segment}" not found`);
    }
  }
  return current;
}

function decodeSegment(segment: string, ref: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    throw new MalformedReferenceError(ref, `bad percent-encoding in "${segment}"`);
  }
  return decoded.replace(/~1/g, "/").replace(/~0/g, "~");
}

async function fetchRemoteDocument(url: string, timeoutMs: number): Promise<JsonObject> {
  const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!res.ok) {
    throw new MalformedReferenceError(url, `HTTP ${res.status} fetching external document`);
  }
  return parseDocument(await res.text());
}
