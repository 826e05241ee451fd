// src/notion/notionClient.ts
//
// Cliente mínimo para a Notion API (oficial) usado pelo digest semanal.
// Implementa o ContentStore: uma chamada = uma página de resultados.
// Paginação completa fica em paginate.ts; árvore de blocos em blockTree.ts.
//
// Observação importante:
// - Este cliente NÃO faz cache (cada run busca tudo de novo).
// - Toda falha (rede, timeout, HTTP != 2xx, JSON fora do schema) vira TransportError.
// - Timeout é responsabilidade daqui, não do core.

import { ZodError, type ZodType } from "zod";

import { TransportError, ValidationError, errorMessage } from "../domain/errors.js";
import type { Block, ContentStore, NotionDatabase, NotionDocument, Page } from "../domain/notion.js";
import { toBlock, toDatabase, toDocument } from "./mappers.js";
import { clampPageSize, collectAllPages } from "./paginate.js";
import { ErrorBodySchema, ListResponseSchema } from "./schemas.js";

export const NOTION_API_BASE = "https://api.notion.com/v1";
export const DEFAULT_NOTION_VERSION = "2022-06-28";
export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface NotionClientOptions {
  apiKey: string;
  version?: string;
  timeoutMs?: number;
  baseUrl?: string;
  // injetável para testes (sem rede)
  fetchImpl?: FetchLike;
}

export interface QueryOptions {
  pageSize?: number;
  filter?: Record<string, unknown>;
  sorts?: Record<string, unknown>[];
}

type RequestSpec = {
  method: "GET" | "POST";
  path: string;
  query?: Record<string, string>;
  body?: Record<string, unknown>;
};

export function normalizePageId(pageId: string): string {
  // Aceita com/sem hífen. Notion API aceita os dois, mas vamos limpar.
  const raw = String(pageId || "").trim();
  if (!raw) return "";
  return raw.replace(/[^a-f0-9]/gi, "");
}

function requireId(id: string, what: string): string {
  const normalized = normalizePageId(id);
  if (!normalized) {
    throw new ValidationError(`[notionClient] ${what}: id vazio`);
  }
  return normalized;
}

export class NotionClient implements ContentStore {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(opts: NotionClientOptions) {
    this.headers = {
      "Authorization": `Bearer ${opts.apiKey}`,
      "Notion-Version": (opts.version || DEFAULT_NOTION_VERSION).trim(),
      "Content-Type": "application/json",
    };
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.baseUrl = opts.baseUrl ?? NOTION_API_BASE;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  // ========== Database ==========

  async getDatabase(databaseId: string): Promise<NotionDatabase> {
    const id = requireId(databaseId, "getDatabase");
    const raw = await this.request({ method: "GET", path: `/databases/${id}` });
    return this.mapOrFail(raw, toDatabase, `database ${databaseId}`);
  }

  async queryDatabasePage(
    databaseId: string,
    cursor?: string,
    opts: QueryOptions = {}
  ): Promise<Page<NotionDocument>> {
    const id = requireId(databaseId, "queryDatabase");

    const body: Record<string, unknown> = { page_size: clampPageSize(opts.pageSize) };
    if (opts.filter) body.filter = opts.filter;
    if (opts.sorts && opts.sorts.length > 0) body.sorts = opts.sorts;
    if (cursor) body.start_cursor = cursor;

    const raw = await this.request({ method: "POST", path: `/databases/${id}/query`, body });
    return this.toPage(raw, toDocument, `query ${databaseId}`);
  }

  queryDatabaseAll(databaseId: string, opts: QueryOptions = {}): Promise<NotionDocument[]> {
    return collectAllPages((cursor) => this.queryDatabasePage(databaseId, cursor, opts), {
      label: `database:${databaseId}`,
    });
  }

  // ========== Page ==========

  async getPage(pageId: string): Promise<NotionDocument> {
    const id = requireId(pageId, "getPage");
    const raw = await this.request({ method: "GET", path: `/pages/${id}` });
    return this.mapOrFail(raw, toDocument, `page ${pageId}`);
  }

  // ========== Blocks ==========

  async getBlockChildrenPage(blockId: string, cursor?: string, pageSize?: number): Promise<Page<Block>> {
    const id = requireId(blockId, "getBlockChildren");

    const query: Record<string, string> = { page_size: String(clampPageSize(pageSize)) };
    if (cursor) query.start_cursor = cursor;

    const raw = await this.request({ method: "GET", path: `/blocks/${id}/children`, query });
    return this.toPage(raw, toBlock, `children ${blockId}`);
  }

  // ========== ContentStore ==========

  fetchChildPage(parentId: string, cursor?: string): Promise<Page<Block>> {
    return this.getBlockChildrenPage(parentId, cursor);
  }

  fetchCollectionPage(collectionId: string, cursor?: string): Promise<Page<NotionDocument>> {
    return this.queryDatabasePage(collectionId, cursor);
  }

  // ========== HTTP ==========

  private async request(spec: RequestSpec): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${spec.path}`);
    for (const [k, v] of Object.entries(spec.query ?? {})) {
      url.searchParams.set(k, v);
    }

    let res: Response;
    try {
      res = await this.fetchImpl(url.toString(), {
        method: spec.method,
        headers: this.headers,
        body: spec.body ? JSON.stringify(spec.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(0, `falha de rede em ${spec.method} ${spec.path}: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      const body = await safeReadText(res);
      throw new TransportError(res.status, extractErrorMessage(body));
    }

    try {
      return await res.json();
    } catch (err) {
      throw new TransportError(0, `resposta não-JSON em ${spec.path}: ${errorMessage(err)}`);
    }
  }

  private toPage<T>(raw: unknown, map: (item: unknown) => T, what: string): Page<T> {
    return this.mapOrFail(
      raw,
      (value) => {
        const list = ListResponseSchema.parse(value);
        return {
          items: list.results.map(map),
          nextCursor: list.next_cursor ?? null,
          hasMore: list.has_more,
        };
      },
      what
    );
  }

  private mapOrFail<T>(raw: unknown, map: (value: unknown) => T, what: string): T {
    try {
      return map(raw);
    } catch (err) {
      if (err instanceof ZodError) {
        const issue = err.issues[0];
        const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : err.message;
        throw new TransportError(0, `resposta inesperada (${what}) em ${where}`);
      }
      throw err;
    }
  }
}

/** Usa o campo "message" do corpo de erro do Notion quando existir. */
function extractErrorMessage(body: string): string {
  const parsed = parseJsonSafe(body, ErrorBodySchema);
  return parsed?.message ?? body;
}

function parseJsonSafe<T>(text: string, schema: ZodType<T>): T | null {
  try {
    const result = schema.safeParse(JSON.parse(text));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

async function safeReadText(res: Response): Promise<string> {
  try {
    const t = await res.text();
    return t?.slice(0, 5000) || "";
  } catch {
    return "";
  }
}
