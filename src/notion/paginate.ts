// src/notion/paginate.ts
//
// Consome uma fonte paginada por cursor até has_more=false.
// - Sequencial: uma página por vez, na ordem do cursor
// - Tudo ou nada: se qualquer página falhar, a chamada inteira rejeita
// - Um cursor nunca é pedido duas vezes no mesmo run

import { TransportError } from "../domain/errors.js";
import type { Page } from "../domain/notion.js";

/** Limite da API do Notion para page_size. */
export const NOTION_MAX_PAGE_SIZE = 100;

export type PageFetcher<T> = (cursor?: string) => Promise<Page<T>>;

export function clampPageSize(pageSize: number | undefined): number {
  if (pageSize === undefined || !Number.isFinite(pageSize)) return NOTION_MAX_PAGE_SIZE;
  return Math.max(1, Math.min(Math.floor(pageSize), NOTION_MAX_PAGE_SIZE));
}

export async function collectAllPages<T>(
  fetchPage: PageFetcher<T>,
  opts: { label?: string } = {}
): Promise<T[]> {
  const label = opts.label ?? "paginate";
  const all: T[] = [];
  const seen = new Set<string>();
  let cursor: string | undefined = undefined;

  for (;;) {
    const page: Page<T> = await fetchPage(cursor);
    all.push(...page.items);

    if (!page.hasMore) break;

    const next = page.nextCursor;
    if (!next) {
      throw new TransportError(0, `[${label}] has_more=true sem next_cursor`);
    }
    if (seen.has(next)) {
      throw new TransportError(0, `[${label}] cursor repetido: ${next}`);
    }

    seen.add(next);
    cursor = next;
  }

  return all;
}
