// Fake em memória do ContentStore + builders de fixtures para os testes.

import { TransportError } from "../domain/errors.js";
import type { Block, ContentStore, NotionDocument, Page } from "../domain/notion.js";

export class InMemoryContentStore implements ContentStore {
  readonly children = new Map<string, Block[]>();
  readonly collections = new Map<string, NotionDocument[]>();
  readonly failing = new Set<string>();
  readonly calls: { parentId: string; cursor?: string }[] = [];

  constructor(private readonly pageSize = 2) {}

  async fetchChildPage(parentId: string, cursor?: string): Promise<Page<Block>> {
    this.calls.push({ parentId, cursor });
    if (this.failing.has(parentId)) {
      throw new TransportError(500, `boom ${parentId}`);
    }
    // cópia rasa: cada busca devolve objetos novos, como a API
    const all = (this.children.get(parentId) ?? []).map((b): Block => ({ ...b, children: [] }));
    return this.slice(all, cursor);
  }

  async fetchCollectionPage(collectionId: string, cursor?: string): Promise<Page<NotionDocument>> {
    this.calls.push({ parentId: collectionId, cursor });
    if (this.failing.has(collectionId)) {
      throw new TransportError(503, `boom ${collectionId}`);
    }
    return this.slice(this.collections.get(collectionId) ?? [], cursor);
  }

  callsFor(parentId: string): number {
    return this.calls.filter((c) => c.parentId === parentId).length;
  }

  private slice<T>(all: T[], cursor?: string): Page<T> {
    const start = cursor ? Number(cursor) : 0;
    const next = start + this.pageSize;
    const hasMore = next < all.length;
    return {
      items: all.slice(start, next),
      nextCursor: hasMore ? String(next) : null,
      hasMore,
    };
  }
}

export function paragraph(id: string, text: string, hasChildren = false): Block {
  return { id, type: "paragraph", text, hasChildren, children: [] };
}

export function doc(id: string, title: string, date: string | null): NotionDocument {
  return {
    id,
    createdTime: "2025-07-01T00:00:00.000Z",
    url: `https://www.notion.so/${id}`,
    properties: {
      Name: { type: "title", title: [{ plain_text: title }] },
      Date: { type: "date", date: date ? { start: date } : null },
    },
    date,
  };
}

export function ids(blocks: Block[]): string[] {
  return blocks.map((b) => b.id);
}
